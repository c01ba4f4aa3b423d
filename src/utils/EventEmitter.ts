import { Logger } from './Logger';

type EventCallback<T = unknown> = (data: T) => void;

export interface EventMap {
  [event: string]: unknown;
}

const log = new Logger('EventEmitter');

/**
 * Typed synchronous emitter. A throwing listener is logged and does not stop
 * the remaining listeners, so a broken status surface never aborts a scan.
 */
export class EventEmitter<Events extends EventMap = EventMap> {
  private listeners = new Map<keyof Events, Set<EventCallback<never>>>();

  on<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set<EventCallback<never>>();
      this.listeners.set(event, set);
    }
    set.add(callback);

    return () => this.off(event, callback);
  }

  off<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): void {
    this.listeners.get(event)?.delete(callback);
  }

  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const set = this.listeners.get(event);
    if (!set) return;
    // Snapshot so a listener that unsubscribes itself does not skip its neighbour
    for (const callback of [...set] as EventCallback<Events[K]>[]) {
      try {
        callback(data);
      } catch (err) {
        log.error(`Error in event listener for "${String(event)}":`, err);
      }
    }
  }

  once<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
    const wrapper: EventCallback<Events[K]> = (data) => {
      this.off(event, wrapper);
      callback(data);
    };
    return this.on(event, wrapper);
  }

  listenerCount(event: keyof Events): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  removeAllListeners(event?: keyof Events): void {
    if (event) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }
}
