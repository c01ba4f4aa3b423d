/**
 * EventEmitter Unit Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter, type EventMap } from './EventEmitter';
import { Logger, LogLevel } from './Logger';

interface TestEvents extends EventMap {
  status: string;
  count: number;
  report: { shots: number; failures: number };
}

describe('EventEmitter', () => {
  let emitter: EventEmitter<TestEvents>;

  beforeEach(() => {
    emitter = new EventEmitter<TestEvents>();
  });

  afterEach(() => {
    Logger.setSink(() => {});
  });

  describe('on', () => {
    it('EVT-001: subscribes to event', () => {
      const listener = vi.fn();
      emitter.on('status', listener);

      emitter.emit('status', 'Scanning sh010');
      expect(listener).toHaveBeenCalledWith('Scanning sh010');
    });

    it('returns unsubscribe function', () => {
      const listener = vi.fn();
      const unsubscribe = emitter.on('count', listener);

      emitter.emit('count', 1);
      unsubscribe();
      emitter.emit('count', 2);

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('passes object payloads through', () => {
      const listener = vi.fn();
      emitter.on('report', listener);

      const report = { shots: 3, failures: 1 };
      emitter.emit('report', report);

      expect(listener).toHaveBeenCalledWith(report);
    });
  });

  describe('off', () => {
    it('EVT-002: only removes the given listener', () => {
      const listener1 = vi.fn();
      const listener2 = vi.fn();
      emitter.on('count', listener1);
      emitter.on('count', listener2);

      emitter.off('count', listener1);
      emitter.emit('count', 10);

      expect(listener1).not.toHaveBeenCalled();
      expect(listener2).toHaveBeenCalledWith(10);
    });

    it('handles removing from non-existent event', () => {
      expect(() => emitter.off('count', vi.fn())).not.toThrow();
    });
  });

  describe('emit', () => {
    it('does not throw for event with no listeners', () => {
      expect(() => emitter.emit('status', 'no one listening')).not.toThrow();
    });

    it('EVT-003: logs listener errors and keeps notifying', () => {
      const sink = vi.fn();
      Logger.setSink(sink);
      const failure = new Error('Listener error');
      const normalListener = vi.fn();

      emitter.on('status', () => {
        throw failure;
      });
      emitter.on('status', normalListener);
      emitter.emit('status', 'test');

      expect(normalListener).toHaveBeenCalledWith('test');
      expect(sink).toHaveBeenCalledWith(
        LogLevel.ERROR,
        '[EventEmitter]',
        'Error in event listener for "status":',
        failure,
      );
    });

    it('still calls a listener registered after one that unsubscribes itself', () => {
      const second = vi.fn();
      const unsubscribe = emitter.on('count', () => unsubscribe());
      emitter.on('count', second);

      emitter.emit('count', 1);

      expect(second).toHaveBeenCalledWith(1);
    });
  });

  describe('once', () => {
    it('EVT-004: fires only once', () => {
      const listener = vi.fn();
      emitter.once('status', listener);

      emitter.emit('status', 'first');
      emitter.emit('status', 'second');

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith('first');
    });
  });

  describe('removeAllListeners', () => {
    it('removes listeners for one event', () => {
      const statusListener = vi.fn();
      const countListener = vi.fn();
      emitter.on('status', statusListener);
      emitter.on('count', countListener);

      emitter.removeAllListeners('status');
      emitter.emit('status', 'x');
      emitter.emit('count', 5);

      expect(statusListener).not.toHaveBeenCalled();
      expect(countListener).toHaveBeenCalledWith(5);
      expect(emitter.listenerCount('status')).toBe(0);
    });

    it('removes every listener when no event is given', () => {
      emitter.on('status', vi.fn());
      emitter.on('count', vi.fn());

      emitter.removeAllListeners();

      expect(emitter.listenerCount('status')).toBe(0);
      expect(emitter.listenerCount('count')).toBe(0);
    });
  });
});
