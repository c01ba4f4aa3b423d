/**
 * ManagerBase - Shared interface for stateful orchestrators.
 *
 * A host drops a manager (window closed, project switched) by calling
 * `dispose()`; afterwards no listeners stay attached.
 */

export interface Disposable {
  dispose(): void;
}

export type ManagerBase = Disposable;
