/**
 * QuerySniffer Observer Registry — Weakly-held spies notified of statements
 *
 * Membership never keeps a spy alive. Handles whose target was reclaimed are
 * dropped lazily on broadcast, or by the finalizer when no broadcast comes.
 */

import { emitSnifferWarning } from './errors.js';
import type { ObserverRef, StatementObserver } from './types.js';

export type ObserverHandle = ObserverRef<StatementObserver>;

export interface ObserverRegistryOptions {
  createRef?: (observer: StatementObserver) => ObserverHandle;
}

export class ObserverRegistry {
  private handles = new Set<ObserverHandle>();
  private createRef: (observer: StatementObserver) => ObserverHandle;
  private finalizer = new FinalizationRegistry<ObserverHandle>(handle => {
    this.handles.delete(handle);
  });

  constructor(options: ObserverRegistryOptions = {}) {
    this.createRef = options.createRef ?? (observer => new WeakRef(observer));
  }

  register(observer: StatementObserver): ObserverHandle {
    const handle = this.createRef(observer);
    this.handles.add(handle);
    this.finalizer.register(observer, handle, handle);
    return handle;
  }

  /** Idempotent. Unknown or already-dropped handles are ignored. */
  unregister(handle: ObserverHandle): void {
    this.handles.delete(handle);
    this.finalizer.unregister(handle);
  }

  /**
   * Deliver `sql` to every live observer. Iterates a snapshot: observers
   * registered meanwhile miss this statement, observers unregistered
   * meanwhile are skipped. An observer that throws is reported as a warning
   * and delivery continues with the next one.
   */
  broadcast(sql: string): void {
    for (const handle of [...this.handles]) {
      if (!this.handles.has(handle)) continue;

      const observer = handle.deref();
      if (observer === undefined) {
        this.handles.delete(handle);
        continue;
      }
      try {
        observer.addExecutedStatement(sql);
      } catch (err) {
        emitSnifferWarning(err, `While delivering statement to an observer: ${sql}`);
      }
    }
  }

  size(): number {
    return this.handles.size;
  }
}

export const observerRegistry = new ObserverRegistry();
