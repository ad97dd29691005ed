/**
 * QuerySniffer Execution Counters — Global and per-context statement counts
 *
 * An execution context is an AsyncLocalStorage store started by
 * runInContext(); everything outside one shares the root context. The event
 * loop serializes record() calls, so increments are never lost.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { emitSnifferWarning } from './errors.js';
import { observerRegistry } from './registry.js';
import { logger } from './runtime.js';

interface ContextCounter {
  readonly id: number;
  count: number;
}

const ROOT_CONTEXT_ID = 0;

const storage = new AsyncLocalStorage<ContextCounter>();
const rootCounter: ContextCounter = { id: ROOT_CONTEXT_ID, count: 0 };
let globalCount = 0;
let nextContextId = ROOT_CONTEXT_ID + 1;

function currentCounter(): ContextCounter {
  return storage.getStore() ?? rootCounter;
}

// ─── Recording ───────────────────────────────────────────────────────────────

/**
 * Count one executed statement and notify every live spy. Never throws:
 * observer or listener failures are reported as process warnings.
 */
export function record(sql: string): void {
  const counter = currentCounter();
  globalCount++;
  counter.count++;

  try {
    observerRegistry.broadcast(sql);
    logger.logStatement({
      sql,
      globalCount,
      contextCount: counter.count,
      contextId: counter.id,
    });
  } catch (err) {
    emitSnifferWarning(err, `While recording statement: ${sql}`);
  }
}

// ─── Snapshots ───────────────────────────────────────────────────────────────

export function snapshotGlobal(): number {
  return globalCount;
}

export function snapshotContext(): number {
  return currentCounter().count;
}

export function currentContextId(): number {
  return currentCounter().id;
}

// ─── Contexts ────────────────────────────────────────────────────────────────

/**
 * Run `work` in a fresh execution context whose counter starts at zero.
 * Promises returned by `work` keep the context for their continuations.
 */
export function runInContext<T>(work: () => T): T {
  const counter: ContextCounter = { id: nextContextId++, count: 0 };
  return storage.run(counter, work);
}

// ─── Administrative Reset ────────────────────────────────────────────────────
// Not safe while other contexts are recording. Meant for test setup.

export function resetGlobal(): void {
  globalCount = 0;
  logger.logCountersReset({ counter: 'global', contextId: currentContextId() });
}

export function resetContext(): void {
  const counter = currentCounter();
  counter.count = 0;
  logger.logCountersReset({ counter: 'context', contextId: counter.id });
}
