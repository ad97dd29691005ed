/**
 * QuerySniffer — Public API Entry Point
 *
 * Count the statements your code sends to the database and assert on them in tests.
 */

// Entry points
export { Sniffer } from './sniffer.js';
export { Spy, SpyWithValue } from './spy.js';
export { Expectation, UNBOUNDED } from './expectation.js';

// Counters and registry
export {
  record,
  snapshotGlobal,
  snapshotContext,
  currentContextId,
  runInContext,
  resetGlobal,
  resetContext,
} from './counters.js';
export { ObserverRegistry, observerRegistry } from './registry.js';
export type { ObserverHandle, ObserverRegistryOptions } from './registry.js';

// Interception
export { sniff, sniffFunction, extractStatement } from './interceptor.js';

// Configuration and events
export { configure, getConfig, resetConfig, snifferEvents } from './runtime.js';
export { DEFAULT_MAX_REPORTED_STATEMENTS } from './config.js';
export type { ResolvedSnifferConfig } from './config.js';
export { SnifferEventEmitter } from './events.js';

// Errors
export {
  SnifferError,
  SpyClosedError,
  VerificationError,
  getSuppressed,
} from './errors.js';

// Types
export type {
  ObserverRef,
  SniffOptions,
  SnifferConfig,
  SnifferErrorCode,
  SnifferEvents,
  StatementExtractor,
  StatementObserver,
  ThreadScope,
} from './types.js';
export { THREAD_SCOPES } from './types.js';
