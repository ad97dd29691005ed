/**
 * QuerySniffer — All shared types and interfaces
 *
 * Leaf module: imports nothing from the rest of the package.
 */

// ─── Thread Scope ────────────────────────────────────────────────────────────

/**
 * Which execution contexts a delta or expectation considers.
 *
 * - `any`: every context (global counter)
 * - `current`: only the context evaluating the expectation
 * - `others`: every context except the evaluating one
 */
export type ThreadScope = 'any' | 'current' | 'others';

export const THREAD_SCOPES = ['any', 'current', 'others'] as const satisfies readonly ThreadScope[];

// ─── Observers ───────────────────────────────────────────────────────────────

export interface StatementObserver {
  addExecutedStatement(sql: string): void;
}

/** Anything that can hand back its target until the target is reclaimed. */
export interface ObserverRef<T extends object> {
  deref(): T | undefined;
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface SnifferConfig {
  logging?: boolean | 'verbose';
  defaultScope?: ThreadScope;
  maxReportedStatements?: number;
}

// ─── Interception ────────────────────────────────────────────────────────────

export type StatementExtractor = (args: readonly unknown[]) => string;

export interface SniffOptions {
  /** Methods whose calls count as executed statements. Defaults to query and execute. */
  methods?: readonly string[];
  extractStatement?: StatementExtractor;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type SnifferErrorCode =
  | 'WRONG_NUMBER_OF_STATEMENTS'
  | 'SPY_CLOSED'
  | 'INVALID_EXPECTATION'
  | 'INVALID_CONFIG'
  | 'ASYNC_WORK'
  | 'INTERNAL_ERROR';

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface SnifferEvents {
  statement: { sql: string; globalCount: number; contextCount: number; contextId: number };
  'spy-created': { spyId: number; initialGlobal: number; initialContext: number };
  'spy-reset': { spyId: number; initialGlobal: number; initialContext: number };
  'verification-failed': { spyId: number; failures: number; message: string };
  'spy-closed': { spyId: number; verified: boolean };
  'counters-reset': { counter: 'global' | 'context'; contextId: number };
  'unattached-failure': { spyId: number; primary: unknown; failure: Error };
}
