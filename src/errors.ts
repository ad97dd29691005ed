/**
 * QuerySniffer Error System — Normalized errors with fix instructions
 *
 * Every failure raised by the package is a SnifferError carrying a code and a
 * fix instruction, so a failing test explains itself without a rerun.
 */

import type { SnifferErrorCode, ThreadScope } from './types.js';

// ─── SnifferError ────────────────────────────────────────────────────────────

export class SnifferError extends Error {
  readonly code: SnifferErrorCode;
  readonly fix: string;
  readonly timestamp: Date;

  constructor(opts: {
    code: SnifferErrorCode;
    message: string;
    fix: string;
    details?: string;
  }) {
    super(`${opts.message} Fix: ${opts.fix}${opts.details ? `\n${opts.details}` : ''}`);
    this.name = 'SnifferError';
    this.code = opts.code;
    this.fix = opts.fix;
    this.timestamp = new Date();
  }
}

// ─── VerificationError ───────────────────────────────────────────────────────

export class VerificationError extends SnifferError {
  readonly scope: ThreadScope;
  readonly minCount: number;
  readonly maxCount: number;
  readonly actualCount: number;
  readonly statements: readonly string[];
  private nextFailure: VerificationError | null = null;

  constructor(opts: {
    scope: ThreadScope;
    minCount: number;
    maxCount: number;
    actualCount: number;
    statements: readonly string[];
    maxReportedStatements: number;
  }) {
    super({
      code: 'WRONG_NUMBER_OF_STATEMENTS',
      message: `Expected ${describeRange(opts.minCount, opts.maxCount)} statement(s) ${describeScope(opts.scope)}, but ${opts.actualCount} ${opts.actualCount === 1 ? 'was' : 'were'} executed.`,
      fix: opts.actualCount > opts.maxCount
        ? 'Look for repeated statements below (N+1 pattern) and batch or cache them, or raise the expected maximum.'
        : 'Check that the code under test reaches the database through a sniffed client, or lower the expected minimum.',
      details: formatStatements(opts.statements, opts.maxReportedStatements),
    });
    this.name = 'VerificationError';
    this.scope = opts.scope;
    this.minCount = opts.minCount;
    this.maxCount = opts.maxCount;
    this.actualCount = opts.actualCount;
    this.statements = [...opts.statements];
  }

  /** Next failure from the same verification pass, also exposed as `cause`. */
  get next(): VerificationError | null {
    return this.nextFailure;
  }

  chain(next: VerificationError): void {
    this.nextFailure = next;
    this.cause = next;
  }

  /** This failure followed by every failure chained after it. */
  failures(): VerificationError[] {
    const all: VerificationError[] = [];
    let current: VerificationError | null = this;
    while (current) {
      all.push(current);
      current = current.next;
    }
    return all;
  }
}

// ─── SpyClosedError ──────────────────────────────────────────────────────────

export class SpyClosedError extends SnifferError {
  /** Stack of the close() call that closed the spy. */
  readonly closeStack: string | undefined;

  constructor(closeStack: string | undefined) {
    super({
      code: 'SPY_CLOSED',
      message: 'Spy is closed.',
      fix: 'Create a new spy with Sniffer.spy() instead of reusing one after close().',
      details: closeStack ? `Closed at:\n${closeStack}` : undefined,
    });
    this.name = 'SpyClosedError';
    this.closeStack = closeStack;
  }
}

// ─── Self-Correcting Error Helpers ───────────────────────────────────────────

export function invalidExpectationError(issues: string[]): SnifferError {
  return new SnifferError({
    code: 'INVALID_EXPECTATION',
    message: `Invalid expectation: ${issues.join('; ')}.`,
    fix: 'Counts must be non-negative integers and the maximum must not be lower than the minimum. Use expectAtLeast() for an unbounded maximum.',
  });
}

export function invalidConfigError(issues: string[], source: 'config' | 'environment'): SnifferError {
  return new SnifferError({
    code: 'INVALID_CONFIG',
    message: `Invalid sniffer ${source}: ${issues.join('; ')}.`,
    fix: source === 'environment'
      ? 'SNIFFER_LOGGING must be true, false or verbose; SNIFFER_DEFAULT_SCOPE must be any, current or others; SNIFFER_MAX_REPORTED_STATEMENTS must be a positive integer.'
      : 'Pass { logging: boolean | "verbose", defaultScope: "any" | "current" | "others", maxReportedStatements: positive integer }.',
  });
}

export function asyncWorkError(wrapper: 'run' | 'call'): SnifferError {
  const replacement = wrapper === 'run' ? 'execute' : 'callAsync';
  return new SnifferError({
    code: 'ASYNC_WORK',
    message: `${wrapper}() received work that returned a promise; its statements would be verified before they run.`,
    fix: `Use await spy.${replacement}(work) for asynchronous work.`,
  });
}

export function invariantViolation(message: string): SnifferError {
  return new SnifferError({
    code: 'INTERNAL_ERROR',
    message,
    fix: 'Evaluate the spy in the execution context that created it and do not reset counters while spies are open.',
  });
}

// ─── Suppressed Failures ─────────────────────────────────────────────────────

const SUPPRESSED = 'suppressed';

/**
 * Attach a secondary failure to a thrown value. Returns false when the thrown
 * value cannot carry it (primitives, frozen or sealed objects).
 */
export function attachSuppressed(target: unknown, failure: Error): boolean {
  if (typeof target !== 'object' || target === null || !Object.isExtensible(target)) {
    return false;
  }

  const existing: unknown = Reflect.get(target, SUPPRESSED);
  if (Array.isArray(existing)) {
    existing.push(failure);
    return true;
  }

  Object.defineProperty(target, SUPPRESSED, {
    value: [failure],
    writable: true,
    configurable: true,
    enumerable: false,
  });
  return true;
}

export function getSuppressed(target: unknown): Error[] {
  if (typeof target !== 'object' || target === null) return [];
  const existing: unknown = Reflect.get(target, SUPPRESSED);
  if (!Array.isArray(existing)) return [];
  return existing.filter((item): item is Error => item instanceof Error);
}

// ─── Warnings ────────────────────────────────────────────────────────────────

/** Report a failure that has no caller to propagate to. */
export function emitSnifferWarning(err: unknown, detail: string): void {
  process.emitWarning(err instanceof Error ? err : String(err), { type: 'SnifferWarning', detail });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function describeRange(min: number, max: number): string {
  if (min === max) return `exactly ${min}`;
  if (max === Infinity) return `at least ${min}`;
  if (min === 0) return `at most ${max}`;
  return `between ${min} and ${max}`;
}

export function describeScope(scope: ThreadScope): string {
  switch (scope) {
    case 'any':
      return 'across all contexts';
    case 'current':
      return 'in the current context';
    case 'others':
      return 'in other contexts';
  }
}

function formatStatements(statements: readonly string[], limit: number): string {
  if (statements.length === 0) return 'Executed statements: none recorded by this spy.';

  const lines = statements
    .slice(0, limit)
    .map((sql, i) => `  ${i + 1}. ${sql}`);
  if (statements.length > limit) {
    lines.push(`  ... and ${statements.length - limit} more`);
  }
  return `Executed statements (${statements.length}):\n${lines.join('\n')}`;
}
