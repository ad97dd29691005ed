/**
 * QuerySniffer Spy — Baselined statement observer with fluent expectations
 *
 * A spy snapshots the global and per-context counters when it is created (or
 * reset) and measures every delta against that baseline:
 *
 *   any     = global - initialGlobal
 *   current = context - initialContext
 *   others  = global - context - initialGlobal + initialContext
 *
 * Usage:
 *   const spy = Spy.create().expectAtMostOnce();
 *   await loadUser(1);
 *   spy.close(); // verifies, then stops observing
 */

import * as counters from './counters.js';
import { Expectation, UNBOUNDED } from './expectation.js';
import {
  SpyClosedError,
  VerificationError,
  asyncWorkError,
  attachSuppressed,
  emitSnifferWarning,
  invariantViolation,
} from './errors.js';
import { observerRegistry } from './registry.js';
import type { ObserverHandle } from './registry.js';
import { getConfig, logger } from './runtime.js';
import type { StatementObserver, ThreadScope } from './types.js';

let nextSpyId = 1;

export class Spy implements StatementObserver {
  readonly id: number;

  private initialGlobal: number;
  private initialContext: number;
  private executed: string[];
  private expectations: Expectation[] = [];
  private readonly handle: ObserverHandle;
  private closed = false;
  private closeStack: string | undefined;

  protected constructor(initialGlobal: number, initialContext: number, statements: readonly string[] = []) {
    this.id = nextSpyId++;
    this.initialGlobal = initialGlobal;
    this.initialContext = initialContext;
    this.executed = [...statements];
    this.handle = observerRegistry.register(this);
    logger.logSpyCreated({ spyId: this.id, initialGlobal, initialContext });
  }

  /** Spy baselined on the current counter values. */
  static create(): Spy {
    return new Spy(counters.snapshotGlobal(), counters.snapshotContext());
  }

  /**
   * Spy baselined on externally obtained counter values, for callers that
   * keep their own bookkeeping.
   */
  static createWithBaseline(initialGlobal: number, initialContext: number): Spy {
    return new Spy(initialGlobal, initialContext);
  }

  /** @internal Called by the observer registry for every recorded statement. */
  addExecutedStatement(sql: string): void {
    this.executed.push(sql);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Statements observed since creation or the last reset, in execution order. */
  statements(): string[] {
    this.checkOpened();
    return [...this.executed];
  }

  /** Rebaseline on the current counter values and clear the statement log. */
  reset(): this {
    this.checkOpened();
    this.initialGlobal = counters.snapshotGlobal();
    this.initialContext = counters.snapshotContext();
    this.executed = [];
    logger.logSpyReset({
      spyId: this.id,
      initialGlobal: this.initialGlobal,
      initialContext: this.initialContext,
    });
    return this;
  }

  executedStatements(scope: ThreadScope = getConfig().defaultScope): number {
    this.checkOpened();
    return this.delta(scope);
  }

  // ─── Expectations (checked by verify()) ────────────────────────────────────

  expectNever(scope?: ThreadScope): this {
    return this.expectBetween(0, 0, scope);
  }

  expectAtMostOnce(scope?: ThreadScope): this {
    return this.expectBetween(0, 1, scope);
  }

  expectAtMost(allowedStatements: number, scope?: ThreadScope): this {
    return this.expectBetween(0, allowedStatements, scope);
  }

  expect(allowedStatements: number, scope?: ThreadScope): this {
    return this.expectBetween(allowedStatements, allowedStatements, scope);
  }

  expectAtLeast(allowedStatements: number, scope?: ThreadScope): this {
    return this.expectBetween(allowedStatements, UNBOUNDED, scope);
  }

  /**
   * Expect at least `minAllowedStatements` and at most `maxAllowedStatements`
   * between the baseline and the next verify().
   */
  expectBetween(
    minAllowedStatements: number,
    maxAllowedStatements: number,
    scope: ThreadScope = getConfig().defaultScope,
  ): this {
    this.checkOpened();
    this.expectations.push(new Expectation(minAllowedStatements, maxAllowedStatements, scope));
    return this;
  }

  // ─── Immediate verification ────────────────────────────────────────────────

  verifyNever(scope?: ThreadScope): this {
    return this.verifyBetween(0, 0, scope);
  }

  verifyAtMostOnce(scope?: ThreadScope): this {
    return this.verifyBetween(0, 1, scope);
  }

  verifyAtMost(allowedStatements: number, scope?: ThreadScope): this {
    return this.verifyBetween(0, allowedStatements, scope);
  }

  verifyAtLeast(allowedStatements: number, scope?: ThreadScope): this {
    return this.verifyBetween(allowedStatements, UNBOUNDED, scope);
  }

  verifyBetween(
    minAllowedStatements: number,
    maxAllowedStatements: number,
    scope: ThreadScope = getConfig().defaultScope,
  ): this {
    this.checkOpened();
    const failure = this.evaluate(new Expectation(minAllowedStatements, maxAllowedStatements, scope));
    if (failure) {
      logger.logVerificationFailed(this.id, [failure]);
      throw failure;
    }
    return this;
  }

  /**
   * Without arguments, verify every expectation added with expect*() and
   * throw the first VerificationError, with the others chained to it.
   * With a count, verify that exactly that many statements were executed.
   */
  verify(allowedStatements?: number, scope?: ThreadScope): this {
    if (allowedStatements !== undefined) {
      return this.verifyBetween(allowedStatements, allowedStatements, scope);
    }

    const failure = this.getVerificationError();
    if (failure) {
      logger.logVerificationFailed(this.id, failure.failures());
      throw failure;
    }
    return this;
  }

  /**
   * Evaluate every expectation without throwing. Returns the first failure,
   * with later failures reachable through `next` / `cause`, or null.
   */
  getVerificationError(): VerificationError | null {
    this.checkOpened();

    let head: VerificationError | null = null;
    let tail: VerificationError | null = null;
    for (const expectation of this.expectations) {
      const failure = this.evaluate(expectation);
      if (!failure) continue;
      if (tail) {
        tail.chain(failure);
      } else {
        head = failure;
      }
      tail = failure;
    }
    return head;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  /**
   * Verify, then stop observing. Cleanup runs even when verification fails;
   * the failure is rethrown afterwards. A second close() throws SpyClosedError.
   */
  close(): void {
    this.checkOpened();
    let verified = false;
    try {
      this.verify();
      verified = true;
    } finally {
      observerRegistry.unregister(this.handle);
      this.closed = true;
      this.closeStack = captureStack();
      logger.logSpyClosed({ spyId: this.id, verified });
    }
  }

  // ─── Functional wrappers ───────────────────────────────────────────────────

  /** Synchronous work only; promise-returning work is refused, use execute(). */
  run(work: () => void): this {
    this.checkOpened();
    let result: unknown;
    try {
      result = work();
    } catch (err) {
      throw this.verifyAndAttach(err);
    }
    this.refuseAsyncWork(result, 'run');
    this.verify();
    return this;
  }

  async execute(work: () => void | Promise<void>): Promise<this> {
    this.checkOpened();
    try {
      await work();
    } catch (err) {
      throw this.verifyAndAttach(err);
    }
    this.verify();
    return this;
  }

  /**
   * Run `work`, verify, and return its value on a spy sharing this spy's
   * baseline so further expectations can be chained.
   */
  call<V>(work: () => V): SpyWithValue<V> {
    this.checkOpened();
    let value: V;
    try {
      value = work();
    } catch (err) {
      throw this.verifyAndAttach(err);
    }
    this.refuseAsyncWork(value, 'call');
    this.verify();
    return this.withValue(value);
  }

  async callAsync<V>(work: () => Promise<V>): Promise<SpyWithValue<V>> {
    this.checkOpened();
    let value: V;
    try {
      value = await work();
    } catch (err) {
      throw this.verifyAndAttach(err);
    }
    this.verify();
    return this.withValue(value);
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private withValue<V>(value: V): SpyWithValue<V> {
    return new SpyWithValue(value, this.initialGlobal, this.initialContext, this.executed);
  }

  private delta(scope: ThreadScope): number {
    const global = counters.snapshotGlobal();
    const context = counters.snapshotContext();
    const count = resolveDelta(scope, global, context, this.initialGlobal, this.initialContext);

    if (count < 0) {
      throw invariantViolation(
        `Negative statement count (${count}) for scope "${scope}" on spy #${this.id} ` +
        `(baseline global=${this.initialGlobal}, context=${this.initialContext}; ` +
        `now global=${global}, context=${context} in context #${counters.currentContextId()}).`,
      );
    }
    return count;
  }

  private evaluate(expectation: Expectation): VerificationError | null {
    return expectation.check(
      this.delta(expectation.scope),
      this.executed,
      getConfig().maxReportedStatements,
    );
  }

  /**
   * The work under test threw: keep its error as the one that propagates and
   * attach any verification failure to it.
   */
  private verifyAndAttach(primary: unknown): unknown {
    let failure: Error | null;
    try {
      failure = this.getVerificationError();
    } catch (err) {
      failure = err instanceof Error ? err : new Error(String(err));
    }

    if (failure && !attachSuppressed(primary, failure)) {
      logger.logUnattachedFailure({ spyId: this.id, primary, failure });
    }
    return primary;
  }

  private refuseAsyncWork(result: unknown, wrapper: 'run' | 'call'): void {
    if (!isThenable(result)) return;
    void Promise.resolve(result).catch((err: unknown) => {
      emitSnifferWarning(err, `Rejected work passed to spy #${this.id}.${wrapper}()`);
    });
    throw asyncWorkError(wrapper);
  }

  private checkOpened(): void {
    if (this.closed) {
      throw new SpyClosedError(this.closeStack);
    }
  }
}

// ─── SpyWithValue ────────────────────────────────────────────────────────────

export class SpyWithValue<V> extends Spy {
  readonly value: V;

  constructor(value: V, initialGlobal: number, initialContext: number, statements: readonly string[] = []) {
    super(initialGlobal, initialContext, statements);
    this.value = value;
  }
}

function resolveDelta(
  scope: ThreadScope,
  global: number,
  context: number,
  initialGlobal: number,
  initialContext: number,
): number {
  switch (scope) {
    case 'any':
      return global - initialGlobal;
    case 'current':
      return context - initialContext;
    case 'others':
      // Work done elsewhere; the context baseline adds back what this
      // context had done before the spy was created.
      return global - context - initialGlobal + initialContext;
  }
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'then') === 'function';
}

function captureStack(): string | undefined {
  const stack = new Error('close').stack;
  if (!stack) return undefined;
  // Drop the message line and this helper's own frame.
  return stack.split('\n').slice(2).join('\n');
}
