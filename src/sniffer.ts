/**
 * QuerySniffer — Static entry points
 *
 * Creates spies and exposes the process-wide counters:
 *
 *   Sniffer.expectAtMostOnce().run(() => repo.findUser(1));
 *
 *   const spy = Sniffer.spy();
 *   await service.listOrders();
 *   spy.verifyAtMost(2, 'any');
 */

import * as counters from './counters.js';
import { Spy } from './spy.js';
import type { SpyWithValue } from './spy.js';
import { configure, getConfig, resetConfig, snifferEvents } from './runtime.js';
import type { ResolvedSnifferConfig } from './config.js';
import type { SnifferConfig, ThreadScope } from './types.js';

export class Sniffer {
  private constructor() {}

  /** Typed emitter for statement and spy lifecycle events. */
  static readonly events = snifferEvents;

  // ─── Spies ─────────────────────────────────────────────────────────────────

  static spy(): Spy {
    return Spy.create();
  }

  static expectNever(scope?: ThreadScope): Spy {
    return Spy.create().expectNever(scope);
  }

  static expectAtMostOnce(scope?: ThreadScope): Spy {
    return Spy.create().expectAtMostOnce(scope);
  }

  static expectAtMost(allowedStatements: number, scope?: ThreadScope): Spy {
    return Spy.create().expectAtMost(allowedStatements, scope);
  }

  static expect(allowedStatements: number, scope?: ThreadScope): Spy {
    return Spy.create().expect(allowedStatements, scope);
  }

  static expectAtLeast(allowedStatements: number, scope?: ThreadScope): Spy {
    return Spy.create().expectAtLeast(allowedStatements, scope);
  }

  static expectBetween(min: number, max: number, scope?: ThreadScope): Spy {
    return Spy.create().expectBetween(min, max, scope);
  }

  /** Run `work` under a fresh spy without expectations; useful for counting. */
  static run(work: () => void): Spy {
    return Spy.create().run(work);
  }

  static execute(work: () => void | Promise<void>): Promise<Spy> {
    return Spy.create().execute(work);
  }

  static call<V>(work: () => V): SpyWithValue<V> {
    return Spy.create().call(work);
  }

  static callAsync<V>(work: () => Promise<V>): Promise<SpyWithValue<V>> {
    return Spy.create().callAsync(work);
  }

  // ─── Counters ──────────────────────────────────────────────────────────────

  /** Statements recorded by every context since start or the last reset. */
  static executedStatements(): number {
    return counters.snapshotGlobal();
  }

  /** Statements recorded by the calling execution context. */
  static contextExecutedStatements(): number {
    return counters.snapshotContext();
  }

  /** Count a statement. Interceptors call this once per executed statement. */
  static recordStatement(sql: string): void {
    counters.record(sql);
  }

  static runInContext<T>(work: () => T): T {
    return counters.runInContext(work);
  }

  /**
   * Zero the global counter and the calling context's counter. Not safe while
   * other contexts are recording.
   */
  static resetCounters(): void {
    counters.resetGlobal();
    counters.resetContext();
  }

  // ─── Configuration ─────────────────────────────────────────────────────────

  static configure(overrides: SnifferConfig): ResolvedSnifferConfig {
    return configure(overrides);
  }

  static get config(): ResolvedSnifferConfig {
    return getConfig();
  }

  static resetConfig(): ResolvedSnifferConfig {
    return resetConfig();
  }
}
