/**
 * QuerySniffer Logger — Structured statement and spy lifecycle logging
 *
 * Emits events through the sniffer's emitter. Statement events are only
 * emitted in verbose mode since they fire on every recorded statement.
 */

import type { SnifferEventEmitter } from './events.js';
import type { SnifferEvents } from './types.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
}

export class SnifferLogger {
  private config: LoggerConfig;
  private emitter: SnifferEventEmitter;

  constructor(config: LoggerConfig, emitter: SnifferEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  configure(config: LoggerConfig): void {
    this.config = config;
  }

  logStatement(payload: SnifferEvents['statement']): void {
    if (!this.config.enabled || !this.config.verbose) return;
    this.emitter.emit('statement', payload);
  }

  logSpyCreated(payload: SnifferEvents['spy-created']): void {
    if (!this.config.enabled) return;
    this.emitter.emit('spy-created', payload);
  }

  logSpyReset(payload: SnifferEvents['spy-reset']): void {
    if (!this.config.enabled) return;
    this.emitter.emit('spy-reset', payload);
  }

  logVerificationFailed(spyId: number, failures: Error[]): void {
    if (!this.config.enabled || failures.length === 0) return;
    this.emitter.emit('verification-failed', {
      spyId,
      failures: failures.length,
      message: failures[0]?.message ?? '',
    });
  }

  logSpyClosed(payload: SnifferEvents['spy-closed']): void {
    if (!this.config.enabled) return;
    this.emitter.emit('spy-closed', payload);
  }

  logCountersReset(payload: SnifferEvents['counters-reset']): void {
    if (!this.config.enabled) return;
    this.emitter.emit('counters-reset', payload);
  }

  /**
   * A verification failure that could not be attached to the error thrown by
   * the work under test. Always reported, whatever the logging setting.
   */
  logUnattachedFailure(payload: SnifferEvents['unattached-failure']): void {
    if (this.emitter.listenerCount('unattached-failure') > 0) {
      this.emitter.emit('unattached-failure', payload);
      return;
    }
    console.error(payload.failure);
  }
}
