/**
 * Logger Tests — What gets emitted at each logging level
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { SnifferEventEmitter } from '../src/events.js';
import { SnifferLogger } from '../src/logger.js';

function makeLogger(enabled: boolean, verbose: boolean) {
  const emitter = new SnifferEventEmitter();
  return { emitter, logger: new SnifferLogger({ enabled, verbose }, emitter) };
}

const statement = { sql: 'SELECT 1', globalCount: 1, contextCount: 1, contextId: 0 };

describe('SnifferLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('emits statement events only in verbose mode', () => {
    const quiet = makeLogger(true, false);
    const quietHandler = vi.fn();
    quiet.emitter.on('statement', quietHandler);
    quiet.logger.logStatement(statement);
    expect(quietHandler).not.toHaveBeenCalled();

    const verbose = makeLogger(true, true);
    const verboseHandler = vi.fn();
    verbose.emitter.on('statement', verboseHandler);
    verbose.logger.logStatement(statement);
    expect(verboseHandler).toHaveBeenCalledWith(statement);
  });

  it('emits lifecycle events when enabled', () => {
    const { emitter, logger } = makeLogger(true, false);
    const created = vi.fn();
    const closed = vi.fn();
    const reset = vi.fn();
    emitter.on('spy-created', created);
    emitter.on('spy-closed', closed);
    emitter.on('counters-reset', reset);

    logger.logSpyCreated({ spyId: 7, initialGlobal: 1, initialContext: 0 });
    logger.logSpyClosed({ spyId: 7, verified: false });
    logger.logCountersReset({ counter: 'context', contextId: 2 });

    expect(created).toHaveBeenCalledWith({ spyId: 7, initialGlobal: 1, initialContext: 0 });
    expect(closed).toHaveBeenCalledWith({ spyId: 7, verified: false });
    expect(reset).toHaveBeenCalledWith({ counter: 'context', contextId: 2 });
  });

  it('summarizes verification failures', () => {
    const { emitter, logger } = makeLogger(true, false);
    const handler = vi.fn();
    emitter.on('verification-failed', handler);

    logger.logVerificationFailed(4, [new Error('first'), new Error('second')]);
    logger.logVerificationFailed(4, []);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ spyId: 4, failures: 2, message: 'first' });
  });

  it('emits nothing when disabled', () => {
    const { emitter, logger } = makeLogger(false, true);
    const handler = vi.fn();
    emitter.on('spy-created', handler);
    emitter.on('statement', handler);

    logger.logSpyCreated({ spyId: 1, initialGlobal: 0, initialContext: 0 });
    logger.logStatement(statement);

    expect(handler).not.toHaveBeenCalled();
  });

  it('applies a new configuration', () => {
    const { emitter, logger } = makeLogger(false, false);
    const handler = vi.fn();
    emitter.on('spy-reset', handler);

    logger.configure({ enabled: true, verbose: false });
    logger.logSpyReset({ spyId: 2, initialGlobal: 3, initialContext: 1 });

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('reports unattached failures even when disabled', () => {
    const { emitter, logger } = makeLogger(false, false);
    const handler = vi.fn();
    emitter.on('unattached-failure', handler);
    const failure = new Error('verification');

    logger.logUnattachedFailure({ spyId: 1, primary: 'boom', failure });

    expect(handler).toHaveBeenCalledWith({ spyId: 1, primary: 'boom', failure });
  });

  it('falls back to console.error when nobody listens for unattached failures', () => {
    const { logger } = makeLogger(true, false);
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('verification');

    logger.logUnattachedFailure({ spyId: 1, primary: 'boom', failure });

    expect(consoleError).toHaveBeenCalledWith(failure);
  });
});
