/**
 * Error System Tests — Normalized errors, chaining and suppressed failures
 */

import { describe, it, expect } from 'vitest';
import {
  SnifferError,
  SpyClosedError,
  VerificationError,
  attachSuppressed,
  describeRange,
  describeScope,
  getSuppressed,
  invalidExpectationError,
  invariantViolation,
} from '../src/errors.js';

function verificationError(overrides: Partial<ConstructorParameters<typeof VerificationError>[0]> = {}) {
  return new VerificationError({
    scope: 'current',
    minCount: 0,
    maxCount: 0,
    actualCount: 1,
    statements: ['SELECT 1'],
    maxReportedStatements: 50,
    ...overrides,
  });
}

describe('SnifferError', () => {
  it('creates error with all fields', () => {
    const err = new SnifferError({
      code: 'INVALID_CONFIG',
      message: 'Bad config.',
      fix: 'Pass a valid config.',
    });

    expect(err.code).toBe('INVALID_CONFIG');
    expect(err.fix).toBe('Pass a valid config.');
    expect(err.message).toBe('Bad config. Fix: Pass a valid config.');
    expect(err.timestamp).toBeInstanceOf(Date);
    expect(err.name).toBe('SnifferError');
  });

  it('appends details after the fix', () => {
    const err = new SnifferError({ code: 'INTERNAL_ERROR', message: 'm.', fix: 'f.', details: 'line' });
    expect(err.message).toBe('m. Fix: f.\nline');
  });
});

describe('VerificationError', () => {
  it('reports scope, bounds, actual count and statements', () => {
    const err = verificationError();

    expect(err).toBeInstanceOf(SnifferError);
    expect(err.name).toBe('VerificationError');
    expect(err.code).toBe('WRONG_NUMBER_OF_STATEMENTS');
    expect(err.scope).toBe('current');
    expect(err.minCount).toBe(0);
    expect(err.maxCount).toBe(0);
    expect(err.actualCount).toBe(1);
    expect(err.statements).toEqual(['SELECT 1']);
    expect(err.message).toBe(
      'Expected exactly 0 statement(s) in the current context, but 1 was executed. ' +
      'Fix: Look for repeated statements below (N+1 pattern) and batch or cache them, or raise the expected maximum.\n' +
      'Executed statements (1):\n' +
      '  1. SELECT 1',
    );
  });

  it('suggests checking interception when too few statements ran', () => {
    const err = verificationError({ scope: 'any', minCount: 2, maxCount: Infinity, actualCount: 0, statements: [] });
    expect(err.message).toBe(
      'Expected at least 2 statement(s) across all contexts, but 0 were executed. ' +
      'Fix: Check that the code under test reaches the database through a sniffed client, or lower the expected minimum.\n' +
      'Executed statements: none recorded by this spy.',
    );
  });

  it('truncates long statement lists', () => {
    const err = verificationError({ statements: ['a', 'b', 'c'], maxReportedStatements: 2, actualCount: 3 });
    expect(err.message).toContain('Executed statements (3):\n  1. a\n  2. b\n  ... and 1 more');
    expect(err.statements).toEqual(['a', 'b', 'c']);
  });

  it('copies the statement list', () => {
    const statements = ['SELECT 1'];
    const err = verificationError({ statements });
    statements.push('SELECT 2');
    expect(err.statements).toEqual(['SELECT 1']);
  });

  it('chains failures through next and cause', () => {
    const first = verificationError();
    const second = verificationError({ scope: 'others' });
    const third = verificationError({ scope: 'any' });
    first.chain(second);
    second.chain(third);

    expect(first.next).toBe(second);
    expect(first.cause).toBe(second);
    expect(second.cause).toBe(third);
    expect(third.next).toBeNull();
    expect(first.failures().map(f => f.scope)).toEqual(['current', 'others', 'any']);
  });
});

describe('SpyClosedError', () => {
  it('carries the close stack', () => {
    const err = new SpyClosedError('    at close (test.ts:1:1)');
    expect(err.code).toBe('SPY_CLOSED');
    expect(err.closeStack).toBe('    at close (test.ts:1:1)');
    expect(err.message).toBe(
      'Spy is closed. Fix: Create a new spy with Sniffer.spy() instead of reusing one after close().\n' +
      'Closed at:\n    at close (test.ts:1:1)',
    );
  });

  it('omits the stack section when none was captured', () => {
    const err = new SpyClosedError(undefined);
    expect(err.message).toBe('Spy is closed. Fix: Create a new spy with Sniffer.spy() instead of reusing one after close().');
  });
});

describe('error helpers', () => {
  it('builds INVALID_EXPECTATION errors', () => {
    const err = invalidExpectationError(['minCount: too small', 'maxCount: too small']);
    expect(err.code).toBe('INVALID_EXPECTATION');
    expect(err.message).toContain('Invalid expectation: minCount: too small; maxCount: too small.');
  });

  it('builds INTERNAL_ERROR errors', () => {
    const err = invariantViolation('Negative count.');
    expect(err.code).toBe('INTERNAL_ERROR');
    expect(err.message.startsWith('Negative count. Fix: ')).toBe(true);
  });

  it('describes ranges', () => {
    expect(describeRange(2, 2)).toBe('exactly 2');
    expect(describeRange(0, 3)).toBe('at most 3');
    expect(describeRange(4, Infinity)).toBe('at least 4');
    expect(describeRange(1, 3)).toBe('between 1 and 3');
    expect(describeRange(0, Infinity)).toBe('at least 0');
  });

  it('describes scopes', () => {
    expect(describeScope('any')).toBe('across all contexts');
    expect(describeScope('current')).toBe('in the current context');
    expect(describeScope('others')).toBe('in other contexts');
  });
});

describe('attachSuppressed', () => {
  it('attaches failures to an error without making them enumerable', () => {
    const primary = new Error('work failed');
    const first = verificationError();
    const second = verificationError({ scope: 'any' });

    expect(attachSuppressed(primary, first)).toBe(true);
    expect(attachSuppressed(primary, second)).toBe(true);
    expect(getSuppressed(primary)).toEqual([first, second]);
    expect(Object.keys(primary)).toEqual([]);
  });

  it('refuses primitives and frozen objects', () => {
    expect(attachSuppressed('plain failure', verificationError())).toBe(false);
    expect(attachSuppressed(undefined, verificationError())).toBe(false);
    expect(attachSuppressed(Object.freeze(new Error('frozen')), verificationError())).toBe(false);
  });

  it('reads nothing from values without suppressed failures', () => {
    expect(getSuppressed(new Error('x'))).toEqual([]);
    expect(getSuppressed('x')).toEqual([]);
    expect(getSuppressed(null)).toEqual([]);
  });
});
