/**
 * QuerySniffer Expectations — Immutable (min, max, scope) statement ranges
 */

import { z } from 'zod';
import { VerificationError, describeRange, describeScope, invalidExpectationError } from './errors.js';
import { THREAD_SCOPES } from './types.js';
import type { ThreadScope } from './types.js';

/** Upper bound of expectAtLeast(). */
export const UNBOUNDED = Number.POSITIVE_INFINITY;

const countSchema = z.number().int().nonnegative();

const expectationSchema = z.object({
  minCount: countSchema,
  maxCount: z.union([countSchema, z.literal(UNBOUNDED)]),
  scope: z.enum(THREAD_SCOPES),
}).refine(e => e.maxCount >= e.minCount, {
  message: 'maxCount must be greater than or equal to minCount',
  path: ['maxCount'],
});

export class Expectation {
  readonly minCount: number;
  readonly maxCount: number;
  readonly scope: ThreadScope;

  constructor(minCount: number, maxCount: number, scope: ThreadScope) {
    const result = expectationSchema.safeParse({ minCount, maxCount, scope });
    if (!result.success) {
      throw invalidExpectationError(
        result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      );
    }
    this.minCount = result.data.minCount;
    this.maxCount = result.data.maxCount;
    this.scope = result.data.scope;
  }

  matches(actualCount: number): boolean {
    return actualCount >= this.minCount && actualCount <= this.maxCount;
  }

  /** Null when `actualCount` is within range. */
  check(
    actualCount: number,
    statements: readonly string[],
    maxReportedStatements: number,
  ): VerificationError | null {
    if (this.matches(actualCount)) return null;
    return new VerificationError({
      scope: this.scope,
      minCount: this.minCount,
      maxCount: this.maxCount,
      actualCount,
      statements,
      maxReportedStatements,
    });
  }

  toString(): string {
    return `${describeRange(this.minCount, this.maxCount)} statement(s) ${describeScope(this.scope)}`;
  }
}
