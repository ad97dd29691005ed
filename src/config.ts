/**
 * QuerySniffer Configuration — Zod-validated settings
 *
 * Defaults come from the environment; configure() overrides them at runtime.
 */

import { z } from 'zod';
import { invalidConfigError } from './errors.js';
import type { LoggerConfig } from './logger.js';
import { THREAD_SCOPES } from './types.js';
import type { SnifferConfig } from './types.js';

export const DEFAULT_MAX_REPORTED_STATEMENTS = 50;

export const snifferConfigSchema = z.object({
  logging: z.union([z.boolean(), z.literal('verbose')]).default(true),
  defaultScope: z.enum(THREAD_SCOPES).default('current'),
  maxReportedStatements: z.number().int().positive().default(DEFAULT_MAX_REPORTED_STATEMENTS),
}).strict();

export type ResolvedSnifferConfig = z.output<typeof snifferConfigSchema>;

const envSchema = z.object({
  SNIFFER_LOGGING: z.enum(['true', 'false', 'verbose']).optional(),
  SNIFFER_DEFAULT_SCOPE: z.enum(THREAD_SCOPES).optional(),
  SNIFFER_MAX_REPORTED_STATEMENTS: z.coerce.number().int().positive().optional(),
});

/**
 * Validate a configuration, filling in defaults.
 * Throws SnifferError with code INVALID_CONFIG on bad input.
 */
export function resolveConfig(config: SnifferConfig = {}): ResolvedSnifferConfig {
  const result = snifferConfigSchema.safeParse(config);
  if (!result.success) {
    throw invalidConfigError(formatIssues(result.error), 'config');
  }
  return result.data;
}

/** Apply `overrides` over `base`. Keys set to undefined keep the base value. */
export function mergeConfig(base: ResolvedSnifferConfig, overrides: SnifferConfig): ResolvedSnifferConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const result = snifferConfigSchema.safeParse({ ...base, ...defined });
  if (!result.success) {
    throw invalidConfigError(formatIssues(result.error), 'config');
  }
  return result.data;
}

/**
 * Read SNIFFER_* variables. Unset variables are left out so resolveConfig()
 * falls back to its defaults.
 */
export function configFromEnv(env: Record<string, string | undefined>): SnifferConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw invalidConfigError(formatIssues(result.error), 'environment');
  }

  const config: SnifferConfig = {};
  const { SNIFFER_LOGGING, SNIFFER_DEFAULT_SCOPE, SNIFFER_MAX_REPORTED_STATEMENTS } = result.data;
  if (SNIFFER_LOGGING !== undefined) {
    config.logging = SNIFFER_LOGGING === 'verbose' ? 'verbose' : SNIFFER_LOGGING === 'true';
  }
  if (SNIFFER_DEFAULT_SCOPE !== undefined) config.defaultScope = SNIFFER_DEFAULT_SCOPE;
  if (SNIFFER_MAX_REPORTED_STATEMENTS !== undefined) {
    config.maxReportedStatements = SNIFFER_MAX_REPORTED_STATEMENTS;
  }
  return config;
}

export function toLoggerConfig(config: ResolvedSnifferConfig): LoggerConfig {
  return {
    enabled: config.logging !== false,
    verbose: config.logging === 'verbose',
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
