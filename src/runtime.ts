/**
 * QuerySniffer Runtime — Process-wide configuration, emitter and logger
 */

import { configFromEnv, mergeConfig, resolveConfig, toLoggerConfig } from './config.js';
import type { ResolvedSnifferConfig } from './config.js';
import { SnifferEventEmitter } from './events.js';
import { SnifferLogger } from './logger.js';
import type { SnifferConfig } from './types.js';

let config: ResolvedSnifferConfig = resolveConfig(configFromEnv(process.env));

export const snifferEvents = new SnifferEventEmitter();
export const logger = new SnifferLogger(toLoggerConfig(config), snifferEvents);

export function getConfig(): ResolvedSnifferConfig {
  return config;
}

/** Merge `overrides` over the current configuration. Undefined keys keep their value. */
export function configure(overrides: SnifferConfig): ResolvedSnifferConfig {
  config = mergeConfig(config, overrides);
  logger.configure(toLoggerConfig(config));
  return config;
}

/** Back to the environment-derived configuration. */
export function resetConfig(): ResolvedSnifferConfig {
  config = resolveConfig(configFromEnv(process.env));
  logger.configure(toLoggerConfig(config));
  return config;
}
