/**
 * QuerySniffer Interceptors — Count statements sent through a driver client
 *
 * sniff() proxies any client object (a pg Pool or Client, a mysql2
 * connection, a better-sqlite3 Database...) and records one statement per
 * call to the listed methods before delegating. Every method runs against the
 * client itself. Results, promises and exceptions pass through unchanged.
 */

import * as counters from './counters.js';
import type { SniffOptions, StatementExtractor } from './types.js';

const DEFAULT_METHODS: readonly string[] = ['query', 'execute'];

/**
 * Best-effort statement text: a string argument as is, the `text` (pg) or
 * `sql` (mysql2) property of a query object, or String() of the argument.
 */
export const extractStatement: StatementExtractor = (args) => {
  const first = args[0];
  if (typeof first === 'string') return first;

  if (typeof first === 'object' && first !== null) {
    const text: unknown = Reflect.get(first, 'text');
    if (typeof text === 'string') return text;
    const sql: unknown = Reflect.get(first, 'sql');
    if (typeof sql === 'string') return sql;
  }

  return String(first);
};

export function sniff<T extends object>(client: T, options: SniffOptions = {}): T {
  const methods = new Set(options.methods ?? DEFAULT_METHODS);
  const extract = options.extractStatement ?? extractStatement;

  return new Proxy(client, {
    get(target, property) {
      // Read and call through the unproxied client: drivers keep state in
      // private fields, which reject the proxy as `this`.
      const value: unknown = Reflect.get(target, property);
      if (typeof value !== 'function') return value;

      if (typeof property !== 'string' || !methods.has(property)) {
        return (...args: unknown[]): unknown => Reflect.apply(value, target, args);
      }

      return (...args: unknown[]): unknown => {
        counters.record(extract(args));
        return Reflect.apply(value, target, args);
      };
    },
  });
}

/** Wrap a standalone executor such as `(sql, params) => Promise<rows>`. */
export function sniffFunction<A extends unknown[], R>(
  executor: (...args: A) => R,
  extract: StatementExtractor = extractStatement,
): (...args: A) => R {
  return (...args: A): R => {
    counters.record(extract(args));
    return executor(...args);
  };
}
