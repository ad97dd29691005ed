/**
 * QuerySniffer Event System — Typed event emitter
 *
 * Statement, spy lifecycle and failure events flow through this. Only the
 * event names in SnifferEvents are accepted, each with its payload type.
 */

import { EventEmitter } from 'events';
import type { SnifferEvents } from './types.js';

export class SnifferEventEmitter extends EventEmitter {
  on<E extends keyof SnifferEvents>(
    event: E,
    listener: (payload: SnifferEvents[E]) => void,
  ): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  once<E extends keyof SnifferEvents>(
    event: E,
    listener: (payload: SnifferEvents[E]) => void,
  ): this {
    return super.once(event, listener as (...args: unknown[]) => void);
  }

  emit<E extends keyof SnifferEvents>(
    event: E,
    payload: SnifferEvents[E],
  ): boolean {
    return super.emit(event, payload);
  }

  off<E extends keyof SnifferEvents>(
    event: E,
    listener: (payload: SnifferEvents[E]) => void,
  ): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }

  /** Lets the logger pick a fallback when nobody listens for an event. */
  listenerCount<E extends keyof SnifferEvents>(event: E): number {
    return super.listenerCount(event);
  }
}
