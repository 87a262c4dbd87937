/**
 * Address Router
 *
 * Table of address pattern → handler registrations. A pattern is either an
 * exact address or a prefix ending in `*`. Dispatch calls every matching
 * handler in registration order, or the default handler when nothing
 * matches.
 *
 * Handlers may register and unregister during dispatch: iteration runs over
 * a snapshot, and registrations removed mid-dispatch are skipped.
 */

import { OscMessage } from './types';
import { getLogger } from '../logger';

const log = getLogger('Router');

export type MessageHandler = (message: OscMessage) => void;

export type HandlerToken = number;

export type HandlerErrorCallback = (err: unknown, message: OscMessage, pattern: string) => void;

interface Registration {
  readonly token: HandlerToken;
  readonly pattern: string;
  readonly handler: MessageHandler;
  active: boolean;
}

/** True if `address` matches `pattern` (exact, or prefix when it ends in `*`) */
export function matchesPattern(pattern: string, address: string): boolean {
  if (pattern.endsWith('*')) {
    return address.startsWith(pattern.slice(0, -1));
  }
  return pattern === address;
}

export class AddressRouter {
  private registrations: Registration[] = [];
  private nextToken: HandlerToken = 1;
  private defaultHandler: MessageHandler | null = null;
  private onHandlerError: HandlerErrorCallback;

  constructor(onHandlerError?: HandlerErrorCallback) {
    this.onHandlerError = onHandlerError ?? ((err, message, pattern) => {
      log.error({ err, address: message.address, pattern }, 'Handler failed');
    });
  }

  register(pattern: string, handler: MessageHandler): HandlerToken {
    const token = this.nextToken++;
    this.registrations.push({ token, pattern, handler, active: true });
    return token;
  }

  /** Remove a registration. Returns false if the token is unknown or already removed. */
  unregister(token: HandlerToken): boolean {
    const idx = this.registrations.findIndex((r) => r.token === token);
    if (idx === -1) return false;
    this.registrations[idx].active = false;
    this.registrations.splice(idx, 1);
    return true;
  }

  setDefaultHandler(handler: MessageHandler | null): void {
    this.defaultHandler = handler;
  }

  /**
   * Deliver a message to every matching handler.
   * Returns the number of registered handlers invoked (0 means the default
   * handler, if any, received it).
   */
  dispatch(message: OscMessage): number {
    const matched = this.registrations.filter((r) => matchesPattern(r.pattern, message.address));

    if (matched.length === 0) {
      if (this.defaultHandler) {
        this.invoke(this.defaultHandler, message, '');
      }
      return 0;
    }

    let invoked = 0;
    for (const reg of matched) {
      if (!reg.active) continue;
      this.invoke(reg.handler, message, reg.pattern);
      invoked++;
    }
    return invoked;
  }

  /** Whether the token refers to a live registration */
  has(token: HandlerToken): boolean {
    return this.registrations.some((r) => r.token === token);
  }

  /** Patterns currently registered, in dispatch order */
  patterns(): string[] {
    return this.registrations.map((r) => r.pattern);
  }

  /** Number of live registrations */
  get size(): number {
    return this.registrations.length;
  }

  private invoke(handler: MessageHandler, message: OscMessage, pattern: string): void {
    try {
      handler(message);
    } catch (err) {
      this.onHandlerError(err, message, pattern);
    }
  }
}
