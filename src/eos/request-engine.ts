/**
 * Request/Response Engine
 *
 * Turns the one-way OSC bus into awaitable calls. A call:
 *   1. registers a transient handler on the exchange's reply pattern
 *   2. sends the request
 *   3. pumps the transport until the exchange is complete, an accept step
 *      throws, or the deadline passes. Every received message goes through
 *      the router, so push notifications keep flowing during the call
 *   4. unregisters the handler on every path
 *
 * Per-call state lives in an explicit accumulator owned by one PendingCall.
 * Calls are serialized: the router is shared, so only one exchange may be
 * waiting for replies at a time.
 */

import { AddressRouter } from '../osc/address-router';
import { OscMessage, OutboundMessage } from '../osc/types';
import { MessageTransport } from '../transport/transport';
import { EosTimeoutError } from '../errors';
import { getLogger } from '../logger';

const log = getLogger('Engine');

/**
 * One request and the rule for collecting its reply.
 * `S` is the accumulator threaded through accept(); `R` the call result.
 */
export interface Exchange<S, R> {
  /** What is being asked, for errors and logs, e.g. "version" */
  readonly label: string;
  readonly request: OutboundMessage;
  readonly replyPattern: string;
  /** Fresh accumulator for one call */
  initial(): S;
  /** Fold one reply into the accumulator. Throwing fails the call at once. */
  accept(state: S, message: OscMessage): S;
  isComplete(state: S): boolean;
  finish(state: S): R;
  /** Error for a call whose deadline passed; defaults to EosTimeoutError */
  onDeadline?(state: S, timeoutMs: number): Error;
}

export interface RequestEngineOptions {
  /** Default deadline for a call */
  timeoutMs: number;
  /** Longest single wait on the transport */
  pollIntervalMs: number;
}

export const DEFAULT_ENGINE_OPTIONS: RequestEngineOptions = {
  timeoutMs: 1500,
  pollIntervalMs: 100,
};

class PendingCall<S, R> {
  state: S;
  failure: Error | null = null;
  complete = false;
  private readonly exchange: Exchange<S, R>;

  constructor(exchange: Exchange<S, R>) {
    this.exchange = exchange;
    this.state = exchange.initial();
  }

  get settled(): boolean {
    return this.complete || this.failure !== null;
  }

  accept(message: OscMessage): void {
    if (this.settled) return;
    try {
      this.state = this.exchange.accept(this.state, message);
      this.complete = this.exchange.isComplete(this.state);
    } catch (err) {
      this.failure = err instanceof Error ? err : new Error(String(err));
    }
  }
}

export class RequestEngine {
  private transport: MessageTransport;
  private router: AddressRouter;
  private options: RequestEngineOptions;
  private tail: Promise<unknown> = Promise.resolve();
  private inFlight = 0;

  constructor(transport: MessageTransport, router: AddressRouter, options: Partial<RequestEngineOptions> = {}) {
    this.transport = transport;
    this.router = router;
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
  }

  get timeoutMs(): number {
    return this.options.timeoutMs;
  }

  /** Calls queued or running */
  get pending(): number {
    return this.inFlight;
  }

  /**
   * Send the exchange's request and wait for its reply.
   * Rejects with the exchange's failure, its deadline error, or
   * EosTimeoutError.
   */
  call<S, R>(exchange: Exchange<S, R>, timeoutMs = this.options.timeoutMs): Promise<R> {
    return this.exclusive(() => this.run(exchange, timeoutMs));
  }

  /**
   * Dispatch whatever arrives during `durationMs` (push notifications while
   * no call is running). Resolves with the number of messages dispatched.
   */
  pump(durationMs: number): Promise<number> {
    return this.exclusive(async () => {
      const deadline = Date.now() + durationMs;
      let dispatched = 0;
      for (;;) {
        const remaining = deadline - Date.now();
        if (remaining <= 0) break;
        const batch = await this.transport.receive(Math.min(remaining, this.options.pollIntervalMs));
        for (const message of batch) {
          this.router.dispatch(message);
          dispatched++;
        }
      }
      return dispatched;
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    this.inFlight++;
    const result = this.tail.then(task);
    // Keep the chain alive whether or not this task fails
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result.finally(() => {
      this.inFlight--;
    });
  }

  private async run<S, R>(exchange: Exchange<S, R>, timeoutMs: number): Promise<R> {
    const call = new PendingCall(exchange);
    let registered = true;
    const token = this.router.register(exchange.replyPattern, (message) => call.accept(message));
    const release = (): void => {
      if (!registered) return;
      registered = false;
      this.router.unregister(token);
    };

    try {
      const { address, args } = exchange.request;
      this.transport.send(address, args ?? []);
      log.debug({ address, reply: exchange.replyPattern }, `Request ${exchange.label}`);

      const deadline = Date.now() + timeoutMs;
      while (!call.settled) {
        const remaining = deadline - Date.now();
        if (remaining <= 0) break;

        const batch = await this.transport.receive(Math.min(remaining, this.options.pollIntervalMs));
        for (const message of batch) {
          this.router.dispatch(message);
          // The rest of the batch still reaches standing handlers
          if (call.settled) release();
        }
      }

      if (call.failure) throw call.failure;
      if (!call.complete) {
        throw exchange.onDeadline?.(call.state, timeoutMs)
          ?? new EosTimeoutError(address, timeoutMs, `No reply for ${exchange.label} within ${timeoutMs}ms`);
      }
      return exchange.finish(call.state);
    } finally {
      release();
    }
  }
}
