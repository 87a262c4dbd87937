/**
 * Error types raised by the Eos client.
 *
 * Every error carries a `code` for programmatic handling. None of them are
 * retried inside the client; the command layer decides what a failure means.
 */

export type EosErrorCode =
  | 'TIMEOUT'
  | 'PROTOCOL_MISMATCH'
  | 'INCOMPLETE_RECORD'
  | 'DECODE_FAILED'
  | 'TRANSPORT'
  | 'COMMAND_REJECTED';

/** Base class for all client errors */
export class EosError extends Error {
  readonly code: EosErrorCode;

  constructor(message: string, code: EosErrorCode) {
    super(message);
    this.name = 'EosError';
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** No reply satisfied the call before its deadline */
export class EosTimeoutError extends EosError {
  readonly address: string;
  readonly timeoutMs: number;

  constructor(address: string, timeoutMs: number, message = `No reply to ${address} within ${timeoutMs}ms`) {
    super(message, 'TIMEOUT');
    this.name = 'EosTimeoutError';
    this.address = address;
    this.timeoutMs = timeoutMs;
  }
}

/** A reply arrived but contradicts what was requested */
export class ProtocolMismatchError extends EosError {
  readonly expected: string;
  readonly received: string;

  constructor(message: string, expected: string, received: string) {
    super(message, 'PROTOCOL_MISMATCH');
    this.name = 'ProtocolMismatchError';
    this.expected = expected;
    this.received = received;
  }
}

/**
 * A counted multi-message reply ended with the wrong number of messages.
 * Usually the queried target does not exist on the console.
 */
export class IncompleteRecordError extends EosError {
  readonly received: number;
  readonly expected: number;

  constructor(what: string, received: number, expected: number) {
    super(`Incomplete reply for ${what}: received ${received} of ${expected} messages`, 'INCOMPLETE_RECORD');
    this.name = 'IncompleteRecordError';
    this.received = received;
    this.expected = expected;
  }
}

/** An argument list does not have the shape its record type needs */
export class DecodeError extends EosError {
  constructor(message: string) {
    super(message, 'DECODE_FAILED');
    this.name = 'DecodeError';
  }
}

export class TransportError extends EosError {
  constructor(message: string) {
    super(message, 'TRANSPORT');
    this.name = 'TransportError';
  }
}

/** The command layer refused to change an existing console object */
export class CommandRejectedError extends EosError {
  constructor(message: string) {
    super(message, 'COMMAND_REJECTED');
    this.name = 'CommandRejectedError';
  }
}

/**
 * The console never says "not found": a missing target shows up as no
 * reply, a short reply, or a reply too short to decode.
 */
export function isMissingTargetError(err: unknown): boolean {
  return err instanceof EosTimeoutError
    || err instanceof IncompleteRecordError
    || err instanceof DecodeError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
