/**
 * Composite Record Assembler
 *
 * Some queries are answered with a fixed number of separately addressed
 * messages (a cue comes back as base fields + fx + links + actions). The
 * assembler counts the messages a query routes into its draft and only
 * builds the record once exactly `expectedCount` have arrived.
 *
 * The console never replies "not found". A missing target looks like
 * silence (EosTimeoutError) or a partial answer (IncompleteRecordError),
 * and existence checks have to read it that way.
 */

import { OscMessage, OutboundMessage } from '../osc/types';
import { EosTimeoutError, IncompleteRecordError } from '../errors';
import { Exchange, RequestEngine } from './request-engine';

export interface CompositeQuery<D, R> {
  readonly label: string;
  readonly request: OutboundMessage;
  /** Wildcard pattern covering every part of the reply */
  readonly replyPattern: string;
  readonly expectedCount: number;
  /** Empty draft for one call */
  draft(): D;
  /**
   * Merge one reply into the draft. Returns null when the address is not a
   * part of this record; such messages are not counted.
   */
  route(draft: D, message: OscMessage): D | null;
  build(draft: D): R;
}

export interface Assembly<D> {
  draft: D;
  received: number;
}

/** Express a composite query as a counted exchange */
export function toExchange<D, R>(query: CompositeQuery<D, R>): Exchange<Assembly<D>, R> {
  return {
    label: query.label,
    request: query.request,
    replyPattern: query.replyPattern,
    initial: () => ({ draft: query.draft(), received: 0 }),
    accept(state, message) {
      const draft = query.route(state.draft, message);
      if (draft === null) return state;
      return { draft, received: state.received + 1 };
    },
    isComplete: (state) => state.received === query.expectedCount,
    finish: (state) => query.build(state.draft),
    onDeadline(state, timeoutMs) {
      if (state.received === 0) {
        return new EosTimeoutError(
          query.request.address,
          timeoutMs,
          `No reply for ${query.label} within ${timeoutMs}ms`,
        );
      }
      return new IncompleteRecordError(query.label, state.received, query.expectedCount);
    },
  };
}

export class RecordAssembler {
  private engine: RequestEngine;

  constructor(engine: RequestEngine) {
    this.engine = engine;
  }

  assemble<D, R>(query: CompositeQuery<D, R>, timeoutMs?: number): Promise<R> {
    return this.engine.call(toExchange(query), timeoutMs);
  }
}
