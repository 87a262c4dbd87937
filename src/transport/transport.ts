/**
 * MessageTransport: the only surface the Eos client talks to.
 *
 * Implementations carry OSC messages to and from the console; framing and
 * socket handling stay behind this interface.
 *
 * Transports extending EventEmitter emit:
 *   'connected'    transport is ready to send
 *   'disconnected' transport lost its connection
 *   'error' (err)  non-fatal transport error
 */

import { OscArgInput, OscMessage } from '../osc/types';

export interface MessageTransport {
  /** Human-readable endpoint, e.g. "tcp-slip 10.0.0.5:3032" */
  readonly description: string;

  /** Open the connection; resolves once messages can be sent */
  open(): Promise<void>;

  /** Close the connection and stop any reconnect attempts */
  close(): void;

  isConnected(): boolean;

  send(address: string, args?: readonly OscArgInput[]): void;

  /**
   * Wait up to `timeoutMs` for inbound messages. Resolves with everything
   * received so far as soon as there is anything, or [] on timeout.
   */
  receive(timeoutMs: number): Promise<OscMessage[]>;
}
