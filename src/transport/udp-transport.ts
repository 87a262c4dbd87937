/**
 * OSC over UDP.
 *
 * Eos listens on one UDP port and sends to another, so the socket binds a
 * local port for replies and sends each message as one datagram to the
 * console's port.
 */

import { EventEmitter } from 'events';
import * as dgram from 'dgram';
import { OscArgInput, OscMessage } from '../osc/types';
import { getLogger } from '../logger';
import { TransportError, errorMessage } from '../errors';
import { Inbox } from './inbox';
import { decodePacket, encodeMessage } from './packet';
import { MessageTransport } from './transport';

const log = getLogger('UDP');

export interface UdpTransportOptions {
  host: string;
  /** Console's receive port */
  port: number;
  /** Local port the console sends to (0 = any) */
  localPort: number;
  localAddress?: string;
}

export class UdpTransport extends EventEmitter implements MessageTransport {
  readonly description: string;

  private host: string;
  private port: number;
  private localPort: number;
  private localAddress: string;
  private socket: dgram.Socket | null = null;
  private connected = false;
  private inbox = new Inbox();

  constructor(options: UdpTransportOptions) {
    super();
    this.host = options.host;
    this.port = options.port;
    this.localPort = options.localPort;
    this.localAddress = options.localAddress ?? '0.0.0.0';
    this.description = `udp ${options.host}:${options.port} (rx ${options.localPort})`;
  }

  open(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket('udp4');
      this.socket = socket;

      const onBindError = (err: Error): void => {
        this.close();
        reject(new TransportError(`Unable to bind UDP port ${this.localPort}: ${err.message}`));
      };
      socket.once('error', onBindError);

      socket.on('listening', () => {
        socket.off('error', onBindError);
        socket.on('error', (err: Error) => {
          log.error({ err: err.message }, 'Socket error');
          if (this.listenerCount('error') > 0) this.emit('error', err);
        });
        this.connected = true;
        log.info({ endpoint: this.description, boundPort: socket.address().port }, 'Socket bound');
        this.emit('connected');
        resolve();
      });

      socket.on('message', (msg: Buffer) => {
        try {
          for (const message of decodePacket(msg)) {
            this.inbox.push(message);
          }
        } catch (err) {
          log.warn({ err: errorMessage(err), bytes: msg.length }, 'Dropped undecodable datagram');
        }
      });

      socket.bind(this.localPort, this.localAddress);
    });
  }

  close(): void {
    if (this.socket) {
      this.socket.removeAllListeners();
      try {
        this.socket.close();
      } catch (err) {
        // A socket that failed to bind is already closed
        log.debug({ err: errorMessage(err) }, 'Socket close skipped');
      }
      this.socket = null;
    }
    if (this.connected) {
      this.connected = false;
      this.emit('disconnected');
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  /** Local port the socket is bound to, or null before open */
  get boundPort(): number | null {
    return this.socket && this.connected ? this.socket.address().port : null;
  }

  send(address: string, args: readonly OscArgInput[] = []): void {
    if (!this.socket || !this.connected) {
      throw new TransportError(`Cannot send ${address}: UDP socket is not open`);
    }
    const buf = encodeMessage(address, args);
    this.socket.send(buf, 0, buf.length, this.port, this.host, (err) => {
      if (err) {
        log.error({ err: err.message, address }, 'Send error');
      }
    });
  }

  receive(timeoutMs: number): Promise<OscMessage[]> {
    return this.inbox.take(timeoutMs);
  }
}
