/**
 * OSC over TCP, with a configurable framing strategy.
 *
 * Reconnects after the socket closes. Messages sent while disconnected are
 * buffered and replayed in order once the socket is back.
 */

import { EventEmitter } from 'events';
import * as net from 'net';
import { OscArgInput, OscMessage } from '../osc/types';
import { getLogger } from '../logger';
import { TransportError, errorMessage } from '../errors';
import { FrameDecoder, FramingStrategy } from './framing';
import { Inbox } from './inbox';
import { decodePacket, encodeMessage } from './packet';
import { MessageTransport } from './transport';
import { RingBuffer } from './ring-buffer';

const log = getLogger('TCP');

export interface TcpTransportOptions {
  host: string;
  port: number;
  framing: FramingStrategy;
  reconnectDelayMs?: number;
  /** Outbound messages kept while disconnected */
  sendBufferSize?: number;
}

interface PendingSend {
  address: string;
  args: readonly OscArgInput[];
}

export class TcpTransport extends EventEmitter implements MessageTransport {
  readonly description: string;

  private host: string;
  private port: number;
  private framing: FramingStrategy;
  private decoder: FrameDecoder;
  private reconnectDelayMs: number;
  private socket: net.Socket | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private connected = false;
  private closing = false;
  private inbox = new Inbox();
  private sendBuffer: RingBuffer<PendingSend>;

  constructor(options: TcpTransportOptions) {
    super();
    this.host = options.host;
    this.port = options.port;
    this.framing = options.framing;
    this.decoder = options.framing.createDecoder();
    this.reconnectDelayMs = options.reconnectDelayMs ?? 3000;
    this.sendBuffer = new RingBuffer<PendingSend>(options.sendBufferSize ?? 64);
    this.description = `tcp-${options.framing.mode} ${options.host}:${options.port}`;
  }

  open(): Promise<void> {
    this.closing = false;
    return new Promise((resolve, reject) => {
      const onConnected = (): void => {
        this.off('error', onError);
        resolve();
      };
      const onError = (err: Error): void => {
        this.off('connected', onConnected);
        this.close();
        reject(new TransportError(`Unable to connect to ${this.host}:${this.port}: ${err.message}`));
      };
      this.once('connected', onConnected);
      this.once('error', onError);
      this.connectSocket();
    });
  }

  close(): void {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.socket) {
      this.socket.removeAllListeners();
      this.socket.destroy();
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

  send(address: string, args: readonly OscArgInput[] = []): void {
    if (!this.socket || !this.connected) {
      const evicted = this.sendBuffer.push({ address, args });
      if (evicted) {
        log.warn({ dropped: evicted.address }, 'Send queue full, dropped oldest message');
      }
      log.debug({ address, queueSize: this.sendBuffer.size }, 'Not connected, queued message');
      return;
    }
    this.socket.write(this.framing.encode(encodeMessage(address, args)));
    log.trace({ address }, 'Sent');
  }

  receive(timeoutMs: number): Promise<OscMessage[]> {
    return this.inbox.take(timeoutMs);
  }

  private connectSocket(): void {
    if (this.socket) {
      // Detach the old socket so its async 'close' doesn't touch the new one
      this.socket.removeAllListeners();
      this.socket.destroy();
      this.socket = null;
    }

    const sock = new net.Socket();
    this.socket = sock;
    this.decoder.reset();

    sock.on('connect', () => {
      if (this.socket !== sock) return;
      sock.setNoDelay(true);
      this.connected = true;
      log.info({ endpoint: this.description }, 'Connected');
      this.emit('connected');
      this.flushSendBuffer();
    });

    sock.on('data', (data: Buffer) => {
      if (this.socket !== sock) return;
      this.handleData(data);
    });

    sock.on('error', (err: Error) => {
      if (this.socket !== sock) return;
      log.error({ err: err.message }, 'Connection error');
      // Unlistened 'error' events throw; reconnect handles recovery
      if (this.listenerCount('error') > 0) this.emit('error', err);
    });

    sock.on('close', () => {
      if (this.socket !== sock) return;
      const wasConnected = this.connected;
      this.connected = false;
      if (wasConnected) {
        log.info({ endpoint: this.description }, 'Disconnected');
        this.emit('disconnected');
      }
      this.scheduleReconnect();
    });

    sock.connect(this.port, this.host);
  }

  private handleData(data: Buffer): void {
    for (const frame of this.decoder.feed(data)) {
      try {
        for (const message of decodePacket(frame)) {
          this.inbox.push(message);
        }
      } catch (err) {
        log.warn({ err: errorMessage(err), bytes: frame.length }, 'Dropped undecodable packet');
      }
    }
  }

  private flushSendBuffer(): void {
    const queued = this.sendBuffer.drain();
    if (queued.length === 0) return;
    log.info({ count: queued.length }, 'Replaying queued messages');
    for (const item of queued) {
      this.send(item.address, item.args);
    }
  }

  private scheduleReconnect(): void {
    if (this.closing || this.reconnectTimer) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      log.info({ endpoint: this.description }, 'Attempting reconnect');
      this.connectSocket();
    }, this.reconnectDelayMs);
    this.reconnectTimer.unref();
  }
}
