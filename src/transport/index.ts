export type { MessageTransport } from './transport';
export { TcpTransport } from './tcp-transport';
export type { TcpTransportOptions } from './tcp-transport';
export { UdpTransport } from './udp-transport';
export type { UdpTransportOptions } from './udp-transport';
export { framingFor, packetLengthFraming, slipFraming } from './framing';
export type { FramingMode, FramingStrategy, FrameDecoder } from './framing';
export { Inbox } from './inbox';
export { RingBuffer } from './ring-buffer';
export { encodeMessage, decodePacket } from './packet';

import { ConsoleConfig } from '../config';
import { framingFor } from './framing';
import { MessageTransport } from './transport';
import { TcpTransport } from './tcp-transport';
import { UdpTransport } from './udp-transport';

/** Pick the transport for the configured connection kind */
export function createTransport(config: ConsoleConfig): MessageTransport {
  switch (config.transport) {
    case 'udp':
      return new UdpTransport({
        host: config.host,
        port: config.port,
        localPort: config.localPort,
      });
    case 'tcp-slip':
    case 'tcp-packet-length':
      return new TcpTransport({
        host: config.host,
        port: config.port,
        framing: framingFor(config.transport === 'tcp-slip' ? 'slip' : 'packet-length'),
        reconnectDelayMs: config.reconnectDelayMs,
      });
  }
}
