/**
 * Stream framing strategies for OSC over TCP.
 *
 * Eos accepts two framings on its TCP port:
 *   packet-length   OSC 1.0: each packet prefixed with its size as a
 *                   big-endian int32
 *   slip            OSC 1.1: SLIP (RFC 1055) with an END byte on both
 *                   sides of each packet
 *
 * Decoders are fed arbitrary socket chunks and keep partial frames between
 * calls.
 */

export type FramingMode = 'packet-length' | 'slip';

export interface FrameDecoder {
  /** Feed a chunk; returns every frame it completes */
  feed(chunk: Uint8Array): Buffer[];
  /** Drop any partial frame (after a reconnect) */
  reset(): void;
}

export interface FramingStrategy {
  readonly mode: FramingMode;
  encode(packet: Uint8Array): Buffer;
  createDecoder(): FrameDecoder;
}

// --- OSC 1.0 packet-length ---

class PacketLengthDecoder implements FrameDecoder {
  private pending: Buffer = Buffer.alloc(0);

  feed(chunk: Uint8Array): Buffer[] {
    this.pending = this.pending.length === 0
      ? Buffer.from(chunk)
      : Buffer.concat([this.pending, chunk]);

    const frames: Buffer[] = [];
    while (this.pending.length >= 4) {
      const size = this.pending.readInt32BE(0);
      if (size < 0) {
        // Corrupt length header; nothing after it can be trusted
        this.reset();
        break;
      }
      if (this.pending.length < 4 + size) break;
      frames.push(Buffer.from(this.pending.subarray(4, 4 + size)));
      this.pending = this.pending.subarray(4 + size);
    }
    return frames;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
  }
}

export const packetLengthFraming: FramingStrategy = {
  mode: 'packet-length',
  encode(packet: Uint8Array): Buffer {
    const out = Buffer.alloc(4 + packet.length);
    out.writeInt32BE(packet.length, 0);
    out.set(packet, 4);
    return out;
  },
  createDecoder(): FrameDecoder {
    return new PacketLengthDecoder();
  },
};

// --- OSC 1.1 SLIP ---

export const SLIP_END = 0xc0;
export const SLIP_ESC = 0xdb;
export const SLIP_ESC_END = 0xdc;
export const SLIP_ESC_ESC = 0xdd;

class SlipDecoder implements FrameDecoder {
  private bytes: number[] = [];
  private escaping = false;

  feed(chunk: Uint8Array): Buffer[] {
    const frames: Buffer[] = [];
    for (let i = 0; i < chunk.length; i++) {
      const byte = chunk[i];

      if (this.escaping) {
        this.escaping = false;
        if (byte === SLIP_ESC_END) {
          this.bytes.push(SLIP_END);
        } else if (byte === SLIP_ESC_ESC) {
          this.bytes.push(SLIP_ESC);
        } else {
          // Protocol violation, keep the byte as-is
          this.bytes.push(byte);
        }
        continue;
      }

      if (byte === SLIP_END) {
        // Double-END encoding produces empty frames between packets
        if (this.bytes.length > 0) {
          frames.push(Buffer.from(this.bytes));
          this.bytes = [];
        }
      } else if (byte === SLIP_ESC) {
        this.escaping = true;
      } else {
        this.bytes.push(byte);
      }
    }
    return frames;
  }

  reset(): void {
    this.bytes = [];
    this.escaping = false;
  }
}

export const slipFraming: FramingStrategy = {
  mode: 'slip',
  encode(packet: Uint8Array): Buffer {
    const out: number[] = [SLIP_END];
    for (const byte of packet) {
      if (byte === SLIP_END) {
        out.push(SLIP_ESC, SLIP_ESC_END);
      } else if (byte === SLIP_ESC) {
        out.push(SLIP_ESC, SLIP_ESC_ESC);
      } else {
        out.push(byte);
      }
    }
    out.push(SLIP_END);
    return Buffer.from(out);
  },
  createDecoder(): FrameDecoder {
    return new SlipDecoder();
  },
};

export function framingFor(mode: FramingMode): FramingStrategy {
  return mode === 'slip' ? slipFraming : packetLengthFraming;
}
