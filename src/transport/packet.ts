/**
 * OSC packet encode/decode on top of osc.js.
 *
 * Inbound bundles are flattened: the client never looks at timetags, only at
 * the messages in arrival order.
 */

import * as osc from 'osc';
import { OscArgInput, OscMessage } from '../osc/types';
import { normalizeArgs, toValue } from '../osc/osc-args';

export function encodeMessage(address: string, args: readonly OscArgInput[] = []): Buffer {
  return Buffer.from(osc.writeMessage({ address, args: normalizeArgs(args) }));
}

function flatten(packet: osc.OSCMessage | osc.OSCBundle, out: OscMessage[]): void {
  if ('packets' in packet) {
    for (const inner of packet.packets) flatten(inner, out);
    return;
  }
  out.push({ address: packet.address, args: (packet.args ?? []).map(toValue) });
}

/** Decode one OSC packet (message or bundle). Throws on malformed input. */
export function decodePacket(data: Uint8Array): OscMessage[] {
  const out: OscMessage[] = [];
  flatten(osc.readPacket(data, { metadata: true }), out);
  return out;
}
