/**
 * OSC message model shared by the router, the transports and the
 * Eos client.
 */

/** Plain value of a decoded OSC argument */
export type OscValue = number | string | boolean | null | Uint8Array;

/** Typed OSC argument, as written on the wire */
export interface OscArg {
  type: string;  // 'i', 'f', 's', 'T', 'F', 'N', 'b'
  value: OscValue;
}

/** Outbound arguments may be typed or left for the transport to type */
export type OscArgInput = OscArg | number | string | boolean;

/** Decoded inbound message: address plus plain argument values */
export interface OscMessage {
  readonly address: string;
  readonly args: readonly OscValue[];
}

/** Request to send: address plus outbound arguments */
export interface OutboundMessage {
  address: string;
  args?: OscArgInput[];
}
