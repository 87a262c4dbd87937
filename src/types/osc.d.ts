declare module 'osc' {
  interface OSCArgument {
    type: string;
    value: unknown;
  }

  interface OSCMessage {
    address: string;
    args: OSCArgument[];
  }

  interface OSCBundle {
    timeTag: { raw: [number, number]; native: number };
    packets: Array<OSCMessage | OSCBundle>;
  }

  interface ReadOptions {
    metadata?: boolean;
  }

  /** Write an OSC message to a Buffer */
  function writeMessage(msg: OSCMessage): Uint8Array;

  /** Read an OSC message or bundle from a Buffer */
  function readPacket(data: Uint8Array, options?: ReadOptions, offset?: number, len?: number): OSCMessage | OSCBundle;

  export { OSCArgument, OSCMessage, OSCBundle, ReadOptions, writeMessage, readPacket };
}
