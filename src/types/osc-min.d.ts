// osc-min publishes no type definitions; this covers the part of its API used here.
declare module 'osc-min' {
  /** Argument with an explicit OSC type: integer, float, double, bigint, string, blob, true, false, null, bang. */
  export interface OscArgument {
    type: string;
    value?: unknown;
  }

  export interface OscMessage {
    oscType?: 'message';
    address: string;
    args?: unknown[];
  }

  export interface OscBundle {
    oscType: 'bundle';
    timetag?: unknown;
    elements: OscPacket[];
  }

  export type OscPacket = OscMessage | OscBundle;

  export function fromBuffer(buffer: Buffer, strict?: boolean): OscPacket;
  export function toBuffer(packet: OscPacket, strict?: boolean): Buffer;
}
