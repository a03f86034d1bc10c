/**
 * OSC type tags a node slot can carry.
 *
 * `T` and `F` both declare a boolean slot; the tag reported in TYPE is the declared one.
 * `N` (nil) and `I` (impulse) carry no payload and hold `null`.
 */
export const OSC_TYPE_TAGS = ['i', 'f', 'd', 'h', 's', 'c', 'b', 'r', 'm', 'T', 'F', 'N', 'I'] as const;
export type OscTypeTag = (typeof OSC_TYPE_TAGS)[number];

export const NUMERIC_TYPE_TAGS: ReadonlySet<OscTypeTag> = new Set<OscTypeTag>(['i', 'f', 'd', 'h']);

export interface OscColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

/** port, status, data1, data2 */
export type OscMidi = readonly [number, number, number, number];

export type OscScalar = number | string | boolean | Uint8Array | OscColor | OscMidi | null;

export enum Access {
  NO_VALUE = 0,
  READ_ONLY = 1,
  WRITE_ONLY = 2,
  READ_WRITE = 3,
}

export const CLIP_MODES = ['none', 'low', 'high', 'both'] as const;
export type ClipMode = (typeof CLIP_MODES)[number];

export interface ValueRange {
  min?: number;
  max?: number;
  /** Allowed values; a write outside the list is snapped or rejected depending on clip mode. */
  vals?: number[];
}

/** Declaration of one value slot, as supplied by host code or a namespace file. */
export interface SlotSpec {
  type: OscTypeTag;
  value?: unknown;
  range?: ValueRange;
  clipMode?: ClipMode;
  unit?: string;
}

/** Attributes of a node at creation. */
export interface NodeAttributes {
  access: Access;
  slots?: SlotSpec[];
  description?: string;
}

/** Where an edit came from. Host code may write values network peers may only read. */
export type EditOrigin = 'host' | 'osc' | 'websocket';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };
