import {
  CLIP_MODES,
  NUMERIC_TYPE_TAGS,
  OSC_TYPE_TAGS,
  type ClipMode,
  type JsonValue,
  type OscColor,
  type OscMidi,
  type OscScalar,
  type OscTypeTag,
  type SlotSpec,
  type ValueRange,
} from './types.js';
import { TypeMismatchError, ValidationError } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const COLOR_PATTERN = /^#?([0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

/** One typed value position of a node. */
export interface ValueSlot {
  readonly type: OscTypeTag;
  value: OscScalar;
  readonly range?: ValueRange;
  readonly clipMode: ClipMode;
  readonly unit?: string;
}

export function isOscTypeTag(tag: unknown): tag is OscTypeTag {
  return OSC_TYPE_TAGS.some((known) => known === tag);
}

export function isNumericTag(tag: OscTypeTag): boolean {
  return NUMERIC_TYPE_TAGS.has(tag);
}

function isByte(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 255;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseColor(raw: unknown): OscColor | undefined {
  if (typeof raw === 'string') {
    const match = COLOR_PATTERN.exec(raw);
    if (!match) return undefined;
    const hex = match[1].length === 6 ? `${match[1]}ff` : match[1];
    return {
      r: parseInt(hex.slice(0, 2), 16),
      g: parseInt(hex.slice(2, 4), 16),
      b: parseInt(hex.slice(4, 6), 16),
      a: parseInt(hex.slice(6, 8), 16),
    };
  }
  if (isRecord(raw) && isByte(raw.r) && isByte(raw.g) && isByte(raw.b) && isByte(raw.a)) {
    return { r: raw.r, g: raw.g, b: raw.b, a: raw.a };
  }
  return undefined;
}

function parseMidi(raw: unknown): OscMidi | undefined {
  if (!Array.isArray(raw) && !(raw instanceof Uint8Array)) return undefined;
  const bytes: unknown[] = Array.from(raw);
  if (bytes.length !== 4) return undefined;
  const [port, status, data1, data2] = bytes;
  if (isByte(port) && isByte(status) && isByte(data1) && isByte(data2)) {
    return [port, status, data1, data2];
  }
  return undefined;
}

function toSafeInteger(raw: unknown): number | undefined {
  if (typeof raw === 'bigint') {
    return raw >= BigInt(Number.MIN_SAFE_INTEGER) && raw <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(raw)
      : undefined;
  }
  return typeof raw === 'number' && Number.isSafeInteger(raw) ? raw : undefined;
}

/** 64-bit OSC integers are stored as numbers, so `h` slots hold safe integers only. */
function isUnsafeInteger(raw: unknown): boolean {
  if (typeof raw === 'bigint') return toSafeInteger(raw) === undefined;
  return typeof raw === 'number' && Number.isInteger(raw) && !Number.isSafeInteger(raw);
}

/**
 * Convert an incoming argument to the runtime shape of `tag`.
 * Returns undefined when the argument cannot represent that tag.
 */
export function coerceScalar(tag: OscTypeTag, raw: unknown): OscScalar | undefined {
  switch (tag) {
    case 'i': {
      const n = toSafeInteger(raw);
      return n !== undefined && n >= INT32_MIN && n <= INT32_MAX ? n : undefined;
    }
    case 'h':
      return toSafeInteger(raw);
    case 'f':
    case 'd':
      return typeof raw === 'number' && Number.isFinite(raw) ? raw : undefined;
    case 's':
      return typeof raw === 'string' ? raw : undefined;
    case 'c':
      return typeof raw === 'string' && Array.from(raw).length === 1 ? raw : undefined;
    case 'T':
    case 'F':
      return typeof raw === 'boolean' ? raw : undefined;
    case 'b':
      if (raw instanceof Uint8Array) return new Uint8Array(raw);
      if (typeof raw === 'string' && BASE64_PATTERN.test(raw)) {
        return new Uint8Array(Buffer.from(raw, 'base64'));
      }
      return undefined;
    case 'r':
      return parseColor(raw);
    case 'm':
      return parseMidi(raw);
    case 'N':
    case 'I':
      return raw === null || raw === undefined ? null : undefined;
  }
}

/**
 * Apply a slot's range and clip mode to a numeric value.
 * Low/high clamping only happens on the sides the clip mode names; `none` rejects.
 */
export function clipValue(value: number, range: ValueRange | undefined, clipMode: ClipMode): Result<number, string> {
  if (!range) return ok(value);

  if (range.vals && range.vals.length > 0) {
    if (range.vals.includes(value)) return ok(value);
    if (clipMode === 'none') return err(`${value} is not one of ${range.vals.join(', ')}`);
    let nearest = range.vals[0];
    for (const candidate of range.vals) {
      if (Math.abs(candidate - value) < Math.abs(nearest - value)) nearest = candidate;
    }
    return ok(nearest);
  }

  if (range.min !== undefined && value < range.min) {
    if (clipMode === 'low' || clipMode === 'both') return ok(range.min);
    if (clipMode === 'none') return err(`${value} is below minimum ${range.min}`);
  }
  if (range.max !== undefined && value > range.max) {
    if (clipMode === 'high' || clipMode === 'both') return ok(range.max);
    if (clipMode === 'none') return err(`${value} is above maximum ${range.max}`);
  }
  return ok(value);
}

/** Validate one incoming value against a slot and return what should be stored. */
export function conformValue(
  slot: Pick<ValueSlot, 'type' | 'range' | 'clipMode'>,
  raw: unknown,
  path: string,
  index: number
): Result<OscScalar> {
  const coerced = coerceScalar(slot.type, raw);
  if (coerced === undefined) {
    if (slot.type === 'h' && isUnsafeInteger(raw)) {
      return err(
        new ValidationError(`Argument ${index} of ${path} exceeds the 53-bit integer range stored for type 'h'`, path)
      );
    }
    return err(new TypeMismatchError(`Argument ${index} of ${path} does not match type '${slot.type}'`, path));
  }
  if (typeof coerced !== 'number' || !isNumericTag(slot.type)) return ok(coerced);

  const clipped = clipValue(coerced, slot.range, slot.clipMode);
  if (!clipped.ok) {
    return err(new ValidationError(`Argument ${index} of ${path}: ${clipped.error}`, path));
  }
  return ok(clipped.value);
}

export function defaultScalar(tag: OscTypeTag, range?: ValueRange): OscScalar {
  switch (tag) {
    case 'i':
    case 'h':
    case 'f':
    case 'd': {
      if (range?.vals && range.vals.length > 0) return range.vals[0];
      let value = 0;
      if (range?.min !== undefined && value < range.min) value = range.min;
      if (range?.max !== undefined && value > range.max) value = range.max;
      return value;
    }
    case 's':
      return '';
    case 'c':
      return ' ';
    case 'T':
      return true;
    case 'F':
      return false;
    case 'b':
      return new Uint8Array(0);
    case 'r':
      return { r: 0, g: 0, b: 0, a: 255 };
    case 'm':
      return [0, 0, 0, 0];
    case 'N':
    case 'I':
      return null;
  }
}

function validateRange(declared: SlotSpec, path: string, index: number): Result<ValueRange | undefined> {
  const { range } = declared;
  if (!range) return ok(undefined);
  if (!isNumericTag(declared.type)) {
    return err(new ValidationError(`Slot ${index} of ${path} has type '${declared.type}' and cannot carry a range`, path));
  }
  const bounds = [range.min, range.max, ...(range.vals ?? [])].filter((b): b is number => b !== undefined);
  if (bounds.some((b) => !Number.isFinite(b))) {
    return err(new ValidationError(`Slot ${index} of ${path} has a non-finite range bound`, path));
  }
  if ((declared.type === 'i' || declared.type === 'h') && bounds.some((b) => !Number.isInteger(b))) {
    return err(new ValidationError(`Slot ${index} of ${path} is an integer slot with fractional range bounds`, path));
  }
  if (range.min !== undefined && range.max !== undefined && range.min > range.max) {
    return err(new ValidationError(`Slot ${index} of ${path} has min ${range.min} above max ${range.max}`, path));
  }
  return ok({
    ...(range.min !== undefined ? { min: range.min } : {}),
    ...(range.max !== undefined ? { max: range.max } : {}),
    ...(range.vals !== undefined ? { vals: [...range.vals] } : {}),
  });
}

/** Turn a declared slot into a stored slot, validating tag, range, clip mode and initial value. */
export function buildSlot(declared: SlotSpec, path: string, index: number): Result<ValueSlot> {
  if (!isOscTypeTag(declared.type)) {
    return err(new TypeMismatchError(`Slot ${index} of ${path} has unknown type '${String(declared.type)}'`, path));
  }
  const clipMode = declared.clipMode ?? 'none';
  if (!CLIP_MODES.some((mode) => mode === clipMode)) {
    return err(new ValidationError(`Slot ${index} of ${path} has unknown clip mode '${clipMode}'`, path));
  }
  const range = validateRange(declared, path, index);
  if (!range.ok) return range;

  const shape = { type: declared.type, range: range.value, clipMode };
  let value = defaultScalar(declared.type, range.value);
  if (declared.value !== undefined) {
    const conformed = conformValue(shape, declared.value, path, index);
    if (!conformed.ok) return conformed;
    value = conformed.value;
  }

  return ok({
    type: declared.type,
    value,
    clipMode,
    ...(range.value ? { range: range.value } : {}),
    ...(declared.unit !== undefined ? { unit: declared.unit } : {}),
  });
}

function isMidi(value: OscColor | OscMidi): value is OscMidi {
  return Array.isArray(value);
}

function toHex(byte: number): string {
  return byte.toString(16).padStart(2, '0').toUpperCase();
}

export function scalarToJson(value: OscScalar): JsonValue {
  if (value === null || typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  if (isMidi(value)) return [...value];
  return `#${toHex(value.r)}${toHex(value.g)}${toHex(value.b)}${toHex(value.a)}`;
}

export function scalarsEqual(a: OscScalar, b: OscScalar): boolean {
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return a.length === b.length && a.every((byte, i) => byte === b[i]);
  }
  if (typeof a === 'object' && a !== null && typeof b === 'object' && b !== null) {
    return JSON.stringify(scalarToJson(a)) === JSON.stringify(scalarToJson(b));
  }
  return a === b;
}
