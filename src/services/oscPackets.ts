import { fromBuffer, type OscArgument } from 'osc-min';
import type { Edit } from '../core/MutationCoordinator.js';
import type { EditOrigin, OscScalar, OscTypeTag } from '../models/types.js';
import { scalarToJson } from '../models/values.js';
import { BadRequestError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { err, ok, type Result } from '../utils/result.js';

type PacketOrigin = Exclude<EditOrigin, 'host'>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Decoded arguments come bare from node-osc and as `{ type, value }` from osc-min. */
function toEditValue(arg: unknown): unknown {
  const value = isRecord(arg) && typeof arg.type === 'string' && !Buffer.isBuffer(arg) ? arg.value : arg;
  return Buffer.isBuffer(value) ? new Uint8Array(value) : value;
}

function toEdit(address: unknown, args: readonly unknown[], origin: PacketOrigin): Edit | undefined {
  if (typeof address !== 'string' || !address.startsWith('/')) {
    logger.debug('Ignoring OSC message without an address', { origin });
    return undefined;
  }
  return { kind: 'set', path: address, values: args.map(toEditValue), origin };
}

/**
 * Flatten a decoded OSC packet into `set` edits, depth first so nested bundles keep
 * their order. Messages are either node-osc's `[address, ...args]` arrays or osc-min's
 * `{ address, args }` objects.
 */
export function packetToEdits(packet: unknown, origin: PacketOrigin, edits: Edit[] = []): Edit[] {
  if (Array.isArray(packet)) {
    const [address, ...args]: unknown[] = packet;
    const edit = toEdit(address, args, origin);
    if (edit) edits.push(edit);
    return edits;
  }
  if (!isRecord(packet)) {
    logger.debug('Ignoring malformed OSC packet', { origin });
    return edits;
  }
  if (Array.isArray(packet.elements)) {
    for (const element of packet.elements) packetToEdits(element, origin, edits);
    return edits;
  }
  if (packet.oscType === 'bundle') {
    logger.debug('Ignoring malformed OSC bundle', { origin });
    return edits;
  }
  const edit = toEdit(packet.address, Array.isArray(packet.args) ? packet.args : [], origin);
  if (edit) edits.push(edit);
  return edits;
}

/** Decode a binary OSC message or bundle. */
export function decodeOscPacket(buffer: Buffer, origin: PacketOrigin): Result<Edit[]> {
  let packet: unknown;
  try {
    packet = fromBuffer(buffer);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new BadRequestError(`Malformed OSC packet: ${reason}`));
  }
  return ok(packetToEdits(packet, origin));
}

/**
 * Outbound argument for one slot, typed so the wire tag follows the slot's tag.
 * Colors go out as #RRGGBBAA strings and MIDI as a 4 byte blob.
 */
export function toOscArgument(tag: OscTypeTag, value: OscScalar): OscArgument {
  switch (tag) {
    case 'i':
      return { type: 'integer', value };
    case 'f':
      return { type: 'float', value };
    case 'd':
      return { type: 'double', value };
    case 'h':
      return { type: 'bigint', value: typeof value === 'number' ? BigInt(value) : value };
    case 's':
    case 'c':
    case 'r':
      return { type: 'string', value: typeof value === 'string' ? value : scalarToJson(value) };
    case 'b':
      return { type: 'blob', value: value instanceof Uint8Array ? Buffer.from(value) : Buffer.alloc(0) };
    case 'm': {
      const bytes = scalarToJson(value);
      return {
        type: 'blob',
        value: Buffer.from(Array.isArray(bytes) ? bytes.filter((byte): byte is number => typeof byte === 'number') : []),
      };
    }
    case 'T':
    case 'F':
      return { type: value === true ? 'true' : 'false' };
    case 'N':
      return { type: 'null' };
    case 'I':
      return { type: 'bang' };
  }
}
