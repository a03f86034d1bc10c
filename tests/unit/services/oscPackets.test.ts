import { describe, it, expect } from 'vitest';
import { toBuffer } from 'osc-min';
import { decodeOscPacket, packetToEdits } from '../../../src/services/oscPackets.js';
import { BadRequestError } from '../../../src/utils/errors.js';

describe('decodeOscPacket', () => {
  it('turns a binary bundle into set edits in element order', () => {
    const buffer = toBuffer({
      oscType: 'bundle',
      timetag: 0,
      elements: [
        { address: '/a', args: [{ type: 'integer', value: 1 }] },
        {
          oscType: 'bundle',
          timetag: 0,
          elements: [{ address: '/b', args: [{ type: 'string', value: 'x' }] }],
        },
        { address: '/c', args: [{ type: 'blob', value: Buffer.from([9]) }] },
      ],
    });

    expect(decodeOscPacket(buffer, 'websocket')).toEqual({
      ok: true,
      value: [
        { kind: 'set', path: '/a', values: [1], origin: 'websocket' },
        { kind: 'set', path: '/b', values: ['x'], origin: 'websocket' },
        { kind: 'set', path: '/c', values: [new Uint8Array([9])], origin: 'websocket' },
      ],
    });
  });

  it('rejects bytes that are not an OSC packet', () => {
    const result = decodeOscPacket(Buffer.from('/a'), 'websocket');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(BadRequestError);
    expect(result.error.message).toMatch(/^Malformed OSC packet: /);
  });
});

describe('packetToEdits', () => {
  it('skips messages without an address', () => {
    expect(packetToEdits(['nope', 1], 'osc')).toEqual([]);
    expect(packetToEdits({ oscType: 'bundle', elements: [[7], ['/x', 2]] }, 'osc')).toEqual([
      { kind: 'set', path: '/x', values: [2], origin: 'osc' },
    ]);
  });
});
