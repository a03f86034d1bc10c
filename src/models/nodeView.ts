import type { ReadonlyOscNode } from './OscNode.js';
import { scalarToJson } from './values.js';
import type { JsonObject, JsonValue } from './types.js';

export function renderValue(node: ReadonlyOscNode): JsonValue[] {
  return node.slots.map((slot) => scalarToJson(slot.value));
}

/** One entry per slot; `null` for slots declared without a range. */
export function renderRange(node: ReadonlyOscNode): JsonValue[] {
  return node.slots.map((slot) => {
    if (!slot.range) return null;
    const entry: JsonObject = {};
    if (slot.range.min !== undefined) entry.MIN = slot.range.min;
    if (slot.range.max !== undefined) entry.MAX = slot.range.max;
    if (slot.range.vals !== undefined) entry.VALS = [...slot.range.vals];
    entry.CLIPMODE = slot.clipMode;
    return entry;
  });
}

export function renderClipModes(node: ReadonlyOscNode): JsonValue[] {
  return node.slots.map((slot) => slot.clipMode);
}

export function renderUnits(node: ReadonlyOscNode): JsonValue[] {
  return node.slots.map((slot) => slot.unit ?? null);
}

/**
 * Full attribute object of a node. With `withContents` the children are listed under
 * CONTENTS as their own attribute objects, one level deep.
 */
export function renderAttributes(node: ReadonlyOscNode, withContents = true): JsonObject {
  const view: JsonObject = {
    FULL_PATH: node.fullPath,
    ACCESS: node.access,
  };
  if (node.description !== undefined) view.DESCRIPTION = node.description;
  if (node.hasSlots) view.TYPE = node.typeString;
  if (node.isReadable) view.VALUE = renderValue(node);
  if (node.hasRange) view.RANGE = renderRange(node);
  if (node.hasSlots) view.CLIPMODE = renderClipModes(node);
  if (node.hasUnits) view.UNIT = renderUnits(node);

  if (withContents && (node.isContainer || node.children.size > 0)) {
    const contents: JsonObject = {};
    for (const [segment, child] of node.children) {
      contents[segment] = renderAttributes(child, false);
    }
    view.CONTENTS = contents;
  }
  return view;
}
