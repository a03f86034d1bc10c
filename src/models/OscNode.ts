import { Access, type OscScalar, type OscTypeTag } from './types.js';
import type { ValueSlot } from './values.js';

/** The view of a node handed to readers; only the mutation coordinator holds `OscNode` itself. */
export interface ReadonlyOscNode {
  readonly fullPath: string;
  readonly segment: string;
  readonly access: Access;
  readonly slots: ReadonlyArray<Readonly<ValueSlot>>;
  readonly description: string | undefined;
  readonly children: ReadonlyMap<string, ReadonlyOscNode>;
  readonly typeTags: OscTypeTag[];
  readonly typeString: string;
  readonly value: OscScalar[];
  readonly hasSlots: boolean;
  readonly hasRange: boolean;
  readonly hasUnits: boolean;
  readonly isReadable: boolean;
  readonly isContainer: boolean;
}

/** One addressable entry of the OSC namespace. */
export class OscNode implements ReadonlyOscNode {
  readonly children: Map<string, OscNode> = new Map();

  constructor(
    readonly fullPath: string,
    readonly segment: string,
    readonly access: Access,
    public slots: ValueSlot[],
    public description: string | undefined,
    readonly parent: OscNode | undefined
  ) {}

  get typeTags(): OscTypeTag[] {
    return this.slots.map((slot) => slot.type);
  }

  get typeString(): string {
    return this.typeTags.join('');
  }

  get value(): OscScalar[] {
    return this.slots.map((slot) => slot.value);
  }

  get hasSlots(): boolean {
    return this.slots.length > 0;
  }

  get hasRange(): boolean {
    return this.slots.some((slot) => slot.range !== undefined);
  }

  get hasUnits(): boolean {
    return this.slots.some((slot) => slot.unit !== undefined);
  }

  get isReadable(): boolean {
    return this.access === Access.READ_ONLY || this.access === Access.READ_WRITE;
  }

  get isContainer(): boolean {
    return this.access === Access.NO_VALUE;
  }

  childPath(segment: string): string {
    return this.fullPath === '/' ? `/${segment}` : `${this.fullPath}/${segment}`;
  }
}

/**
 * Split an absolute OSC address into segments. A single trailing slash is tolerated;
 * anything else that would produce an empty segment is rejected.
 */
export function splitPath(path: string): string[] | undefined {
  if (!path.startsWith('/')) return undefined;
  const trimmed = path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
  if (trimmed === '/') return [];
  const segments = trimmed.slice(1).split('/');
  return segments.every((segment) => segment.length > 0) ? segments : undefined;
}

export function isAncestorOrSelf(ancestor: string, path: string): boolean {
  if (ancestor === '/' || ancestor === path) return true;
  return path.startsWith(`${ancestor}/`);
}

export function joinPath(segments: readonly string[]): string {
  return `/${segments.join('/')}`;
}
