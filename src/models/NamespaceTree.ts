import { OscNode, joinPath, splitPath, type ReadonlyOscNode } from './OscNode.js';
import { Access, type EditOrigin, type NodeAttributes, type OscScalar } from './types.js';
import { buildSlot, conformValue, scalarsEqual, type ValueSlot } from './values.js';
import {
  AccessError,
  BadRequestError,
  ConflictError,
  NotFoundError,
  TypeMismatchError,
  ValidationError,
} from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';

// Characters OSC reserves for pattern matching and message framing.
const RESERVED_SEGMENT_CHARS = /[\s#*,?[\]{}]/;

export interface InsertOutcome {
  node: OscNode;
  /** Paths created by this insert, parents before children. Empty when an existing node was updated. */
  added: string[];
}

export interface RemoveOutcome {
  /** Removed paths, leaves before their parents. */
  removed: string[];
}

export interface SetOutcome {
  node: OscNode;
  changed: boolean;
}

/** Read access to the namespace handed out by the mutation coordinator. */
export interface ReadonlyNamespace {
  readonly root: ReadonlyOscNode;
  readonly size: number;
  resolve(path: string): ReadonlyOscNode | undefined;
  walk(): Iterable<ReadonlyOscNode>;
}

/**
 * In-memory OSC namespace rooted at `/`.
 *
 * The tree does no locking of its own: every mutating call is made by the
 * MutationCoordinator, one edit at a time. Each mutator validates everything
 * before touching a node so a rejected edit leaves the tree as it was.
 */
export class NamespaceTree implements ReadonlyNamespace {
  readonly root: OscNode;
  private nodeCount = 1;

  constructor(rootDescription = 'root node') {
    this.root = new OscNode('/', '', Access.NO_VALUE, [], rootDescription, undefined);
  }

  get size(): number {
    return this.nodeCount;
  }

  resolve(path: string): OscNode | undefined {
    const segments = splitPath(path);
    if (!segments) return undefined;
    let node: OscNode | undefined = this.root;
    for (const segment of segments) {
      node = node.children.get(segment);
      if (!node) return undefined;
    }
    return node;
  }

  *walk(): Generator<OscNode> {
    const stack: OscNode[] = [this.root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      yield node;
      stack.push(...Array.from(node.children.values()).reverse());
    }
  }

  insert(path: string, attributes: NodeAttributes): Result<InsertOutcome> {
    const segments = this.parseAddress(path);
    if (!segments.ok) return segments;
    const fullPath = joinPath(segments.value);

    const slots = this.buildSlots(fullPath, attributes);
    if (!slots.ok) return slots;

    const existing = this.resolve(fullPath);
    if (existing) {
      return this.updateInPlace(existing, attributes, slots.value);
    }

    // Find the deepest existing ancestor, then create everything below it.
    let parent = this.root;
    let depth = 0;
    for (; depth < segments.value.length - 1; depth++) {
      const child = parent.children.get(segments.value[depth]);
      if (!child) break;
      parent = child;
    }

    const added: string[] = [];
    for (; depth < segments.value.length - 1; depth++) {
      const segment = segments.value[depth];
      const container = new OscNode(parent.childPath(segment), segment, Access.NO_VALUE, [], undefined, parent);
      parent.children.set(segment, container);
      added.push(container.fullPath);
      parent = container;
    }

    const segment = segments.value[segments.value.length - 1];
    const node = new OscNode(fullPath, segment, attributes.access, slots.value, attributes.description, parent);
    parent.children.set(segment, node);
    added.push(fullPath);
    this.nodeCount += added.length;

    return ok({ node, added });
  }

  remove(path: string): Result<RemoveOutcome> {
    const node = this.resolve(path);
    if (!node) return err(new NotFoundError(path));
    if (!node.parent) return err(new ConflictError('The root node cannot be removed', '/'));

    const removed: string[] = [];
    const collect = (current: OscNode): void => {
      for (const child of current.children.values()) collect(child);
      removed.push(current.fullPath);
    };
    collect(node);

    node.parent.children.delete(node.segment);
    this.nodeCount -= removed.length;
    return ok({ removed });
  }

  setValue(path: string, values: readonly unknown[], origin: EditOrigin): Result<SetOutcome> {
    const node = this.resolve(path);
    if (!node) return err(new NotFoundError(path));
    if (node.isContainer) {
      return err(new AccessError(`${node.fullPath} holds no value`, node.fullPath));
    }
    if (node.access === Access.READ_ONLY && origin !== 'host') {
      return err(new AccessError(`${node.fullPath} is read-only`, node.fullPath));
    }
    if (values.length !== node.slots.length) {
      return err(
        new TypeMismatchError(
          `${node.fullPath} expects ${node.slots.length} argument(s) of type '${node.typeString}', got ${values.length}`,
          node.fullPath
        )
      );
    }

    const next: OscScalar[] = [];
    for (const [index, slot] of node.slots.entries()) {
      const conformed = conformValue(slot, values[index], node.fullPath, index);
      if (!conformed.ok) return conformed;
      next.push(conformed.value);
    }

    const changed = next.some((value, index) => !scalarsEqual(value, node.slots[index].value));
    if (changed) {
      next.forEach((value, index) => {
        node.slots[index].value = value;
      });
    }
    return ok({ node, changed });
  }

  private parseAddress(path: string): Result<string[]> {
    const segments = splitPath(path);
    if (!segments) return err(new BadRequestError(`'${path}' is not an absolute OSC address`, path));
    const bad = segments.find((segment) => RESERVED_SEGMENT_CHARS.test(segment));
    if (bad !== undefined) {
      return err(new BadRequestError(`Segment '${bad}' of ${path} contains a reserved character`, path));
    }
    return ok(segments);
  }

  private buildSlots(path: string, attributes: NodeAttributes): Result<ValueSlot[]> {
    if (!Object.values(Access).includes(attributes.access)) {
      return err(new ValidationError(`Unknown access mode ${String(attributes.access)} for ${path}`, path));
    }
    const specs = attributes.slots ?? [];
    if (attributes.access === Access.NO_VALUE && specs.length > 0) {
      return err(new ValidationError(`${path} has no value but declares ${specs.length} slot(s)`, path));
    }
    if (attributes.access !== Access.NO_VALUE && specs.length === 0) {
      return err(new ValidationError(`${path} carries a value but declares no type`, path));
    }

    const slots: ValueSlot[] = [];
    for (const [index, declared] of specs.entries()) {
      const slot = buildSlot(declared, path, index);
      if (!slot.ok) return slot;
      slots.push(slot.value);
    }
    return ok(slots);
  }

  /**
   * Re-declaring a node with the same access and type tags refreshes its metadata and
   * keeps the current value, re-clipped against the new ranges. Anything else collides.
   */
  private updateInPlace(node: OscNode, attributes: NodeAttributes, slots: ValueSlot[]): Result<InsertOutcome> {
    const sameShape =
      node.access === attributes.access &&
      node.slots.length === slots.length &&
      node.slots.every((slot, index) => slot.type === slots[index].type);
    if (!sameShape) {
      return err(new ConflictError(`${node.fullPath} already exists with access ${node.access} and type '${node.typeString}'`, node.fullPath));
    }

    const explicitValues = (attributes.slots ?? []).map((declared) => declared.value !== undefined);
    const merged: ValueSlot[] = [];
    for (const [index, slot] of slots.entries()) {
      if (explicitValues[index]) {
        merged.push(slot);
        continue;
      }
      const kept = conformValue(slot, node.slots[index].value, node.fullPath, index);
      if (!kept.ok) return kept;
      merged.push({ ...slot, value: kept.value });
    }

    node.slots = merged;
    if (attributes.description !== undefined) node.description = attributes.description;
    return ok({ node, added: [] });
  }
}
