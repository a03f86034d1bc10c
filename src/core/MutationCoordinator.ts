import { NamespaceTree, type ReadonlyNamespace } from '../models/NamespaceTree.js';
import { renderAttributes } from '../models/nodeView.js';
import { scalarToJson } from '../models/values.js';
import type { ChangeSink } from '../models/changes.js';
import type { EditOrigin, JsonValue, NodeAttributes } from '../models/types.js';
import { ConflictError } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';
import { logger } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';

export type Edit =
  | { kind: 'insert'; path: string; attributes: NodeAttributes }
  | { kind: 'remove'; path: string }
  | { kind: 'set'; path: string; values: readonly unknown[]; origin: EditOrigin };

export type EditOutcome =
  | { kind: 'insert'; path: string; added: string[] }
  | { kind: 'remove'; path: string; removed: string[] }
  | { kind: 'set'; path: string; changed: boolean; value: JsonValue[] };

interface PendingEdit {
  edit: Edit;
  resolve: (result: Result<EditOutcome>) => void;
  reject: (error: unknown) => void;
}

export interface MutationCoordinatorOptions {
  rootDescription?: string;
}

/**
 * Single writer for the namespace.
 *
 * `submit` only enqueues; the mailbox is drained on a later macrotask, so an edit never
 * runs inside the network callback that produced it and a caller awaiting its own edit
 * cannot wait on itself. Edits from every origin are applied one at a time in mailbox
 * order, and committed changes are handed to the change sink before the caller's
 * promise settles.
 */
export class MutationCoordinator {
  private readonly tree: NamespaceTree;
  private readonly mailbox: PendingEdit[] = [];
  private drainScheduled = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly changes: ChangeSink,
    options: MutationCoordinatorOptions = {}
  ) {
    this.tree = new NamespaceTree(options.rootDescription);
  }

  submit(edit: Edit): Promise<Result<EditOutcome>> {
    if (this.closed) {
      return Promise.resolve(err(new ConflictError('The mutation coordinator is closed', edit.path)));
    }
    return new Promise((resolve, reject) => {
      this.mailbox.push({ edit, resolve, reject });
      this.scheduleDrain();
    });
  }

  /** Enqueue several edits back to back; they are applied in the given order. */
  submitAll(edits: readonly Edit[]): Promise<Array<Result<EditOutcome>>> {
    return Promise.all(edits.map((edit) => this.submit(edit)));
  }

  /** Run `reader` against the committed tree. Readers never observe a half-applied edit. */
  read<T>(reader: (namespace: ReadonlyNamespace) => T): T {
    return reader(this.tree);
  }

  get pending(): number {
    return this.mailbox.length;
  }

  /** Resolves once every edit submitted so far has been applied. */
  idle(): Promise<void> {
    if (this.mailbox.length === 0 && !this.drainScheduled) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stop accepting edits. Already queued edits are still applied. */
  close(): Promise<void> {
    this.closed = true;
    return this.idle();
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => this.drain());
  }

  private drain(): void {
    this.drainScheduled = false;
    // Edits submitted while this batch settles go to the next turn.
    const batch = this.mailbox.splice(0);
    for (const pending of batch) {
      try {
        pending.resolve(this.apply(pending.edit));
      } catch (error) {
        logger.error('Edit failed unexpectedly', { kind: pending.edit.kind, path: pending.edit.path, error });
        metrics.trackEdit(pending.edit.kind, 'error');
        pending.reject(error);
      }
    }

    if (this.mailbox.length > 0) {
      this.scheduleDrain();
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((wake) => wake());
  }

  private apply(edit: Edit): Result<EditOutcome> {
    const result = this.applyToTree(edit);
    if (result.ok) {
      metrics.trackEdit(edit.kind, 'applied');
    } else {
      metrics.trackEdit(edit.kind, result.error.code);
      logger.debug('Edit rejected', { kind: edit.kind, path: edit.path, code: result.error.code, reason: result.error.message });
    }
    return result;
  }

  private applyToTree(edit: Edit): Result<EditOutcome> {
    switch (edit.kind) {
      case 'insert': {
        const result = this.tree.insert(edit.path, edit.attributes);
        if (!result.ok) return result;
        const { node, added } = result.value;
        if (added.length > 0) {
          added.forEach((path) => this.changes.notify({ kind: 'PATH_ADDED', path }));
        } else {
          this.changes.notify({ kind: 'PATH_CHANGED', path: node.fullPath, attributes: renderAttributes(node, false) });
        }
        return ok({ kind: 'insert', path: node.fullPath, added });
      }
      case 'remove': {
        const result = this.tree.remove(edit.path);
        if (!result.ok) return result;
        const { removed } = result.value;
        removed.forEach((path) => this.changes.notify({ kind: 'PATH_REMOVED', path }));
        return ok({ kind: 'remove', path: removed[removed.length - 1], removed });
      }
      case 'set': {
        const result = this.tree.setValue(edit.path, edit.values, edit.origin);
        if (!result.ok) return result;
        const { node, changed } = result.value;
        if (changed) {
          this.changes.notify({ kind: 'PATH_CHANGED', path: node.fullPath, attributes: renderAttributes(node, false) });
        }
        return ok({
          kind: 'set',
          path: node.fullPath,
          changed,
          value: node.slots.map((slot) => scalarToJson(slot.value)),
        });
      }
    }
  }
}
