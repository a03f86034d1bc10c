import { isAncestorOrSelf, joinPath, splitPath } from '../models/OscNode.js';
import type { ChangeSink, NamespaceChange } from '../models/changes.js';
import { logger } from '../utils/logger.js';
import { metrics } from '../utils/metrics.js';

/** A connected client that can receive namespace events. */
export interface Subscriber {
  readonly id: string;
  /** Resolves once the message is handed to the transport; rejects if it cannot be. */
  deliver(message: string): Promise<void>;
  /** Called after the notifier has detached this subscriber on its own. */
  onDropped?(reason: DropReason): void;
}

export type DropReason = 'overflow' | 'delivery-failed';

export interface ChangeNotifierOptions {
  /** Pending events a subscriber may accumulate before it is dropped. */
  queueLimit?: number;
}

interface SubscriberState {
  subscriber: Subscriber;
  paths: Set<string>;
  outbox: string[];
  flushing: boolean;
}

function normalize(path: string): string | undefined {
  const segments = splitPath(path);
  return segments ? joinPath(segments) : undefined;
}

/** `/a/b` → `/`, `/a`, `/a/b` */
function ancestorsOrSelf(path: string): string[] {
  const segments = splitPath(path) ?? [];
  const paths = ['/'];
  for (let i = 1; i <= segments.length; i++) paths.push(joinPath(segments.slice(0, i)));
  return paths;
}

/**
 * Tracks LISTEN subscriptions and fans committed changes out to subscribers.
 *
 * `notify` only enqueues. Each subscriber has its own bounded outbox flushed on a later
 * macrotask, so a slow or broken client never holds up the coordinator or other clients.
 */
export class ChangeNotifier implements ChangeSink {
  private readonly subscribers = new Map<string, SubscriberState>();
  private readonly listeners = new Map<string, Set<string>>();
  private readonly queueLimit: number;

  constructor(options: ChangeNotifierOptions = {}) {
    this.queueLimit = options.queueLimit ?? 1024;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  attach(subscriber: Subscriber): void {
    if (this.subscribers.has(subscriber.id)) {
      logger.warn('Subscriber already attached', { clientId: subscriber.id });
      return;
    }
    this.subscribers.set(subscriber.id, { subscriber, paths: new Set(), outbox: [], flushing: false });
  }

  /** Remove a subscriber, its subscriptions and any events still waiting for it. */
  detach(clientId: string): boolean {
    const state = this.subscribers.get(clientId);
    if (!state) return false;
    for (const path of state.paths) this.removeListener(path, clientId);
    state.outbox.length = 0;
    this.subscribers.delete(clientId);
    return true;
  }

  listen(clientId: string, path: string): boolean {
    const state = this.subscribers.get(clientId);
    const normalized = normalize(path);
    if (!state || normalized === undefined) return false;
    state.paths.add(normalized);
    const ids = this.listeners.get(normalized) ?? new Set<string>();
    ids.add(clientId);
    this.listeners.set(normalized, ids);
    return true;
  }

  unlisten(clientId: string, path: string): boolean {
    const state = this.subscribers.get(clientId);
    const normalized = normalize(path);
    if (!state || normalized === undefined || !state.paths.delete(normalized)) return false;
    this.removeListener(normalized, clientId);
    return true;
  }

  subscriptions(clientId: string): string[] {
    return Array.from(this.subscribers.get(clientId)?.paths ?? []);
  }

  listenerCount(path: string): number {
    const normalized = normalize(path);
    return normalized === undefined ? 0 : this.listeners.get(normalized)?.size ?? 0;
  }

  notify(change: NamespaceChange): void {
    switch (change.kind) {
      case 'PATH_CHANGED': {
        const targets = new Set<string>();
        for (const path of ancestorsOrSelf(change.path)) {
          this.listeners.get(path)?.forEach((id) => targets.add(id));
        }
        const message = JSON.stringify({ COMMAND: change.kind, DATA: change.attributes });
        targets.forEach((id) => this.enqueue(id, message));
        return;
      }
      case 'PATH_REMOVED':
        this.dropSubscriptionsUnder(change.path);
        this.broadcast(JSON.stringify({ COMMAND: change.kind, DATA: change.path }));
        return;
      case 'PATH_ADDED':
        this.broadcast(JSON.stringify({ COMMAND: change.kind, DATA: change.path }));
        return;
    }
  }

  private broadcast(message: string): void {
    for (const id of this.subscribers.keys()) this.enqueue(id, message);
  }

  private enqueue(clientId: string, message: string): void {
    const state = this.subscribers.get(clientId);
    if (!state) return;
    if (state.outbox.length >= this.queueLimit) {
      this.drop(state, 'overflow');
      return;
    }
    state.outbox.push(message);
    if (state.flushing) return;
    state.flushing = true;
    setImmediate(() => {
      this.flush(state).catch((error: unknown) => {
        logger.error('Notification flush failed', { clientId, error });
      });
    });
  }

  private async flush(state: SubscriberState): Promise<void> {
    const { id } = state.subscriber;
    try {
      while (state.outbox.length > 0 && this.subscribers.get(id) === state) {
        const message = state.outbox.shift();
        if (message === undefined) break;
        await state.subscriber.deliver(message);
      }
    } catch (error) {
      logger.warn('Notification delivery failed, dropping subscriber', { clientId: id, error });
      this.drop(state, 'delivery-failed');
    } finally {
      state.flushing = false;
    }
  }

  private drop(state: SubscriberState, reason: DropReason): void {
    const { id } = state.subscriber;
    if (!this.detach(id)) return;
    metrics.trackDroppedSubscriber(reason);
    logger.info('Subscriber dropped', { clientId: id, reason });
    state.subscriber.onDropped?.(reason);
  }

  private removeListener(path: string, clientId: string): void {
    const ids = this.listeners.get(path);
    if (!ids) return;
    ids.delete(clientId);
    if (ids.size === 0) this.listeners.delete(path);
  }

  private dropSubscriptionsUnder(removedPath: string): void {
    for (const path of Array.from(this.listeners.keys())) {
      if (!isAncestorOrSelf(removedPath, path)) continue;
      const ids = this.listeners.get(path);
      ids?.forEach((id) => this.subscribers.get(id)?.paths.delete(path));
      this.listeners.delete(path);
    }
  }
}
