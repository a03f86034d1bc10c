import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { NamespaceChange } from '../../../src/models/changes.js';
import { ChangeNotifier, type Subscriber } from '../../../src/services/ChangeNotifier.js';

interface FakeSubscriber extends Subscriber {
  received: string[];
  onDropped: ReturnType<typeof vi.fn>;
}

function fakeSubscriber(id: string, deliver?: (message: string) => Promise<void>): FakeSubscriber {
  const received: string[] = [];
  return {
    id,
    received,
    deliver: deliver ?? (async (message) => {
      received.push(message);
    }),
    onDropped: vi.fn(),
  };
}

const changed = (path: string, value: number): NamespaceChange => ({
  kind: 'PATH_CHANGED',
  path,
  attributes: { FULL_PATH: path, VALUE: [value] },
});

const settle = () => new Promise<void>((resolve) => setImmediate(() => setImmediate(resolve)));

describe('ChangeNotifier', () => {
  let notifier: ChangeNotifier;
  let a: FakeSubscriber;
  let b: FakeSubscriber;

  beforeEach(() => {
    notifier = new ChangeNotifier();
    a = fakeSubscriber('a');
    b = fakeSubscriber('b');
    notifier.attach(a);
    notifier.attach(b);
  });

  it('delivers a change to listeners of that path only', async () => {
    notifier.listen('a', '/synth/freq');
    notifier.notify(changed('/synth/freq', 1));
    await settle();

    expect(a.received).toEqual(['{"COMMAND":"PATH_CHANGED","DATA":{"FULL_PATH":"/synth/freq","VALUE":[1]}}']);
    expect(b.received).toEqual([]);
  });

  it('delivers once when several subscriptions on ancestors match', async () => {
    notifier.listen('a', '/');
    notifier.listen('a', '/synth');
    notifier.listen('a', '/synth/freq');
    notifier.notify(changed('/synth/freq', 2));
    await settle();

    expect(a.received).toHaveLength(1);
  });

  it('does not treat a sibling prefix as an ancestor', async () => {
    notifier.listen('a', '/synth/freq');
    notifier.notify(changed('/synth/frequency', 3));
    await settle();

    expect(a.received).toEqual([]);
  });

  it('normalizes subscription paths', async () => {
    expect(notifier.listen('a', '/synth/')).toBe(true);
    expect(notifier.listenerCount('/synth')).toBe(1);
    expect(notifier.subscriptions('a')).toEqual(['/synth']);

    notifier.notify(changed('/synth/freq', 4));
    await settle();
    expect(a.received).toHaveLength(1);
  });

  it('refuses unknown clients and relative paths', () => {
    expect(notifier.listen('nobody', '/synth')).toBe(false);
    expect(notifier.listen('a', 'synth')).toBe(false);
    expect(notifier.unlisten('a', '/never')).toBe(false);
  });

  it('stops delivering after unlisten', async () => {
    notifier.listen('a', '/synth');
    expect(notifier.unlisten('a', '/synth')).toBe(true);
    notifier.notify(changed('/synth/freq', 5));
    await settle();

    expect(a.received).toEqual([]);
    expect(notifier.listenerCount('/synth')).toBe(0);
  });

  it('broadcasts structural changes to every subscriber', async () => {
    notifier.notify({ kind: 'PATH_ADDED', path: '/x' });
    await settle();

    expect(a.received).toEqual(['{"COMMAND":"PATH_ADDED","DATA":"/x"}']);
    expect(b.received).toEqual(['{"COMMAND":"PATH_ADDED","DATA":"/x"}']);
  });

  it('drops subscriptions under a removed path', async () => {
    notifier.listen('a', '/synth/freq');
    notifier.listen('a', '/other');
    notifier.notify({ kind: 'PATH_REMOVED', path: '/synth' });
    await settle();

    expect(notifier.subscriptions('a')).toEqual(['/other']);
    expect(a.received).toEqual(['{"COMMAND":"PATH_REMOVED","DATA":"/synth"}']);
  });

  it('drops a subscriber whose outbox overflows without affecting others', async () => {
    notifier = new ChangeNotifier({ queueLimit: 2 });
    notifier.attach(a);
    notifier.attach(b);
    notifier.listen('a', '/');
    notifier.listen('b', '/b');

    notifier.notify(changed('/a', 1));
    notifier.notify(changed('/a', 2));
    notifier.notify(changed('/a', 3));
    notifier.notify(changed('/b', 4));
    await settle();

    expect(a.onDropped).toHaveBeenCalledWith('overflow');
    expect(a.received).toEqual([]);
    expect(b.received).toHaveLength(1);
    expect(notifier.subscriberCount).toBe(1);
  });

  it('drops a subscriber whose delivery fails', async () => {
    const broken = fakeSubscriber('broken', () => Promise.reject(new Error('socket closed')));
    notifier.attach(broken);
    notifier.listen('broken', '/');
    notifier.listen('a', '/');

    notifier.notify(changed('/x', 1));
    await settle();

    expect(broken.onDropped).toHaveBeenCalledWith('delivery-failed');
    expect(notifier.subscriptions('broken')).toEqual([]);
    expect(a.received).toHaveLength(1);
  });

  it('discards pending events of a detached subscriber', async () => {
    notifier.listen('a', '/');
    notifier.notify(changed('/x', 1));
    expect(notifier.detach('a')).toBe(true);
    await settle();

    expect(a.received).toEqual([]);
    expect(a.onDropped).not.toHaveBeenCalled();
  });

  it('ignores a second attach with the same id', () => {
    notifier.attach(fakeSubscriber('a'));

    expect(notifier.subscriberCount).toBe(2);
  });
});
