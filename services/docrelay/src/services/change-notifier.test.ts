import { describe, it, expect, vi, afterEach } from 'vitest';
import { SubscriberDisconnectedError } from '../core/errors.js';
import type { CommitRecord, JsonValue } from '../types/index.js';
import { ChangeNotifier, type ChangeSubscription } from './change-notifier.js';

let sequence = 0;
function commit(resource: string, revision: number, payload: JsonValue = { revision }): CommitRecord {
  return {
    sequence: ++sequence,
    resource,
    revision,
    payload,
    deleted: false,
    committedAt: new Date(0).toISOString(),
  };
}

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

async function collect(subscription: ChangeSubscription, into: number[]): Promise<void> {
  for await (const event of subscription) {
    into.push(event.revision);
  }
}

afterEach(() => {
  vi.useRealTimers();
});

describe('ChangeNotifier', () => {
  it('delivers one resource in revision order and ignores other resources', async () => {
    const notifier = new ChangeNotifier();
    const subscription = notifier.subscribe('cart-42');
    const received: number[] = [];
    const done = collect(subscription, received);

    notifier.publish(commit('cart-42', 1));
    notifier.publish(commit('other', 1));
    notifier.publish(commit('cart-42', 2));
    await tick();
    subscription.unsubscribe();
    await done;

    expect(received).toEqual([1, 2]);
  });

  it('holds a revision that arrives ahead of a gap until the gap fills', async () => {
    const notifier = new ChangeNotifier({ reorderWindowMs: 500 });
    const subscription = notifier.subscribe('r');
    const received: number[] = [];
    const done = collect(subscription, received);

    notifier.publish(commit('r', 1));
    notifier.publish(commit('r', 3));
    await tick();
    expect(received).toEqual([1]);

    notifier.publish(commit('r', 2));
    await tick();
    subscription.unsubscribe();
    await done;

    expect(received).toEqual([1, 2, 3]);
    expect(notifier.getStats().reordered).toBe(1);
  });

  it('releases held revisions in order once the reorder window expires', async () => {
    vi.useFakeTimers();
    const notifier = new ChangeNotifier({ reorderWindowMs: 500 });
    const subscription = notifier.subscribe('r');

    notifier.publish(commit('r', 1));
    notifier.publish(commit('r', 4));
    notifier.publish(commit('r', 3));
    expect(subscription.buffered).toBe(1);

    vi.advanceTimersByTime(500);
    expect(subscription.drain().map((event) => event.revision)).toEqual([1, 3, 4]);
  });

  it('drops duplicate and stale revisions', () => {
    const notifier = new ChangeNotifier();
    const subscription = notifier.subscribe('r');

    notifier.publish(commit('r', 1));
    notifier.publish(commit('r', 2));
    notifier.publish(commit('r', 2));
    notifier.publish(commit('r', 1));

    expect(subscription.drain().map((event) => event.revision)).toEqual([1, 2]);
    expect(notifier.getStats().duplicates).toBe(2);
  });

  it('takes the first revision it sees on a new channel as the starting point', () => {
    const notifier = new ChangeNotifier();
    const subscription = notifier.subscribe('late');

    notifier.publish(commit('late', 7));
    notifier.publish(commit('late', 8));

    expect(subscription.drain().map((event) => event.revision)).toEqual([7, 8]);
  });

  it('ignores commits for resources nobody is subscribed to', () => {
    const notifier = new ChangeNotifier();
    notifier.publish(commit('nobody', 1));
    expect(notifier.getStats()).toMatchObject({ resources: 0, published: 0 });
  });

  it('discards queued events on unsubscribe and tolerates repeated calls', async () => {
    const notifier = new ChangeNotifier();
    const subscription = notifier.subscribe('r');
    notifier.publish(commit('r', 1));
    notifier.publish(commit('r', 2));
    expect(subscription.buffered).toBe(2);

    subscription.unsubscribe();
    subscription.unsubscribe();

    await expect(subscription.next()).resolves.toEqual({ value: undefined, done: true });
    notifier.publish(commit('r', 3));
    expect(subscription.buffered).toBe(0);
    expect(notifier.subscriberCount('r')).toBe(0);
  });

  it('disconnects a subscriber whose buffer overflows', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const notifier = new ChangeNotifier({ bufferSize: 2 });
    const slow = notifier.subscribe('r');
    const fast = notifier.subscribe('r');
    const fastReceived: number[] = [];
    const fastDone = collect(fast, fastReceived);
    const disconnected = vi.fn();
    slow.onDisconnect(disconnected);

    for (let revision = 1; revision <= 3; revision++) {
      notifier.publish(commit('r', revision));
      await tick();
    }

    expect(disconnected).toHaveBeenCalledTimes(1);
    expect(disconnected.mock.calls[0]?.[0]).toBeInstanceOf(SubscriberDisconnectedError);
    await expect(slow.next()).rejects.toBeInstanceOf(SubscriberDisconnectedError);
    expect(slow.isOpen).toBe(false);
    expect(notifier.subscriberCount('r')).toBe(1);
    expect(notifier.getStats().overflows).toBe(1);

    fast.unsubscribe();
    await fastDone;
    expect(fastReceived).toEqual([1, 2, 3]);
    warn.mockRestore();
  });

  it('fans out to 1000 subscribers while one stalled subscriber is dropped', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const notifier = new ChangeNotifier({ bufferSize: 4 });
    const stalled = notifier.subscribe('hot');
    let stalledDropped = false;
    stalled.onDisconnect(() => {
      stalledDropped = true;
    });

    const readers = Array.from({ length: 999 }, () => {
      const subscription = notifier.subscribe('hot');
      const received: number[] = [];
      return { subscription, received, done: collect(subscription, received) };
    });
    await tick();

    for (let revision = 1; revision <= 10; revision++) {
      notifier.publish(commit('hot', revision));
      await tick();
    }

    expect(stalledDropped).toBe(true);
    for (const reader of readers) {
      reader.subscription.unsubscribe();
    }
    await Promise.all(readers.map((reader) => reader.done));

    const expected = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
    expect(readers.every((reader) => reader.received.join() === expected.join())).toBe(true);
    expect(notifier.getStats().overflows).toBe(1);
    warn.mockRestore();
  });

  it('freezes delivered events', () => {
    const notifier = new ChangeNotifier();
    const subscription = notifier.subscribe('r');
    notifier.publish(commit('r', 1, { items: ['apple'] }));

    const [event] = subscription.drain();
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event?.payload)).toBe(true);
  });

  it('drain hands back buffered events and ends the subscription', async () => {
    const notifier = new ChangeNotifier();
    const subscription = notifier.subscribe('r');
    notifier.publish(commit('r', 1));

    expect(subscription.drain().map((event) => event.revision)).toEqual([1]);
    expect(subscription.isOpen).toBe(false);
    await expect(subscription.next()).resolves.toMatchObject({ done: true });
  });
});
