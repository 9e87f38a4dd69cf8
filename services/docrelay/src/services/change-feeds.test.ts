import { describe, it, expect, vi } from 'vitest';
import { StoreUnavailableError } from '../core/errors.js';
import { InMemoryDocumentStore, type CommitInput, type Unwatch } from '../store/document-store.js';
import { StoreGateway } from '../store/store-gateway.js';
import type { CommitListener, CommitRecord } from '../types/index.js';
import { ChangeNotifier } from './change-notifier.js';
import { LocalChangeFeed, PollingChangeFeed, WatchChangeFeed, createChangeFeed } from './change-feeds.js';

/** Hides chosen sequences from the change log, as a slow concurrent writer would. */
class GappyStore extends InMemoryDocumentStore {
  hidden = new Set<number>();
  failReads = false;

  override async changesSince(sequence: number, limit: number): Promise<CommitRecord[]> {
    if (this.failReads) {
      throw new StoreUnavailableError('log unavailable');
    }
    const records = await super.changesSince(sequence, limit);
    return records.filter((record) => !this.hidden.has(record.sequence));
  }
}

/** A store with a native feed driven by its own commits. */
class WatchableStore extends InMemoryDocumentStore {
  private listener: CommitListener | null = null;
  private onError: ((error: Error) => void) | null = null;
  unwatched = 0;

  override async commit(input: CommitInput): Promise<CommitRecord> {
    const record = await super.commit(input);
    this.listener?.(record);
    return record;
  }

  async watch(_after: number, listener: CommitListener, onError: (error: Error) => void): Promise<Unwatch> {
    this.listener = listener;
    this.onError = onError;
    return async () => {
      this.listener = null;
      this.unwatched++;
    };
  }

  breakStream(): void {
    this.onError?.(new Error('stream closed'));
  }
}

/** Commits once between the feed reading the latest sequence and opening its stream. */
class RacingStore extends WatchableStore {
  private raced = false;
  /** Report the raced commit on the stream too, as a stream opened just before it would. */
  replayOnWatch = false;

  override async latestSequence(): Promise<number> {
    const latest = await super.latestSequence();
    if (!this.raced) {
      this.raced = true;
      await this.commit({ resource: 'r', document: 1, deleted: false });
    }
    return latest;
  }

  override async watch(after: number, listener: CommitListener, onError: (error: Error) => void): Promise<Unwatch> {
    const unwatch = await super.watch(after, listener, onError);
    if (this.replayOnWatch) {
      for (const record of await this.changesSince(after, 100)) listener(record);
    }
    return unwatch;
  }
}

const slowInterval = { intervalMs: 60_000 };

describe('LocalChangeFeed', () => {
  it('forwards gateway commits to the notifier', async () => {
    const gateway = new StoreGateway(new InMemoryDocumentStore());
    const notifier = new ChangeNotifier();
    const feed = new LocalChangeFeed(gateway);
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await notifier.attach(feed);
    log.mockRestore();

    const subscription = notifier.subscribe('doc');
    await gateway.write('doc', { v: 1 });

    expect(subscription.drain().map((event) => event.payload)).toEqual([{ v: 1 }]);
    expect(notifier.feedsHealthy()).toBe(true);
    expect(notifier.getFeedNames()).toEqual(['local']);

    await notifier.close();
    expect(feed.isHealthy()).toBe(false);
  });
});

describe('PollingChangeFeed', () => {
  it('starts at the latest sequence and delivers later commits in order', async () => {
    const gateway = new StoreGateway(new InMemoryDocumentStore());
    await gateway.write('before', 1);

    const seen: number[] = [];
    const feed = new PollingChangeFeed(gateway, slowInterval);
    await feed.start((record) => seen.push(record.sequence));
    expect(feed.getCursor()).toBe(1);

    await gateway.write('a', 1);
    await gateway.write('a', 2);
    await feed.poll();
    await feed.stop();

    expect(seen).toEqual([2, 3]);
    expect(feed.getCursor()).toBe(3);
  });

  it('waits on a missing sequence until it appears', async () => {
    const store = new GappyStore();
    const gateway = new StoreGateway(store);
    let now = 0;
    const seen: number[] = [];
    const feed = new PollingChangeFeed(gateway, { ...slowInterval, startAfter: 0, gapTimeoutMs: 1000, clock: () => now });

    await gateway.write('a', 1);
    await gateway.write('b', 1);
    await gateway.write('c', 1);
    store.hidden.add(2);

    await feed.start((record) => seen.push(record.sequence));
    expect(seen).toEqual([1]);

    now = 500;
    await feed.poll();
    expect(seen).toEqual([1]);

    store.hidden.clear();
    await feed.poll();
    await feed.stop();
    expect(seen).toEqual([1, 2, 3]);
    expect(feed.getSkipped()).toBe(0);
  });

  it('skips a sequence that never appears within the gap timeout', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = new GappyStore();
    const gateway = new StoreGateway(store);
    let now = 0;
    const seen: number[] = [];
    const feed = new PollingChangeFeed(gateway, { ...slowInterval, startAfter: 0, gapTimeoutMs: 1000, clock: () => now });

    await gateway.write('a', 1);
    await gateway.write('b', 1);
    await gateway.write('c', 1);
    store.hidden.add(2);

    await feed.start((record) => seen.push(record.sequence));
    now = 1000;
    await feed.poll();
    await feed.stop();

    expect(seen).toEqual([1, 3]);
    expect(feed.getSkipped()).toBe(1);
    warn.mockRestore();
  });

  it('reports unhealthy while the store is down and recovers afterwards', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const store = new GappyStore();
    const gateway = new StoreGateway(store, { retry: { attempts: 1 } });
    const seen: number[] = [];
    const feed = new PollingChangeFeed(gateway, { ...slowInterval, startAfter: 0 });
    await feed.start((record) => seen.push(record.sequence));

    store.failReads = true;
    await gateway.write('a', 1);
    await feed.poll();
    expect(feed.isHealthy()).toBe(false);

    store.failReads = false;
    await feed.poll();
    await feed.stop();
    expect(feed.isHealthy()).toBe(true);
    expect(seen).toEqual([1]);
    warn.mockRestore();
    log.mockRestore();
  });
});

describe('WatchChangeFeed', () => {
  it('polls when the store has no native feed', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const gateway = new StoreGateway(new InMemoryDocumentStore());
    const seen: string[] = [];
    const feed = new WatchChangeFeed(gateway, { fallback: { intervalMs: 5 } });
    await feed.start((record) => seen.push(record.resource));

    await gateway.write('polled', 1);
    await vi.waitFor(() => expect(seen).toEqual(['polled']));
    await feed.stop();
    warn.mockRestore();
  });

  it('uses the native stream and falls back to polling when it breaks', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const store = new WatchableStore();
    const gateway = new StoreGateway(store);
    expect(gateway.supportsNativeFeed()).toBe(true);

    const seen: number[] = [];
    const feed = new WatchChangeFeed(gateway, { fallback: { intervalMs: 5 } });
    await feed.start((record) => seen.push(record.sequence));

    await gateway.write('a', 1);
    expect(seen).toEqual([1]);

    store.breakStream();
    await vi.waitFor(() => expect(store.unwatched).toBe(1));
    await gateway.write('a', 2);
    await vi.waitFor(() => expect(seen).toEqual([1, 2]));

    await feed.stop();
    error.mockRestore();
  });
});

describe('WatchChangeFeed startup', () => {
  it('delivers a commit made while the stream was opening', async () => {
    const store = new RacingStore();
    const gateway = new StoreGateway(store);
    const seen: number[] = [];
    const feed = new WatchChangeFeed(gateway);

    await feed.start((record) => seen.push(record.sequence));
    await gateway.write('r', 2);

    expect(seen).toEqual([1, 2]);
    await feed.stop();
  });

  it('delivers a commit once when both the log and the stream report it', async () => {
    const store = new RacingStore();
    store.replayOnWatch = true;
    const gateway = new StoreGateway(store);
    const seen: number[] = [];
    const feed = new WatchChangeFeed(gateway);

    await feed.start((record) => seen.push(record.sequence));
    await gateway.write('r', 2);

    expect(seen).toEqual([1, 2]);
    await feed.stop();
  });
});

describe('createChangeFeed', () => {
  it('builds the configured feed kind', () => {
    const gateway = new StoreGateway(new InMemoryDocumentStore());
    const settings = { pollIntervalMs: 200, gapTimeoutMs: 1000 };
    expect(createChangeFeed('local', gateway, settings)).toBeInstanceOf(LocalChangeFeed);
    expect(createChangeFeed('poll', gateway, settings)).toBeInstanceOf(PollingChangeFeed);
    expect(createChangeFeed('watch', gateway, settings)).toBeInstanceOf(WatchChangeFeed);
  });
});
