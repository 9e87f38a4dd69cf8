import { SubscriberDisconnectedError } from '../core/errors.js';
import type {
  ChangeEvent,
  ChangeFeed,
  CommitRecord,
  JsonValue,
  NotifierStats,
  ResourceId,
} from '../types/index.js';

export interface ChangeNotifierOptions {
  /** Events a subscriber may have buffered before it is dropped. */
  bufferSize?: number;
  /** How long a revision that arrived ahead of a gap waits for the gap to fill. */
  reorderWindowMs?: number;
}

type DisconnectListener = (error: SubscriberDisconnectedError) => void;

/**
 * One subscriber's view of one resource: a lazy, unbounded async sequence of events.
 * Not seekable; once ended it can only be replaced by subscribing again.
 */
export class ChangeSubscription implements AsyncIterableIterator<ChangeEvent> {
  readonly id: number;
  readonly resource: ResourceId;
  private readonly bufferSize: number;
  private readonly detach: (subscription: ChangeSubscription) => void;
  private buffer: ChangeEvent[] = [];
  private waiter: {
    resolve: (result: IteratorResult<ChangeEvent>) => void;
    reject: (error: Error) => void;
  } | null = null;
  private state: 'open' | 'ended' | 'failed' = 'open';
  private failure: SubscriberDisconnectedError | null = null;
  private readonly disconnectListeners = new Set<DisconnectListener>();

  constructor(
    id: number,
    resource: ResourceId,
    bufferSize: number,
    detach: (subscription: ChangeSubscription) => void
  ) {
    this.id = id;
    this.resource = resource;
    this.bufferSize = bufferSize;
    this.detach = detach;
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  get buffered(): number {
    return this.buffer.length;
  }

  /**
   * Hand an event to this subscriber. Never blocks; returns false when the
   * subscriber overflowed and was dropped.
   */
  push(event: ChangeEvent): boolean {
    if (this.state !== 'open') return true;

    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve({ value: event, done: false });
      return true;
    }

    if (this.buffer.length >= this.bufferSize) {
      this.fail(new SubscriberDisconnectedError(this.resource, this.bufferSize));
      return false;
    }

    this.buffer.push(event);
    return true;
  }

  next(): Promise<IteratorResult<ChangeEvent>> {
    const event = this.buffer.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.state === 'failed' && this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.state === 'ended') {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error(`Subscription ${this.id} already has a pending read`));
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  async return(): Promise<IteratorResult<ChangeEvent>> {
    this.unsubscribe();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<ChangeEvent> {
    return this;
  }

  /**
   * Stop receiving events. Buffered events are discarded. Safe to call repeatedly.
   */
  unsubscribe(): void {
    this.end();
    this.buffer = [];
  }

  /**
   * End the subscription and hand back whatever was still buffered.
   */
  drain(): ChangeEvent[] {
    const pending = this.buffer;
    this.buffer = [];
    this.end();
    return pending;
  }

  onDisconnect(listener: DisconnectListener): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  private end(): void {
    if (this.state !== 'open') return;
    this.state = 'ended';
    this.detach(this);
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  private fail(error: SubscriberDisconnectedError): void {
    this.state = 'failed';
    this.failure = error;
    this.buffer = [];
    this.detach(this);
    if (this.waiter) {
      const { reject } = this.waiter;
      this.waiter = null;
      reject(error);
    }
    for (const listener of this.disconnectListeners) {
      try {
        listener(error);
      } catch (listenerError) {
        console.error('[change-notifier] disconnect listener threw', listenerError);
      }
    }
  }
}

interface ResourceChannel {
  resource: ResourceId;
  subscribers: Set<ChangeSubscription>;
  lastRevision: number | null;
  pending: Map<number, CommitRecord>;
  gapTimer: NodeJS.Timeout | null;
}

function deepFreeze(value: JsonValue): JsonValue {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Turns committed writes into ordered per-resource event streams.
 *
 * Each resource channel keeps the last published revision; duplicates and stale
 * revisions are dropped, and revisions that arrive ahead of a gap are held for at most
 * reorderWindowMs. publish() never waits on a subscriber: a subscriber that cannot keep
 * up overflows its buffer and is disconnected.
 */
export class ChangeNotifier {
  private readonly channels = new Map<ResourceId, ResourceChannel>();
  private readonly feeds: ChangeFeed[] = [];
  private readonly bufferSize: number;
  private readonly reorderWindowMs: number;
  private nextSubscriptionId = 1;
  private counters = { published: 0, duplicates: 0, reordered: 0, overflows: 0 };

  constructor(options: ChangeNotifierOptions = {}) {
    this.bufferSize = options.bufferSize ?? 256;
    this.reorderWindowMs = options.reorderWindowMs ?? 500;
  }

  subscribe(resource: ResourceId): ChangeSubscription {
    let channel = this.channels.get(resource);
    if (!channel) {
      channel = { resource, subscribers: new Set(), lastRevision: null, pending: new Map(), gapTimer: null };
      this.channels.set(resource, channel);
    }

    const subscription = new ChangeSubscription(
      this.nextSubscriptionId++,
      resource,
      this.bufferSize,
      (sub) => this.detach(sub)
    );
    channel.subscribers.add(subscription);
    return subscription;
  }

  /**
   * Entry point for change feeds. Commits for resources nobody watches are ignored.
   */
  publish(commit: CommitRecord): void {
    const channel = this.channels.get(commit.resource);
    if (!channel) return;

    if (channel.lastRevision !== null && commit.revision <= channel.lastRevision) {
      this.counters.duplicates++;
      return;
    }

    if (channel.lastRevision === null || commit.revision === channel.lastRevision + 1) {
      this.emit(channel, commit);
      this.releaseContiguous(channel);
      return;
    }

    if (channel.pending.has(commit.revision)) {
      this.counters.duplicates++;
      return;
    }
    channel.pending.set(commit.revision, commit);
    this.counters.reordered++;
    this.armGapTimer(channel);
  }

  async attach(feed: ChangeFeed): Promise<void> {
    await feed.start((commit) => this.publish(commit));
    this.feeds.push(feed);
    console.log(`📡 Change feed attached: ${feed.name}`);
  }

  feedsHealthy(): boolean {
    return this.feeds.every((feed) => feed.isHealthy());
  }

  getFeedNames(): string[] {
    return this.feeds.map((feed) => feed.name);
  }

  subscriberCount(resource: ResourceId): number {
    return this.channels.get(resource)?.subscribers.size ?? 0;
  }

  getStats(): NotifierStats {
    let subscribers = 0;
    for (const channel of this.channels.values()) {
      subscribers += channel.subscribers.size;
    }
    return {
      resources: this.channels.size,
      subscribers,
      ...this.counters,
    };
  }

  /**
   * Stop every feed and end every subscription.
   */
  async close(): Promise<void> {
    const feeds = this.feeds.splice(0);
    for (const feed of feeds) {
      try {
        await feed.stop();
      } catch (error) {
        console.error(`Error stopping change feed ${feed.name}:`, error);
      }
    }
    for (const channel of Array.from(this.channels.values())) {
      for (const subscription of Array.from(channel.subscribers)) {
        subscription.unsubscribe();
      }
    }
    this.channels.clear();
  }

  private emit(channel: ResourceChannel, commit: CommitRecord): void {
    const event: ChangeEvent = Object.freeze({
      resource: commit.resource,
      revision: commit.revision,
      payload: deepFreeze(commit.payload),
      deleted: commit.deleted,
      committedAt: commit.committedAt,
    });
    channel.lastRevision = commit.revision;
    this.counters.published++;

    for (const subscription of Array.from(channel.subscribers)) {
      if (!subscription.push(event)) {
        this.counters.overflows++;
        console.warn(`Subscriber ${subscription.id} on ${channel.resource} overflowed and was disconnected`);
      }
    }
  }

  private releaseContiguous(channel: ResourceChannel): void {
    while (channel.lastRevision !== null) {
      const next = channel.pending.get(channel.lastRevision + 1);
      if (!next) break;
      channel.pending.delete(next.revision);
      this.emit(channel, next);
    }
    if (channel.pending.size === 0) {
      this.clearGapTimer(channel);
    }
  }

  private armGapTimer(channel: ResourceChannel): void {
    if (this.reorderWindowMs === 0) {
      this.flushPending(channel);
      return;
    }
    if (channel.gapTimer) return;
    channel.gapTimer = setTimeout(() => {
      channel.gapTimer = null;
      this.flushPending(channel);
    }, this.reorderWindowMs);
    channel.gapTimer.unref();
  }

  /** Give up on the gap: publish held revisions in ascending order. */
  private flushPending(channel: ResourceChannel): void {
    const held = Array.from(channel.pending.values()).sort((a, b) => a.revision - b.revision);
    channel.pending.clear();
    for (const commit of held) {
      if (channel.lastRevision === null || commit.revision > channel.lastRevision) {
        this.emit(channel, commit);
      }
    }
  }

  private clearGapTimer(channel: ResourceChannel): void {
    if (channel.gapTimer) {
      clearTimeout(channel.gapTimer);
      channel.gapTimer = null;
    }
  }

  private detach(subscription: ChangeSubscription): void {
    const channel = this.channels.get(subscription.resource);
    if (!channel) return;
    channel.subscribers.delete(subscription);
    if (channel.subscribers.size === 0) {
      this.clearGapTimer(channel);
      this.channels.delete(subscription.resource);
    }
  }
}
