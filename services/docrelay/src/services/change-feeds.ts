import type { StoreGateway } from '../store/store-gateway.js';
import type { Unwatch } from '../store/document-store.js';
import type { ChangeFeed, ChangeFeedKind, CommitListener, CommitRecord } from '../types/index.js';

/**
 * Receives commits from the gateway's in-process publish step.
 * Only sees writes made by this process.
 */
export class LocalChangeFeed implements ChangeFeed {
  readonly name = 'local';
  private readonly gateway: StoreGateway;
  private off: (() => void) | null = null;

  constructor(gateway: StoreGateway) {
    this.gateway = gateway;
  }

  async start(listener: CommitListener): Promise<void> {
    this.off?.();
    this.off = this.gateway.onCommit(listener);
  }

  async stop(): Promise<void> {
    this.off?.();
    this.off = null;
  }

  isHealthy(): boolean {
    return this.off !== null;
  }
}

export interface PollingFeedOptions {
  intervalMs?: number;
  gapTimeoutMs?: number;
  batchSize?: number;
  /** Sequence to resume after; defaults to the store's latest sequence at start. */
  startAfter?: number;
  clock?: () => number;
}

/**
 * Tails the store change log through the gateway.
 *
 * The cursor only advances over contiguous sequences. A missing sequence is waited on
 * for gapTimeoutMs (a concurrent writer may not have inserted it yet) and then skipped.
 * Store failures mark the feed unhealthy; polling continues until the store recovers.
 */
export class PollingChangeFeed implements ChangeFeed {
  readonly name = 'poll';
  private readonly gateway: StoreGateway;
  private readonly intervalMs: number;
  private readonly gapTimeoutMs: number;
  private readonly batchSize: number;
  private readonly clock: () => number;
  private cursor: number | null;
  private gapSince: number | null = null;
  private listener: CommitListener | null = null;
  private timer: NodeJS.Timeout | null = null;
  private polling: Promise<void> | null = null;
  private healthy = true;
  private skipped = 0;

  constructor(gateway: StoreGateway, options: PollingFeedOptions = {}) {
    this.gateway = gateway;
    this.intervalMs = options.intervalMs ?? 200;
    this.gapTimeoutMs = options.gapTimeoutMs ?? 1000;
    this.batchSize = options.batchSize ?? 500;
    this.clock = options.clock ?? Date.now;
    this.cursor = options.startAfter ?? null;
  }

  async start(listener: CommitListener): Promise<void> {
    this.listener = listener;
    await this.poll();
    this.schedule();
  }

  async stop(): Promise<void> {
    this.listener = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.polling;
  }

  isHealthy(): boolean {
    return this.healthy;
  }

  getCursor(): number | null {
    return this.cursor;
  }

  getSkipped(): number {
    return this.skipped;
  }

  /**
   * Run one poll cycle. Concurrent calls share the cycle in flight.
   */
  poll(): Promise<void> {
    if (!this.polling) {
      this.polling = this.runPoll().finally(() => {
        this.polling = null;
      });
    }
    return this.polling;
  }

  private schedule(): void {
    if (!this.listener) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.poll()
        .catch((error) => console.error('[poll-feed] unexpected poll failure', error))
        .finally(() => this.schedule());
    }, this.intervalMs);
    this.timer.unref();
  }

  private async runPoll(): Promise<void> {
    try {
      if (this.cursor === null) {
        this.cursor = await this.gateway.latestSequence();
        this.markHealthy();
        return;
      }

      let more = true;
      while (more && this.listener) {
        const records = await this.gateway.changesSince(this.cursor, this.batchSize);
        const consumed = this.consume(records);
        more = consumed === this.batchSize;
      }
      this.markHealthy();
    } catch (error) {
      if (this.healthy) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`⚠️ Change log polling failed, delivery is stale until the store recovers: ${message}`);
      }
      this.healthy = false;
    }
  }

  /** Returns how many records advanced the cursor. */
  private consume(records: CommitRecord[]): number {
    let consumed = 0;
    for (const record of records) {
      const cursor = this.cursor ?? 0;
      if (record.sequence <= cursor) continue;

      if (record.sequence > cursor + 1) {
        const now = this.clock();
        if (this.gapSince === null) {
          this.gapSince = now;
          break;
        }
        if (now - this.gapSince < this.gapTimeoutMs) {
          break;
        }
        this.skipped += record.sequence - cursor - 1;
        console.warn(`Skipping change log sequences ${cursor + 1}..${record.sequence - 1} after ${this.gapTimeoutMs}ms`);
      }

      this.gapSince = null;
      this.cursor = record.sequence;
      consumed++;
      this.listener?.(record);
    }
    return consumed;
  }

  private markHealthy(): void {
    if (!this.healthy) {
      console.log('✅ Change log polling recovered');
    }
    this.healthy = true;
  }
}

export interface WatchFeedOptions {
  fallback?: PollingFeedOptions;
}

/**
 * Uses the store's native change stream. Falls back to polling when the store has none,
 * or when the stream fails, resuming after the last sequence it delivered.
 *
 * The stream only reports commits made after it opens, so once it is open the change
 * log is read from the starting sequence to pick up commits that landed in between.
 * Stream events arriving during that read are held and merged in sequence order.
 */
export class WatchChangeFeed implements ChangeFeed {
  readonly name = 'watch';
  private readonly gateway: StoreGateway;
  private readonly fallbackOptions: PollingFeedOptions;
  private unwatch: Unwatch | null = null;
  private fallback: PollingChangeFeed | null = null;
  private lastSequence = 0;
  private healthy = true;

  constructor(gateway: StoreGateway, options: WatchFeedOptions = {}) {
    this.gateway = gateway;
    this.fallbackOptions = options.fallback ?? {};
  }

  async start(listener: CommitListener): Promise<void> {
    const startedAfter = await this.gateway.latestSequence();
    this.lastSequence = startedAfter;

    if (!this.gateway.supportsNativeFeed()) {
      console.warn(`Store ${this.gateway.storeName} has no native change feed, polling instead`);
      await this.startFallback(listener);
      return;
    }

    // Sequences already delivered from the log; the stream may report them again.
    const backfilled = new Set<number>();
    let held: CommitRecord[] | null = [];
    const emit = (commit: CommitRecord): void => {
      this.lastSequence = Math.max(this.lastSequence, commit.sequence);
      listener(commit);
    };
    const forward: CommitListener = (commit) => {
      if (held) {
        held.push(commit);
      } else if (!backfilled.delete(commit.sequence)) {
        emit(commit);
      }
    };

    this.unwatch = await this.gateway.watch(startedAfter, forward, (error) => {
      console.error('❌ Change stream failed, switching to polling:', error.message);
      this.healthy = false;
      this.closeStream()
        .then(() => this.startFallback(listener))
        .catch((fallbackError) => console.error('Failed to start polling fallback:', fallbackError));
    });

    const missed = await this.readLogAfter(startedAfter);
    const pending = held ?? [];
    held = null;
    const merged = new Map<number, CommitRecord>();
    for (const commit of missed) {
      merged.set(commit.sequence, commit);
      backfilled.add(commit.sequence);
    }
    for (const commit of pending) {
      if (backfilled.delete(commit.sequence)) continue;
      merged.set(commit.sequence, commit);
    }
    for (const commit of Array.from(merged.values()).sort((a, b) => a.sequence - b.sequence)) {
      emit(commit);
    }
  }

  async stop(): Promise<void> {
    await this.closeStream();
    if (this.fallback) {
      await this.fallback.stop();
      this.fallback = null;
    }
  }

  isHealthy(): boolean {
    return this.fallback ? this.fallback.isHealthy() : this.healthy;
  }

  private async readLogAfter(sequence: number): Promise<CommitRecord[]> {
    const batchSize = this.fallbackOptions.batchSize ?? 500;
    const records: CommitRecord[] = [];
    let cursor = sequence;
    for (;;) {
      const batch = await this.gateway.changesSince(cursor, batchSize);
      records.push(...batch);
      const last = batch.at(-1);
      if (batch.length < batchSize || !last) return records;
      cursor = last.sequence;
    }
  }

  private async startFallback(listener: CommitListener): Promise<void> {
    this.fallback = new PollingChangeFeed(this.gateway, { ...this.fallbackOptions, startAfter: this.lastSequence });
    await this.fallback.start(listener);
  }

  private async closeStream(): Promise<void> {
    const unwatch = this.unwatch;
    this.unwatch = null;
    if (unwatch) {
      await unwatch();
    }
  }
}

export interface ChangeFeedSettings {
  pollIntervalMs: number;
  gapTimeoutMs: number;
}

export function createChangeFeed(kind: ChangeFeedKind, gateway: StoreGateway, settings: ChangeFeedSettings): ChangeFeed {
  const polling: PollingFeedOptions = {
    intervalMs: settings.pollIntervalMs,
    gapTimeoutMs: settings.gapTimeoutMs,
  };
  switch (kind) {
    case 'local':
      return new LocalChangeFeed(gateway);
    case 'poll':
      return new PollingChangeFeed(gateway, polling);
    case 'watch':
      return new WatchChangeFeed(gateway, { fallback: polling });
  }
}
