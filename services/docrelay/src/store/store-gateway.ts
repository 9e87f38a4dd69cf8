import { ConflictError, NotFoundError, StoreUnavailableError, ValidationError } from '../core/errors.js';
import { RESOURCE_ID_PATTERN } from '../core/schemas.js';
import { DEFAULT_RETRY_POLICY, sleep, withRetry, type RetryPolicy, type Sleep } from '../utils/retry.js';
import type {
  CommitListener,
  CommitRecord,
  JsonValue,
  ResourceId,
  StoreDocument,
  WriteOptions,
  WriteResult,
} from '../types/index.js';
import type { CommitInput, DocumentStore, Unwatch } from './document-store.js';

export interface StoreGatewayOptions {
  retry?: Partial<RetryPolicy>;
  sleep?: Sleep;
}

export interface GatewayStats {
  writes: number;
  reads: number;
  retries: number;
  conflicts: number;
  failures: number;
}

export function assertResourceId(resource: unknown): asserts resource is ResourceId {
  if (typeof resource !== 'string' || !RESOURCE_ID_PATTERN.test(resource)) {
    throw new ValidationError('Resource id must be 1-256 characters of letters, digits, ".", "_", ":" or "-"', {
      resource: typeof resource === 'string' ? resource : null,
    });
  }
}

export function assertExpectedRevision(value: unknown): asserts value is number | undefined {
  if (value !== undefined && (typeof value !== 'number' || !Number.isInteger(value) || value < 0)) {
    throw new ValidationError('expectedRevision must be a non-negative integer');
  }
}

/**
 * The single write path and read path to the shared document store.
 *
 * Transient failures (StoreUnavailableError) are retried with bounded exponential
 * backoff. Conflicts and missing documents go straight back to the caller. Every
 * successful write is published to in-process commit listeners right after it returns.
 */
export class StoreGateway {
  private readonly store: DocumentStore;
  private readonly policy: RetryPolicy;
  private readonly wait: Sleep;
  private readonly listeners = new Set<CommitListener>();
  private stats: GatewayStats = { writes: 0, reads: 0, retries: 0, conflicts: 0, failures: 0 };

  constructor(store: DocumentStore, options: StoreGatewayOptions = {}) {
    this.store = store;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.wait = options.sleep ?? sleep;
  }

  get storeName(): string {
    return this.store.name;
  }

  async connect(): Promise<void> {
    await this.withStoreRetry('connect', () => this.store.connect());
  }

  async close(): Promise<void> {
    this.listeners.clear();
    await this.store.close();
  }

  async ping(): Promise<boolean> {
    return this.store.ping();
  }

  /**
   * Write a document; resolves with the committed revision.
   */
  async write(resource: ResourceId, document: JsonValue, options: WriteOptions = {}): Promise<WriteResult> {
    assertResourceId(resource);
    assertExpectedRevision(options.expectedRevision);
    return this.commit({ resource, document, deleted: false, expectedRevision: options.expectedRevision });
  }

  /**
   * Write a tombstone revision. Subsequent reads throw NotFoundError.
   */
  async remove(resource: ResourceId, options: WriteOptions = {}): Promise<WriteResult> {
    assertResourceId(resource);
    assertExpectedRevision(options.expectedRevision);
    return this.commit({ resource, document: null, deleted: true, expectedRevision: options.expectedRevision });
  }

  async read(resource: ResourceId): Promise<StoreDocument> {
    assertResourceId(resource);
    this.stats.reads++;
    const doc = await this.withStoreRetry(`read ${resource}`, () => this.store.get(resource));
    if (!doc || doc.deleted) {
      throw new NotFoundError(resource);
    }
    return doc;
  }

  async changesSince(sequence: number, limit = 500): Promise<CommitRecord[]> {
    return this.withStoreRetry('changesSince', () => this.store.changesSince(sequence, limit));
  }

  async latestSequence(): Promise<number> {
    return this.withStoreRetry('latestSequence', () => this.store.latestSequence());
  }

  supportsNativeFeed(): boolean {
    return typeof this.store.watch === 'function';
  }

  /**
   * Open the store's native change feed. Callers check supportsNativeFeed() first.
   */
  async watch(afterSequence: number, listener: CommitListener, onError: (error: Error) => void): Promise<Unwatch> {
    if (!this.store.watch) {
      throw new StoreUnavailableError(`Store ${this.store.name} has no native change feed`);
    }
    return this.store.watch(afterSequence, listener, onError);
  }

  /**
   * Register an in-process listener for committed writes. Returns an unsubscribe function.
   */
  onCommit(listener: CommitListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getStats(): GatewayStats {
    return { ...this.stats };
  }

  private async commit(input: CommitInput): Promise<WriteResult> {
    this.stats.writes++;
    let record: CommitRecord;
    try {
      record = await this.withStoreRetry(`write ${input.resource}`, () => this.store.commit(input));
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        this.stats.failures++;
      } else if (error instanceof ConflictError) {
        this.stats.conflicts++;
      }
      throw error;
    }

    this.publish(record);
    return { resource: record.resource, revision: record.revision, committedAt: record.committedAt };
  }

  private publish(record: CommitRecord): void {
    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (error) {
        console.error('[store-gateway] commit listener threw', error);
      }
    }
  }

  private withStoreRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withRetry(
      operation,
      (error) => error instanceof StoreUnavailableError,
      this.policy,
      this.wait,
      (error, attempt, delayMs) => {
        this.stats.retries++;
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`Store ${label} failed (attempt ${attempt}/${this.policy.attempts}), retrying in ${delayMs}ms: ${message}`);
      }
    );
  }
}
