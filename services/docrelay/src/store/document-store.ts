import { ConflictError, NotFoundError } from '../core/errors.js';
import type { CommitListener, CommitRecord, JsonValue, ResourceId, StoreDocument } from '../types/index.js';

export interface CommitInput {
  resource: ResourceId;
  document: JsonValue;
  deleted: boolean;
  expectedRevision?: number;
}

export type Unwatch = () => Promise<void>;

/**
 * Document store interface - contract for all backends.
 *
 * A commit atomically bumps the resource revision and appends a CommitRecord to the
 * store-wide change log. Revisions count from 1; a resource never written is at 0.
 */
export interface DocumentStore {
  readonly name: string;
  connect(): Promise<void>;
  close(): Promise<void>;
  ping(): Promise<boolean>;

  commit(input: CommitInput): Promise<CommitRecord>;
  get(resource: ResourceId): Promise<StoreDocument | null>;

  changesSince(sequence: number, limit: number): Promise<CommitRecord[]>;
  latestSequence(): Promise<number>;

  /** Native change feed, when the backend has one. */
  watch?(afterSequence: number, listener: CommitListener, onError: (error: Error) => void): Promise<Unwatch>;
}

/**
 * In-memory store (dev/local use and tests)
 */
export class InMemoryDocumentStore implements DocumentStore {
  readonly name = 'memory';
  private documents = new Map<ResourceId, StoreDocument>();
  private log: CommitRecord[] = [];
  private sequence = 0;
  private readonly maxLogEntries: number;

  constructor(options: { maxLogEntries?: number } = {}) {
    this.maxLogEntries = options.maxLogEntries ?? 10000;
  }

  async connect(): Promise<void> {}

  async close(): Promise<void> {}

  async ping(): Promise<boolean> {
    return true;
  }

  async commit(input: CommitInput): Promise<CommitRecord> {
    const current = this.documents.get(input.resource);
    const currentRevision = current?.revision ?? 0;

    if (input.deleted && (!current || current.deleted)) {
      throw new NotFoundError(input.resource);
    }
    if (input.expectedRevision !== undefined && input.expectedRevision !== currentRevision) {
      throw new ConflictError(input.resource, input.expectedRevision, current ? currentRevision : null);
    }

    const committedAt = new Date().toISOString();
    const revision = currentRevision + 1;
    const payload = input.deleted ? null : structuredClone(input.document);

    this.documents.set(input.resource, {
      resource: input.resource,
      revision,
      document: payload,
      deleted: input.deleted,
      updatedAt: committedAt,
    });

    const record: CommitRecord = {
      sequence: ++this.sequence,
      resource: input.resource,
      revision,
      payload,
      deleted: input.deleted,
      committedAt,
    };
    this.log.push(record);
    if (this.log.length > this.maxLogEntries) {
      this.log.splice(0, this.log.length - this.maxLogEntries);
    }
    return structuredClone(record);
  }

  async get(resource: ResourceId): Promise<StoreDocument | null> {
    const doc = this.documents.get(resource);
    return doc ? structuredClone(doc) : null;
  }

  async changesSince(sequence: number, limit: number): Promise<CommitRecord[]> {
    return this.log
      .filter((record) => record.sequence > sequence)
      .slice(0, limit)
      .map((record) => structuredClone(record));
  }

  async latestSequence(): Promise<number> {
    return this.sequence;
  }

  /**
   * Get store statistics
   */
  getStats(): { documents: number; logEntries: number; sequence: number } {
    return {
      documents: this.documents.size,
      logEntries: this.log.length,
      sequence: this.sequence,
    };
  }

  clear(): void {
    this.documents.clear();
    this.log = [];
    this.sequence = 0;
  }
}
