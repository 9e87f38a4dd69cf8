import {
  MongoClient,
  MongoError,
  MongoNetworkError,
  MongoServerError,
  MongoServerSelectionError,
  type ChangeStreamInsertDocument,
  type Collection,
  type Db,
} from 'mongodb';
import { ConflictError, DocRelayError, NotFoundError, StoreUnavailableError } from '../core/errors.js';
import type { CommitListener, CommitRecord, JsonValue, ResourceId, StoreDocument } from '../types/index.js';
import type { CommitInput, DocumentStore, Unwatch } from './document-store.js';

interface DocumentRecord {
  _id: string;
  revision: number;
  document: JsonValue;
  deleted: boolean;
  updatedAt: Date;
}

interface ChangeRecord {
  _id: number;
  resource: string;
  revision: number;
  payload: JsonValue;
  deleted: boolean;
  committedAt: Date;
}

interface CounterRecord {
  _id: string;
  seq: number;
}

export interface MongoStoreOptions {
  uri: string;
  database: string;
  maxPoolSize?: number;
  serverSelectionTimeoutMS?: number;
}

const DUPLICATE_KEY = 11000;
const CHANGE_COUNTER = 'changes';

/**
 * MongoDB-backed store (production).
 *
 * Documents live in `documents`, keyed by resource id. Every commit also takes the next
 * value of the `counters.changes` sequence and inserts the CommitRecord into `changes`,
 * which the socket service tails or watches.
 */
export class MongoDocumentStore implements DocumentStore {
  readonly name = 'mongodb';
  private readonly client: MongoClient;
  private readonly databaseName: string;
  private db: Db | null = null;

  constructor(options: MongoStoreOptions) {
    this.client = new MongoClient(options.uri, {
      maxPoolSize: options.maxPoolSize ?? 20,
      serverSelectionTimeoutMS: options.serverSelectionTimeoutMS ?? 2000,
      retryWrites: true,
    });
    this.databaseName = options.database;
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
      this.db = this.client.db(this.databaseName);
      console.log(`✅ Connected to MongoDB database "${this.databaseName}"`);
    } catch (error) {
      throw mapMongoError(error);
    }
  }

  async close(): Promise<void> {
    await this.client.close();
    this.db = null;
  }

  async ping(): Promise<boolean> {
    try {
      await this.database().command({ ping: 1 });
      return true;
    } catch {
      return false;
    }
  }

  async commit(input: CommitInput): Promise<CommitRecord> {
    try {
      const updated = await this.updateDocument(input);
      const sequence = await this.nextSequence();
      const change: ChangeRecord = {
        _id: sequence,
        resource: input.resource,
        revision: updated.revision,
        payload: updated.document,
        deleted: updated.deleted,
        committedAt: updated.updatedAt,
      };
      await this.changes().insertOne(change);
      return toCommitRecord(change);
    } catch (error) {
      throw mapMongoError(error);
    }
  }

  async get(resource: ResourceId): Promise<StoreDocument | null> {
    try {
      const record = await this.documents().findOne({ _id: resource });
      if (!record) return null;
      return {
        resource: record._id,
        revision: record.revision,
        document: record.document,
        deleted: record.deleted,
        updatedAt: record.updatedAt.toISOString(),
      };
    } catch (error) {
      throw mapMongoError(error);
    }
  }

  async changesSince(sequence: number, limit: number): Promise<CommitRecord[]> {
    try {
      const records = await this.changes()
        .find({ _id: { $gt: sequence } })
        .sort({ _id: 1 })
        .limit(limit)
        .toArray();
      return records.map(toCommitRecord);
    } catch (error) {
      throw mapMongoError(error);
    }
  }

  async latestSequence(): Promise<number> {
    try {
      const counter = await this.counters().findOne({ _id: CHANGE_COUNTER });
      return counter?.seq ?? 0;
    } catch (error) {
      throw mapMongoError(error);
    }
  }

  /**
   * Change stream over inserts into `changes`. Needs a replica set deployment.
   */
  async watch(afterSequence: number, listener: CommitListener, onError: (error: Error) => void): Promise<Unwatch> {
    const stream = this.changes().watch<ChangeRecord, ChangeStreamInsertDocument<ChangeRecord>>([
      { $match: { operationType: 'insert' } },
    ]);
    stream.on('change', (change: ChangeStreamInsertDocument<ChangeRecord>) => {
      if (change.fullDocument._id > afterSequence) {
        listener(toCommitRecord(change.fullDocument));
      }
    });
    stream.on('error', (error: Error) => onError(mapMongoError(error)));
    return async () => {
      await stream.close();
    };
  }

  private async updateDocument(input: CommitInput): Promise<DocumentRecord> {
    const { resource, expectedRevision } = input;
    const now = new Date();
    const documents = this.documents();

    if (input.deleted) {
      const filter = expectedRevision === undefined
        ? { _id: resource, deleted: false }
        : { _id: resource, deleted: false, revision: expectedRevision };
      const updated = await documents.findOneAndUpdate(
        filter,
        { $set: { document: null, deleted: true, updatedAt: now }, $inc: { revision: 1 } },
        { returnDocument: 'after' }
      );
      if (updated) return updated;
      const current = await documents.findOne({ _id: resource });
      if (!current || current.deleted) throw new NotFoundError(resource);
      throw new ConflictError(resource, expectedRevision ?? current.revision, current.revision);
    }

    if (expectedRevision === undefined) {
      const updated = await documents.findOneAndUpdate(
        { _id: resource },
        { $set: { document: input.document, deleted: false, updatedAt: now }, $inc: { revision: 1 } },
        { upsert: true, returnDocument: 'after' }
      );
      if (!updated) throw new StoreUnavailableError(`Upsert of ${resource} returned no document`);
      return updated;
    }

    if (expectedRevision === 0) {
      const created: DocumentRecord = { _id: resource, revision: 1, document: input.document, deleted: false, updatedAt: now };
      try {
        await documents.insertOne(created);
        return created;
      } catch (error) {
        if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
          const current = await documents.findOne({ _id: resource });
          throw new ConflictError(resource, 0, current?.revision ?? null);
        }
        throw error;
      }
    }

    const updated = await documents.findOneAndUpdate(
      { _id: resource, revision: expectedRevision },
      { $set: { document: input.document, deleted: false, updatedAt: now }, $inc: { revision: 1 } },
      { returnDocument: 'after' }
    );
    if (updated) return updated;
    const current = await documents.findOne({ _id: resource });
    throw new ConflictError(resource, expectedRevision, current?.revision ?? null);
  }

  private async nextSequence(): Promise<number> {
    const counter = await this.counters().findOneAndUpdate(
      { _id: CHANGE_COUNTER },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: 'after' }
    );
    if (!counter) throw new StoreUnavailableError('Change sequence counter unavailable');
    return counter.seq;
  }

  private database(): Db {
    if (!this.db) {
      throw new StoreUnavailableError('MongoDB client is not connected');
    }
    return this.db;
  }

  private documents(): Collection<DocumentRecord> {
    return this.database().collection<DocumentRecord>('documents');
  }

  private changes(): Collection<ChangeRecord> {
    return this.database().collection<ChangeRecord>('changes');
  }

  private counters(): Collection<CounterRecord> {
    return this.database().collection<CounterRecord>('counters');
  }
}

function toCommitRecord(record: ChangeRecord): CommitRecord {
  return {
    sequence: record._id,
    resource: record.resource,
    revision: record.revision,
    payload: record.payload,
    deleted: record.deleted,
    committedAt: record.committedAt.toISOString(),
  };
}

/**
 * Translate driver failures into the store error taxonomy.
 * Network and server-selection failures are transient; anything already classified passes through.
 */
export function mapMongoError(error: unknown): Error {
  if (error instanceof DocRelayError) return error;
  if (error instanceof MongoNetworkError || error instanceof MongoServerSelectionError) {
    return new StoreUnavailableError(`MongoDB unavailable: ${error.message}`, error);
  }
  if (error instanceof MongoError && error.hasErrorLabel('RetryableWriteError')) {
    return new StoreUnavailableError(`MongoDB write interrupted: ${error.message}`, error);
  }
  return error instanceof Error ? error : new Error(String(error));
}
