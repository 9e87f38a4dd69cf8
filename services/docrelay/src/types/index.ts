import type { Request, Response } from 'express';

// Core Types
export type ResourceId = string;

/**
 * Opaque JSON payload carried by documents and change events
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface StoreDocument {
  resource: ResourceId;
  revision: number;
  document: JsonValue;
  deleted: boolean;
  updatedAt: string;
}

export interface WriteOptions {
  /**
   * Omitted: last write wins. Otherwise the current revision must equal it
   * (0 for a resource that was never written; a tombstone keeps its revision).
   */
  expectedRevision?: number;
}

export interface WriteResult {
  resource: ResourceId;
  revision: number;
  committedAt: string;
}

/**
 * Change-log entry appended by the store for every committed write
 */
export interface CommitRecord {
  sequence: number;
  resource: ResourceId;
  revision: number;
  payload: JsonValue;
  deleted: boolean;
  committedAt: string;
}

export interface ChangeEvent {
  readonly resource: ResourceId;
  readonly revision: number;
  readonly payload: JsonValue;
  readonly deleted: boolean;
  readonly committedAt: string;
}

// Change Feed Types
export type ChangeFeedKind = 'local' | 'poll' | 'watch';

export type CommitListener = (commit: CommitRecord) => void;

export interface ChangeFeed {
  readonly name: string;
  start(listener: CommitListener): Promise<void>;
  stop(): Promise<void>;
  isHealthy(): boolean;
}

// Notifier Types
export interface NotifierStats {
  resources: number;
  subscribers: number;
  published: number;
  duplicates: number;
  reordered: number;
  overflows: number;
}

// Session Types
export type SessionState = 'connecting' | 'active' | 'closing' | 'closed';

export interface SessionInfo {
  id: string;
  clientId?: string;
  state: SessionState;
  subscriptions: ResourceId[];
  connectedAt: string;
  lastSeen: string;
  delivered: number;
  rejected: number;
}

export interface SessionStats {
  total: number;
  active: number;
  subscriptions: number;
  delivered: number;
  rejected: number;
  closedByReason: Record<string, number>;
}

// Express Handler Types
export type ExpressHandler = (req: Request, res: Response) => Promise<void>;
