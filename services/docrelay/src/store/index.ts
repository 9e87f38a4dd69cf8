import type { StoreConfig } from '../config/index.js';
import { InMemoryDocumentStore, type DocumentStore } from './document-store.js';
import { MongoDocumentStore } from './mongo-document-store.js';
import { StoreGateway } from './store-gateway.js';

export { InMemoryDocumentStore, type DocumentStore } from './document-store.js';
export { MongoDocumentStore } from './mongo-document-store.js';
export { StoreGateway } from './store-gateway.js';

/**
 * Pick the backend from the store URI. `memory://` keeps everything in this process,
 * so the HTTP and socket services only see each other when they run together.
 */
export function createDocumentStore(config: StoreConfig): DocumentStore {
  if (config.uri.startsWith('memory:')) {
    console.warn('⚠️ Using in-memory document store; state is lost on restart and not shared between processes');
    return new InMemoryDocumentStore();
  }
  return new MongoDocumentStore({
    uri: config.uri,
    database: config.database,
    maxPoolSize: config.maxPoolSize,
  });
}

export function createStoreGateway(config: StoreConfig, store: DocumentStore = createDocumentStore(config)): StoreGateway {
  return new StoreGateway(store, {
    retry: { attempts: config.retryAttempts, baseDelayMs: config.retryBaseDelayMs },
  });
}
