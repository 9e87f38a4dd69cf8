import { describe, it, expect, vi } from 'vitest';
import { ConflictError, NotFoundError, StoreUnavailableError, ValidationError } from '../core/errors.js';
import type { CommitRecord } from '../types/index.js';
import { InMemoryDocumentStore, type CommitInput } from './document-store.js';
import { StoreGateway } from './store-gateway.js';

class FlakyStore extends InMemoryDocumentStore {
  failures: number;
  commitCalls = 0;

  constructor(failures: number) {
    super();
    this.failures = failures;
  }

  override async commit(input: CommitInput): Promise<CommitRecord> {
    this.commitCalls++;
    if (this.failures > 0) {
      this.failures--;
      throw new StoreUnavailableError('connection reset');
    }
    return super.commit(input);
  }
}

const noWait = async (): Promise<void> => {};

describe('StoreGateway', () => {
  it('reads back what it wrote', async () => {
    const gateway = new StoreGateway(new InMemoryDocumentStore());
    const result = await gateway.write('cart-42', { items: ['apple'] });

    expect(result.resource).toBe('cart-42');
    expect(result.revision).toBe(1);
    const doc = await gateway.read('cart-42');
    expect(doc.revision).toBe(1);
    expect(doc.document).toEqual({ items: ['apple'] });
  });

  it('retries transient store failures with backoff', async () => {
    const store = new FlakyStore(2);
    const waits: number[] = [];
    const gateway = new StoreGateway(store, {
      retry: { attempts: 3, baseDelayMs: 10, factor: 2 },
      sleep: async (ms) => {
        waits.push(ms);
      },
    });

    const result = await gateway.write('a', 1);
    expect(result.revision).toBe(1);
    expect(store.commitCalls).toBe(3);
    expect(waits).toEqual([10, 20]);
    expect(gateway.getStats()).toMatchObject({ writes: 1, retries: 2, failures: 0 });
  });

  it('surfaces StoreUnavailableError once retries run out', async () => {
    const store = new FlakyStore(5);
    const gateway = new StoreGateway(store, { retry: { attempts: 3 }, sleep: noWait });

    await expect(gateway.write('a', 1)).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(store.commitCalls).toBe(3);
    expect(gateway.getStats().failures).toBe(1);
  });

  it('never retries a conflict', async () => {
    const store = new FlakyStore(0);
    const gateway = new StoreGateway(store, { sleep: noWait });
    await gateway.write('a', 1);

    await expect(gateway.write('a', 2, { expectedRevision: 5 })).rejects.toBeInstanceOf(ConflictError);
    expect(store.commitCalls).toBe(2);
    expect(gateway.getStats().conflicts).toBe(1);
  });

  it('treats tombstoned resources as missing', async () => {
    const gateway = new StoreGateway(new InMemoryDocumentStore());
    await gateway.write('doc', { v: 1 });
    const removed = await gateway.remove('doc');

    expect(removed.revision).toBe(2);
    await expect(gateway.read('doc')).rejects.toBeInstanceOf(NotFoundError);
    await expect(gateway.read('never')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects malformed resource ids and revisions before touching the store', async () => {
    const store = new FlakyStore(0);
    const gateway = new StoreGateway(store);

    await expect(gateway.write('has space', 1)).rejects.toBeInstanceOf(ValidationError);
    await expect(gateway.write('', 1)).rejects.toBeInstanceOf(ValidationError);
    await expect(gateway.write('ok', 1, { expectedRevision: -1 })).rejects.toBeInstanceOf(ValidationError);
    await expect(gateway.write('ok', 1, { expectedRevision: 1.5 })).rejects.toBeInstanceOf(ValidationError);
    expect(store.commitCalls).toBe(0);
  });

  it('publishes every commit to in-process listeners and survives a throwing one', async () => {
    const gateway = new StoreGateway(new InMemoryDocumentStore());
    const seen: Array<[string, number]> = [];
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    gateway.onCommit(() => {
      throw new Error('listener bug');
    });
    const off = gateway.onCommit((record) => seen.push([record.resource, record.revision]));

    await gateway.write('a', 1);
    await gateway.remove('a');
    off();
    await gateway.write('a', 3);

    expect(seen).toEqual([
      ['a', 1],
      ['a', 2],
    ]);
    expect(errorSpy).toHaveBeenCalled();
    errorSpy.mockRestore();
  });

  it('exposes the change log for feeds', async () => {
    const gateway = new StoreGateway(new InMemoryDocumentStore());
    await gateway.write('x', 1);
    await gateway.write('y', 1);

    expect(await gateway.latestSequence()).toBe(2);
    const records = await gateway.changesSince(1);
    expect(records.map((record) => record.resource)).toEqual(['y']);
    expect(gateway.supportsNativeFeed()).toBe(false);
  });
});
