import { describe, it, expect } from 'vitest';
import { ConflictError, NotFoundError } from '../core/errors.js';
import { InMemoryDocumentStore } from './document-store.js';

describe('InMemoryDocumentStore', () => {
  it('assigns revisions per resource and sequences across the log', async () => {
    const store = new InMemoryDocumentStore();
    const a1 = await store.commit({ resource: 'a', document: { n: 1 }, deleted: false });
    const b1 = await store.commit({ resource: 'b', document: { n: 1 }, deleted: false });
    const a2 = await store.commit({ resource: 'a', document: { n: 2 }, deleted: false });

    expect([a1.revision, b1.revision, a2.revision]).toEqual([1, 1, 2]);
    expect([a1.sequence, b1.sequence, a2.sequence]).toEqual([1, 2, 3]);
    expect(await store.latestSequence()).toBe(3);

    const doc = await store.get('a');
    expect(doc).toMatchObject({ resource: 'a', revision: 2, document: { n: 2 }, deleted: false });
  });

  it('enforces expectedRevision, counting a never-written resource as 0', async () => {
    const store = new InMemoryDocumentStore();
    await expect(store.commit({ resource: 'r', document: 1, deleted: false, expectedRevision: 1 })).rejects.toEqual(
      new ConflictError('r', 1, null)
    );

    await store.commit({ resource: 'r', document: 1, deleted: false, expectedRevision: 0 });
    await expect(
      store.commit({ resource: 'r', document: 2, deleted: false, expectedRevision: 0 })
    ).rejects.toBeInstanceOf(ConflictError);

    const second = await store.commit({ resource: 'r', document: 2, deleted: false, expectedRevision: 1 });
    expect(second.revision).toBe(2);
  });

  it('writes tombstones and refuses to delete what is already gone', async () => {
    const store = new InMemoryDocumentStore();
    await expect(store.commit({ resource: 'gone', document: null, deleted: true })).rejects.toBeInstanceOf(NotFoundError);

    await store.commit({ resource: 'gone', document: { x: 1 }, deleted: false });
    const tombstone = await store.commit({ resource: 'gone', document: { ignored: true }, deleted: true });
    expect(tombstone).toMatchObject({ revision: 2, payload: null, deleted: true });
    await expect(store.commit({ resource: 'gone', document: null, deleted: true })).rejects.toBeInstanceOf(NotFoundError);

    const recreated = await store.commit({ resource: 'gone', document: { x: 2 }, deleted: false, expectedRevision: 2 });
    expect(recreated.revision).toBe(3);
  });

  it('returns copies so callers cannot mutate stored state', async () => {
    const store = new InMemoryDocumentStore();
    const input = { items: ['apple'] };
    await store.commit({ resource: 'cart', document: input, deleted: false });
    input.items.push('pear');

    const first = await store.get('cart');
    expect(first?.document).toEqual({ items: ['apple'] });
  });

  it('pages the change log after a sequence and trims old entries', async () => {
    const store = new InMemoryDocumentStore({ maxLogEntries: 3 });
    for (let i = 1; i <= 5; i++) {
      await store.commit({ resource: `r${i}`, document: i, deleted: false });
    }

    const all = await store.changesSince(0, 10);
    expect(all.map((record) => record.sequence)).toEqual([3, 4, 5]);
    const page = await store.changesSince(3, 1);
    expect(page.map((record) => record.resource)).toEqual(['r4']);
    expect(store.getStats()).toEqual({ documents: 5, logEntries: 3, sequence: 5 });
  });
});
