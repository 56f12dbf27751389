import { describe, expect, it } from 'vitest';
import { InMemoryVectorStore } from '@/services/providers/vector/in-memory-vector-store';

describe('InMemoryVectorStore', () => {
  it('ranks by normalized token overlap', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert([{ text: 'eco friendly cotton jacket' }, { text: 'waterproof wool coat' }]);

    const hits = await store.query('cotton jacket', 1);

    expect(hits).toEqual([{ id: 'inmemory-0', score: 1, payload: { text: 'eco friendly cotton jacket' } }]);
  });

  it('skips records without text and reports the stored count', async () => {
    const store = new InMemoryVectorStore();
    const stored = await store.upsert([{ text: '' }, { text: 'linen shirt', source: 'faq' }]);

    expect(stored).toBe(1);
    expect(store.size).toBe(1);
    expect(await store.query('linen', 5)).toEqual([
      { id: 'inmemory-0', score: 1 / Math.sqrt(2), payload: { text: 'linen shirt', source: 'faq' } },
    ]);
  });

  it('keeps insertion order for equal scores', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert([{ text: 'red shirt' }, { text: 'red hat' }, { text: 'blue hat' }]);

    const hits = await store.query('red', 5);

    expect(hits.map((h) => h.id)).toEqual(['inmemory-0', 'inmemory-1']);
  });

  it('returns no hits for empty or token-free queries', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert([{ text: 'organic cotton' }]);

    expect(await store.query('', 3)).toEqual([]);
    expect(await store.query('?!', 3)).toEqual([]);
    expect(await store.query('silk', 3)).toEqual([]);
  });

  it('accumulates records across upserts', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert([{ text: 'wool scarf' }]);
    await store.upsert([{ text: 'wool socks' }]);

    const hits = await store.query('wool socks', 2);

    expect(hits.map((h) => h.id)).toEqual(['inmemory-1', 'inmemory-0']);
  });
});
