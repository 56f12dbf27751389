import { describe, expect, it, vi } from 'vitest';
import type { AppConfig } from '@/config/app.config';
import { createVectorStore } from '@/services/providers/vector/create-vector-store';
import { InMemoryVectorStore } from '@/services/providers/vector/in-memory-vector-store';
import type { VectorStore } from '@/services/providers/vector/vector-store';
import { VectorStoreUnavailableError } from '@/utils/errors';

function storeConfig(overrides: Partial<AppConfig['vectorStore']> = {}): AppConfig['vectorStore'] {
  return {
    url: undefined,
    apiKey: undefined,
    collectionName: 'KnowledgeChunk',
    timeoutMs: 1000,
    lexicalFallback: true,
    embeddingsModel: 'text-embedding-3-small',
    ...overrides,
  };
}

const remote: VectorStore = {
  name: 'weaviate',
  upsert: async () => 0,
  query: async () => [],
};

describe('createVectorStore', () => {
  it('uses the lexical store when no ANN service is configured', async () => {
    const connect = vi.fn(async () => remote);
    const store = await createVectorStore({ vectorStore: storeConfig(), connect });
    expect(store).toBeInstanceOf(InMemoryVectorStore);
    expect(connect).not.toHaveBeenCalled();
  });

  it('returns the connected store when the service answers', async () => {
    const connect = vi.fn(async () => remote);
    const store = await createVectorStore({
      vectorStore: storeConfig({ url: 'http://weaviate.test' }),
      openAiApiKey: 'test-secret',
      connect,
    });
    expect(store).toBe(remote);
    expect(connect).toHaveBeenCalledWith({
      url: 'http://weaviate.test',
      apiKey: undefined,
      openAiApiKey: 'test-secret',
      collectionName: 'KnowledgeChunk',
      embeddingsModel: 'text-embedding-3-small',
      timeoutMs: 1000,
    });
  });

  it('falls back to the lexical store when the service is unreachable', async () => {
    const connect = vi.fn(async (): Promise<VectorStore> => {
      throw new VectorStoreUnavailableError('down');
    });
    const store = await createVectorStore({ vectorStore: storeConfig({ url: 'http://weaviate.test' }), connect });
    expect(store).toBeInstanceOf(InMemoryVectorStore);
    expect(connect).toHaveBeenCalledTimes(1);
  });

  it('returns null when the lexical fallback is disabled', async () => {
    const connect = vi.fn(async (): Promise<VectorStore> => {
      throw new VectorStoreUnavailableError('down');
    });
    const store = await createVectorStore({
      vectorStore: storeConfig({ url: 'http://weaviate.test', lexicalFallback: false }),
      connect,
    });
    expect(store).toBeNull();
  });

  it('propagates unexpected connector failures', async () => {
    const connect = vi.fn(async (): Promise<VectorStore> => {
      throw new TypeError('bad options');
    });
    await expect(
      createVectorStore({ vectorStore: storeConfig({ url: 'http://weaviate.test' }), connect }),
    ).rejects.toThrow('bad options');
  });
});
