import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { WeaviateVectorStore } from '@/services/providers/vector/weaviate-vector-store';
import { VectorStoreUnavailableError } from '@/utils/errors';

interface StubReply {
  status: number;
  data?: unknown;
}

type Route = (config: InternalAxiosRequestConfig) => StubReply;

/** axios instance whose requests are answered in process, keyed by "METHOD path". */
function stubClient(routes: Record<string, Route>) {
  const calls: Array<{ key: string; body: unknown }> = [];
  const http = axios.create({
    baseURL: 'http://weaviate.test',
    adapter: async (config) => {
      const key = `${(config.method ?? 'get').toUpperCase()} ${config.url ?? ''}`;
      calls.push({ key, body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined });
      const route = routes[key];
      if (!route) throw new AxiosError(`no route for ${key}`, 'ECONNREFUSED', config);
      const { status, data } = route(config);
      const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
      const validate = config.validateStatus ?? ((s: number) => s >= 200 && s < 300);
      if (!validate(status)) {
        throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, response);
      }
      return response;
    },
  });
  return { http, calls };
}

const ready: Route = () => ({ status: 200 });

function connect(routes: Record<string, Route>) {
  const stub = stubClient({ 'GET /v1/.well-known/ready': ready, ...routes });
  const store = WeaviateVectorStore.connect({
    url: 'http://weaviate.test',
    collectionName: 'KnowledgeChunk',
    embeddingsModel: 'text-embedding-3-small',
    http: stub.http,
  });
  return { store, calls: stub.calls };
}

describe('WeaviateVectorStore.connect', () => {
  it('raises VectorStoreUnavailableError when the service is unreachable', async () => {
    const { http } = stubClient({});
    await expect(
      WeaviateVectorStore.connect({
        url: 'http://weaviate.test',
        collectionName: 'KnowledgeChunk',
        embeddingsModel: 'text-embedding-3-small',
        http,
      }),
    ).rejects.toBeInstanceOf(VectorStoreUnavailableError);
  });
});

describe('WeaviateVectorStore.upsert', () => {
  it('creates the class on first write and counts accepted objects', async () => {
    const { store, calls } = connect({
      'GET /v1/schema/KnowledgeChunk': () => ({ status: 404 }),
      'POST /v1/schema': () => ({ status: 200, data: {} }),
      'POST /v1/batch/objects': () => ({
        status: 200,
        data: [{ result: {} }, { result: { errors: { error: [{ message: 'bad vector' }] } } }],
      }),
    });

    const stored = await (await store).upsert([
      { text: 'wash cold', source_doc_id: 'care', section_index: 0, color: null },
      { text: '' },
      { text: 'dry flat', source_doc_id: 'care', section_index: 1 },
    ]);

    expect(stored).toBe(1);
    expect(calls.map((c) => c.key)).toEqual([
      'GET /v1/.well-known/ready',
      'GET /v1/schema/KnowledgeChunk',
      'POST /v1/schema',
      'POST /v1/batch/objects',
    ]);
    expect(calls[2].body).toEqual({
      class: 'KnowledgeChunk',
      vectorizer: 'text2vec-openai',
      moduleConfig: { 'text2vec-openai': { model: 'text-embedding-3-small' } },
    });
    expect(calls[3].body).toEqual({
      objects: [
        { class: 'KnowledgeChunk', properties: { text: 'wash cold', source_doc_id: 'care', section_index: 0 } },
        { class: 'KnowledgeChunk', properties: { text: 'dry flat', source_doc_id: 'care', section_index: 1 } },
      ],
    });
  });

  it('does not touch the service when nothing has text', async () => {
    const { store, calls } = connect({});
    expect(await (await store).upsert([{ text: '' }])).toBe(0);
    expect(calls.map((c) => c.key)).toEqual(['GET /v1/.well-known/ready']);
  });

  it('moves a record id into doc_id and never sends reserved property names', async () => {
    const { store, calls } = connect({
      'GET /v1/schema/KnowledgeChunk': () => ({ status: 200, data: { class: 'KnowledgeChunk', properties: [] } }),
      'POST /v1/batch/objects': () => ({ status: 200, data: [{ result: {} }, { result: {} }] }),
    });

    await (await store).upsert([
      { id: 'faq-1', _id: 'x', _additional: { distance: 0 }, text: 'returns within 30 days' },
      { id: 7, doc_id: 'faq-2', text: 'free shipping' },
    ]);

    expect(calls[2].body).toEqual({
      objects: [
        { class: 'KnowledgeChunk', properties: { text: 'returns within 30 days', doc_id: 'faq-1' } },
        { class: 'KnowledgeChunk', properties: { doc_id: 'faq-2', text: 'free shipping' } },
      ],
    });
  });

  it('fails with VectorStoreUnavailableError when the class cannot be created, then retries', async () => {
    let schemaPosts = 0;
    const { store, calls } = connect({
      'GET /v1/schema/KnowledgeChunk': () => ({ status: 404 }),
      'POST /v1/schema': () => {
        schemaPosts++;
        return schemaPosts === 1 ? { status: 500, data: { error: 'disk full' } } : { status: 200, data: {} };
      },
      'POST /v1/batch/objects': () => ({ status: 200, data: [{ result: {} }] }),
    });
    const weaviate = await store;

    const failed = weaviate.upsert([{ text: 'wash cold' }]);
    await expect(failed).rejects.toBeInstanceOf(VectorStoreUnavailableError);
    await expect(failed).rejects.toThrow('Could not provision Weaviate class KnowledgeChunk');
    expect(calls.map((c) => c.key)).not.toContain('POST /v1/batch/objects');

    expect(await weaviate.upsert([{ text: 'wash cold' }])).toBe(1);
    expect(calls.filter((c) => c.key === 'POST /v1/schema')).toHaveLength(2);
  });

  it('accepts a class created concurrently by another writer', async () => {
    let schemaReads = 0;
    const { store, calls } = connect({
      'GET /v1/schema/KnowledgeChunk': () => {
        schemaReads++;
        return schemaReads === 1 ? { status: 404 } : { status: 200, data: { class: 'KnowledgeChunk', properties: [] } };
      },
      'POST /v1/schema': () => ({ status: 422, data: { error: [{ message: 'class already exists' }] } }),
      'POST /v1/batch/objects': () => ({ status: 200, data: [{ result: {} }] }),
    });

    expect(await (await store).upsert([{ text: 'wash cold' }])).toBe(1);
    expect(calls.map((c) => c.key)).toEqual([
      'GET /v1/.well-known/ready',
      'GET /v1/schema/KnowledgeChunk',
      'POST /v1/schema',
      'GET /v1/schema/KnowledgeChunk',
      'POST /v1/batch/objects',
    ]);
  });

  it('fails when the class is rejected and still absent', async () => {
    const { store } = connect({
      'GET /v1/schema/KnowledgeChunk': () => ({ status: 404 }),
      'POST /v1/schema': () => ({ status: 422, data: { error: [{ message: 'invalid class' }] } }),
    });

    await expect((await store).upsert([{ text: 'wash cold' }])).rejects.toThrow('Weaviate rejected class KnowledgeChunk');
  });
});

describe('WeaviateVectorStore.query', () => {
  const schema: Route = () => ({
    status: 200,
    data: {
      class: 'KnowledgeChunk',
      properties: [
        { name: 'text', dataType: ['text'] },
        { name: 'section_index', dataType: ['int'] },
        { name: 'related', dataType: ['Product'] },
      ],
    },
  });

  it('maps nearText rows to hits carrying the distance', async () => {
    const { store, calls } = connect({
      'GET /v1/schema/KnowledgeChunk': schema,
      'POST /v1/graphql': () => ({
        status: 200,
        data: {
          data: {
            Get: {
              KnowledgeChunk: [{ text: 'Linen softens with every wash.', section_index: 0, _additional: { id: 'uuid-1', distance: 0.12 } }],
            },
          },
        },
      }),
    });

    const hits = await (await store).query('linen care', 3);

    expect(hits).toEqual([{ id: 'uuid-1', score: 0.12, payload: { text: 'Linen softens with every wash.', section_index: 0 } }]);
    expect(calls[2].body).toEqual({
      query:
        '{ Get { KnowledgeChunk(nearText: { concepts: ["linen care"] }, limit: 3) { text section_index _additional { id distance } } } }',
    });
  });

  it('returns no hits before the class exists', async () => {
    const { store, calls } = connect({ 'GET /v1/schema/KnowledgeChunk': () => ({ status: 404 }) });

    expect(await (await store).query('linen', 3)).toEqual([]);
    expect(calls.map((c) => c.key)).not.toContain('POST /v1/graphql');
  });

  it('surfaces GraphQL errors', async () => {
    const { store } = connect({
      'GET /v1/schema/KnowledgeChunk': schema,
      'POST /v1/graphql': () => ({ status: 200, data: { errors: [{ message: 'boom' }] } }),
    });

    await expect((await store).query('linen', 3)).rejects.toThrow('Weaviate query failed: boom');
  });
});
