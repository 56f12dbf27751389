// Weaviate-backed store: REST for schema and batch writes, GraphQL nearText for similarity search.
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { childLogger, errorMessage } from '@/services/logger';
import { VectorStoreUnavailableError } from '@/utils/errors';
import type { Payload, RetrievalHit, StoreRecord } from '../retrieval-types';
import type { VectorQueryOptions, VectorStore } from './vector-store';

const log = childLogger('weaviate');

export interface WeaviateStoreOptions {
  url: string;
  collectionName: string;
  embeddingsModel: string;
  apiKey?: string;
  /** Forwarded to the text2vec-openai module. */
  openAiApiKey?: string;
  timeoutMs?: number;
  /** Pre-built client, mainly for tests. */
  http?: AxiosInstance;
}

const PRIMITIVE_TYPES = new Set([
  'text', 'text[]', 'string', 'string[]', 'int', 'int[]', 'number', 'number[]',
  'boolean', 'boolean[]', 'date', 'date[]', 'uuid', 'uuid[]',
]);

const classSchema = z.object({
  class: z.string(),
  properties: z
    .array(z.object({ name: z.string(), dataType: z.array(z.string()) }))
    .nullish(),
});

const batchResponseSchema = z.array(
  z
    .object({
      result: z.object({ errors: z.unknown().nullish() }).passthrough().nullish(),
    })
    .passthrough(),
);

const graphqlResponseSchema = z.object({
  data: z.object({ Get: z.record(z.array(z.record(z.unknown())).nullable()) }).nullish(),
  errors: z.array(z.object({ message: z.string() })).nullish(),
});

const additionalSchema = z.object({
  id: z.string(),
  distance: z.number().nullish(),
});

type WeaviateClass = z.infer<typeof classSchema>;

function buildClient(options: WeaviateStoreOptions): AxiosInstance {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (options.apiKey) headers.Authorization = `Bearer ${options.apiKey}`;
  if (options.openAiApiKey) headers['X-OpenAI-Api-Key'] = options.openAiApiKey;
  return axios.create({
    baseURL: options.url.replace(/\/+$/, ''),
    timeout: options.timeoutMs ?? 10_000,
    headers,
  });
}

function queryablePropertyNames(cls: WeaviateClass): string[] {
  return (cls.properties ?? [])
    .filter((p) => PRIMITIVE_TYPES.has(p.dataType[0] ?? ''))
    .map((p) => p.name);
}

/** Names Weaviate keeps for itself; an object carrying one is rejected. */
const RESERVED_PROPERTIES = new Set(['id', '_id', '_additional']);

function toProperties(record: StoreRecord): Payload {
  const properties: Payload = {};
  for (const [key, value] of Object.entries(record)) {
    if (value === null || value === undefined || RESERVED_PROPERTIES.has(key)) continue;
    properties[key] = value;
  }
  if (properties.doc_id === undefined && (typeof record.id === 'string' || typeof record.id === 'number')) {
    properties.doc_id = record.id;
  }
  return properties;
}

export class WeaviateVectorStore implements VectorStore {
  readonly name = 'weaviate';
  private collectionReady: Promise<void> | null = null;
  private propertyNames: string[] | null = null;

  private constructor(
    private readonly http: AxiosInstance,
    private readonly options: WeaviateStoreOptions,
  ) {}

  /** Probes the service; throws VectorStoreUnavailableError when it cannot be reached. */
  static async connect(options: WeaviateStoreOptions): Promise<WeaviateVectorStore> {
    const http = options.http ?? buildClient(options);
    try {
      await http.get('/v1/.well-known/ready');
    } catch (err) {
      throw new VectorStoreUnavailableError(`Weaviate at ${options.url} is not reachable: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    log.info('weaviate:connected', { url: options.url, collection: options.collectionName });
    return new WeaviateVectorStore(http, options);
  }

  get collectionName(): string {
    return this.options.collectionName;
  }

  /** Creates the class on first use; concurrent callers share one provisioning request. */
  ensureCollection(): Promise<void> {
    if (!this.collectionReady) {
      this.collectionReady = this.provisionCollection().catch((err: unknown) => {
        this.collectionReady = null;
        throw err instanceof VectorStoreUnavailableError
          ? err
          : new VectorStoreUnavailableError(
              `Could not provision Weaviate class ${this.collectionName}: ${errorMessage(err)}`,
              { cause: err },
            );
      });
    }
    return this.collectionReady;
  }

  async upsert(records: Iterable<StoreRecord>, options: VectorQueryOptions = {}): Promise<number> {
    const objects = Array.from(records)
      .filter((r) => typeof r.text === 'string' && r.text.length > 0)
      .map((r) => ({ class: this.collectionName, properties: toProperties(r) }));
    if (objects.length === 0) return 0;

    await this.ensureCollection();
    const res = await this.http.post('/v1/batch/objects', { objects }, { signal: options.signal });
    const results = batchResponseSchema.parse(res.data);
    const failed = results.filter((r) => r.result?.errors);
    if (failed.length > 0) {
      log.warn('weaviate:batch_partial_failure', { failed: failed.length, total: objects.length });
    }
    // Auto-schema may have added properties; re-read before the next query.
    this.propertyNames = null;
    return results.length - failed.length;
  }

  async query(text: string, topK: number, options: VectorQueryOptions = {}): Promise<RetrievalHit[]> {
    if (!text) return [];
    const properties = await this.loadPropertyNames(options.signal);
    if (properties === null) return [];

    const selection = [...properties, '_additional { id distance }'].join(' ');
    const gql = `{ Get { ${this.collectionName}(nearText: { concepts: [${JSON.stringify(text)}] }, limit: ${Math.max(1, topK)}) { ${selection} } } }`;
    const res = await this.http.post('/v1/graphql', { query: gql }, { signal: options.signal });
    const body = graphqlResponseSchema.parse(res.data);
    if (body.errors?.length) {
      throw new Error(`Weaviate query failed: ${body.errors.map((e) => e.message).join('; ')}`);
    }

    const rows = body.data?.Get[this.collectionName] ?? [];
    return rows.map((row) => {
      const { _additional, ...payload } = row;
      const extra = additionalSchema.parse(_additional);
      return { id: extra.id, score: extra.distance ?? null, payload };
    });
  }

  /** null when the class does not exist yet. */
  private async loadPropertyNames(signal?: AbortSignal): Promise<string[] | null> {
    if (this.propertyNames) return this.propertyNames;
    const cls = await this.fetchClass(signal);
    if (!cls) return null;
    this.propertyNames = queryablePropertyNames(cls);
    return this.propertyNames;
  }

  private async fetchClass(signal?: AbortSignal): Promise<WeaviateClass | null> {
    const res = await this.http.get(`/v1/schema/${this.collectionName}`, {
      signal,
      validateStatus: (status) => status === 200 || status === 404,
    });
    if (res.status === 404) return null;
    return classSchema.parse(res.data);
  }

  private async provisionCollection(): Promise<void> {
    const existing = await this.fetchClass();
    if (existing) {
      this.propertyNames = queryablePropertyNames(existing);
      return;
    }
    const res = await this.http.post(
      '/v1/schema',
      {
        class: this.collectionName,
        vectorizer: 'text2vec-openai',
        moduleConfig: { 'text2vec-openai': { model: this.options.embeddingsModel } },
      },
      // 422 is returned when another writer created the class first.
      { validateStatus: (status) => status === 200 || status === 422 },
    );
    if (res.status === 422 && !(await this.fetchClass())) {
      throw new VectorStoreUnavailableError(`Weaviate rejected class ${this.collectionName}`);
    }
    log.info('weaviate:collection_created', { collection: this.collectionName });
  }
}
