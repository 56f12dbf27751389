// Picks the retrieval backend once at startup: Weaviate when configured and reachable, else lexical.
import type { AppConfig } from '@/config/app.config';
import { childLogger, errorMessage } from '@/services/logger';
import { VectorStoreUnavailableError } from '@/utils/errors';
import { InMemoryVectorStore } from './in-memory-vector-store';
import type { VectorStore } from './vector-store';
import { WeaviateVectorStore, type WeaviateStoreOptions } from './weaviate-vector-store';

const log = childLogger('vector-store');

export interface CreateVectorStoreOptions {
  vectorStore: AppConfig['vectorStore'];
  openAiApiKey?: string;
  /** Overrides the Weaviate connector, e.g. to inject a stub HTTP client. */
  connect?: (options: WeaviateStoreOptions) => Promise<VectorStore>;
}

/**
 * A connection failure is treated like an unconfigured service: the lexical store takes over for
 * the lifetime of the process. Returns null when neither backend is allowed.
 */
export async function createVectorStore(options: CreateVectorStoreOptions): Promise<VectorStore | null> {
  const { vectorStore: cfg } = options;
  const connect = options.connect ?? WeaviateVectorStore.connect;

  if (cfg.url) {
    try {
      return await connect({
        url: cfg.url,
        apiKey: cfg.apiKey,
        openAiApiKey: options.openAiApiKey,
        collectionName: cfg.collectionName,
        embeddingsModel: cfg.embeddingsModel,
        timeoutMs: cfg.timeoutMs,
      });
    } catch (err) {
      if (!(err instanceof VectorStoreUnavailableError)) throw err;
      log.warn('vector-store:weaviate_unavailable', { url: cfg.url, error: errorMessage(err) });
    }
  } else {
    log.info('vector-store:weaviate_skipped', { reason: 'WEAVIATE_URL not set' });
  }

  if (!cfg.lexicalFallback) {
    log.warn('vector-store:none', { reason: 'lexical fallback disabled' });
    return null;
  }
  log.info('vector-store:lexical_fallback');
  return new InMemoryVectorStore();
}
