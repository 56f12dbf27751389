// src/services/pipeline-deps.ts — process-scoped dependencies shared by the HTTP routes and scripts
import { fileURLToPath } from 'node:url';
import { type AppConfig, getConfig } from '@/config/app.config';
import { Chunker } from './chunker';
import { createLanguageModel } from './llm-client';
import { childLogger, errorMessage } from './logger';
import { Tracing } from './observability/tracing';
import type { CatalogProvider } from './providers/catalog/catalog-provider';
import { JsonlCatalogProvider } from './providers/catalog/jsonl-catalog';
import { createVectorStore } from './providers/vector/create-vector-store';
import { RagPipeline, type RagPipelineDeps } from './rag-pipeline';

const log = childLogger('pipeline-deps');

/** Repository root, so relative data paths also work when the process starts elsewhere. */
const PROJECT_ROOT = fileURLToPath(new URL('../../../', import.meta.url));

export interface PipelineContainer {
  config: AppConfig;
  pipeline: RagPipeline;
  catalog: CatalogProvider | null;
  tracing: Tracing;
}

async function loadCatalog(config: AppConfig): Promise<CatalogProvider | null> {
  try {
    return await JsonlCatalogProvider.load(config.catalog.path, [process.cwd(), PROJECT_ROOT]);
  } catch (err) {
    log.warn('catalog:unavailable', { path: config.catalog.path, error: errorMessage(err) });
    return null;
  }
}

/**
 * Builds every collaborator once. Anything passed in `overrides` replaces the configured one,
 * which is how tests swap in stubs.
 */
export async function buildPipelineDeps(
  config: AppConfig,
  overrides: Partial<RagPipelineDeps> = {},
): Promise<PipelineContainer> {
  const tracing =
    overrides.tracing ?? new Tracing({ endpoint: config.tracing.endpoint, projectName: config.tracing.projectName });
  const deps: RagPipelineDeps = {
    tracing,
    chunker:
      overrides.chunker ??
      new Chunker({ chunkSize: config.chunking.chunkSize, chunkOverlap: config.chunking.chunkOverlap }),
    vectorStore:
      overrides.vectorStore !== undefined
        ? overrides.vectorStore
        : await createVectorStore({ vectorStore: config.vectorStore, openAiApiKey: config.llm.apiKey }),
    catalog: overrides.catalog !== undefined ? overrides.catalog : await loadCatalog(config),
    llm: overrides.llm !== undefined ? overrides.llm : createLanguageModel(config.llm),
  };
  log.info('pipeline:ready', {
    vectorStore: deps.vectorStore?.name ?? 'none',
    catalog: deps.catalog ? 'loaded' : 'none',
    llm: deps.llm?.model ?? 'extractive-fallback',
  });
  return { config, pipeline: new RagPipeline(deps), catalog: deps.catalog, tracing };
}

let cachedDeps: Promise<PipelineContainer> | null = null;

export function getPipelineDeps(): Promise<PipelineContainer> {
  if (!cachedDeps) cachedDeps = buildPipelineDeps(getConfig());
  return cachedDeps;
}
