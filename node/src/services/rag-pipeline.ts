// src/services/rag-pipeline.ts — retrieve → generate pipeline over the knowledge base and the product catalog
//
// Stages run in a fixed order (start → retrieve → generate → done). Each stage degrades on its own:
// no vector store means no documents, no catalog means no products, no language model means an
// extractive answer. Only failures that leave nothing to answer with reach the caller.
import type { Chunker, SourceRecord } from './chunker';
import { childLogger, errorMessage } from './logger';
import type { LanguageModel } from './llm-client';
import type { Tracing } from './observability/tracing';
import { buildAnswerPrompt, buildExtractiveAnswer, NO_CONTEXT_ANSWER, renderContext } from './prompt-templates';
import { findProductContext } from './providers/catalog/catalog-context';
import type { CatalogProvider, ProductFilters } from './providers/catalog/catalog-provider';
import {
  type ContextItem,
  contextItemSchema,
  DEFAULT_TOP_K,
  type RetrievalHit,
} from './providers/retrieval-types';
import type { VectorStore } from './providers/vector/vector-store';
import { isAbortError, RetrievalUnavailableError, StoreUnavailableError, throwIfAborted } from '@/utils/errors';

const log = childLogger('rag-pipeline');

export interface RagPipelineDeps {
  vectorStore: VectorStore | null;
  catalog: CatalogProvider | null;
  llm: LanguageModel | null;
  tracing: Tracing;
  chunker: Chunker;
}

export interface StageOptions {
  signal?: AbortSignal;
}

export interface QueryOptions extends StageOptions {
  topK?: number;
  filters?: ProductFilters;
}

export interface QueryResult {
  answer: string;
  context: ContextItem[];
  traceId: string | null;
  traceUrl: string | null;
}

export type PipelineStage = 'start' | 'retrieve' | 'generate' | 'done';

interface PipelineState {
  stage: PipelineStage;
  question: string;
  topK: number;
  filters: ProductFilters | undefined;
  context: ContextItem[];
  answer: string | null;
}

const NEXT_STAGE: Record<Exclude<PipelineStage, 'done'>, PipelineStage> = {
  start: 'retrieve',
  retrieve: 'generate',
  generate: 'done',
};

function firstNonEmptyString(...values: unknown[]): string | null {
  for (const value of values) {
    if (typeof value === 'string' && value.trim()) return value;
  }
  return null;
}

export function documentHitToContextItem(hit: RetrievalHit, storeName: string): ContextItem {
  const { text, ...metadata } = hit.payload;
  return contextItemSchema.parse({
    type: 'document',
    id: hit.id,
    title: firstNonEmptyString(hit.payload.title, hit.payload.source_doc_id, hit.payload.doc_id),
    text: typeof text === 'string' ? text : '',
    score: hit.score,
    source: firstNonEmptyString(hit.payload.source) ?? storeName,
    metadata,
  });
}

export class RagPipeline {
  constructor(private readonly deps: RagPipelineDeps) {}

  /** True when some vector store can serve reads and writes. */
  get pipelineReady(): boolean {
    return this.deps.vectorStore !== null;
  }

  get tracing(): Tracing {
    return this.deps.tracing;
  }

  /** Chunks and stores records; throws StoreUnavailableError when no store exists. */
  async ingest(records: SourceRecord[], options: StageOptions = {}): Promise<number> {
    const store = this.deps.vectorStore;
    if (!store) throw new StoreUnavailableError();

    return this.deps.tracing.traceRun('rag_ingest', { record_count: records.length, store: store.name }, async () => {
      const chunks = await this.deps.tracing.span('chunk_documents', { count: records.length }, (span) => {
        const chunked = this.deps.chunker.transform(records);
        span.setAttribute('chunk_count', chunked.length);
        return chunked;
      });
      throwIfAborted(options.signal);
      return this.deps.tracing.span('vector_upsert', { count: chunks.length, store: store.name }, async (span) => {
        const stored = await store.upsert(chunks, { signal: options.signal });
        span.setAttribute('stored_count', stored);
        log.info('ingest:stored', { records: records.length, chunks: chunks.length, stored });
        return stored;
      });
    });
  }

  /** Documents in rank order, then at most three catalog products. */
  async retrieve(
    question: string,
    topK: number = DEFAULT_TOP_K,
    filters?: ProductFilters,
    options: StageOptions = {},
  ): Promise<ContextItem[]> {
    return this.deps.tracing.span(
      'retrieve',
      { 'openinference.span.kind': 'RETRIEVER', question, top_k: topK },
      async (span) => {
        const documents = await this.retrieveDocuments(question, topK, options.signal);
        throwIfAborted(options.signal);
        const products = await this.deps.tracing.span('catalog_lookup', { filters }, async (lookupSpan) => {
          const items = await findProductContext(this.deps.catalog, question, filters);
          lookupSpan.setAttribute('result_count', items.length);
          return items;
        });
        span.setAttributes({ document_count: documents.length, product_count: products.length });
        return [...documents, ...products];
      },
    );
  }

  /**
   * Never throws for a missing or failing model: the answer is then the sentinel (no usable
   * context) or an extractive summary of the first two snippets. Aborts still propagate.
   */
  async generate(question: string, items: ContextItem[], options: StageOptions = {}): Promise<string> {
    const context = renderContext(items);
    if (!context) return NO_CONTEXT_ANSWER;

    const llm = this.deps.llm;
    if (!llm) return buildExtractiveAnswer(items);

    const prompt = buildAnswerPrompt({ question, context });
    try {
      return await this.deps.tracing.span(
        'llm_generate',
        { 'openinference.span.kind': 'LLM', 'llm.model_name': llm.model, question_length: question.length },
        async (span) => {
          span.setInput(prompt);
          const answer = await llm.complete(prompt, { signal: options.signal });
          span.setOutput(answer);
          return answer;
        },
      );
    } catch (err) {
      if (isAbortError(err)) throw err;
      log.warn('llm:generate_failed', { model: llm.model, error: errorMessage(err) });
      return buildExtractiveAnswer(items);
    }
  }

  /** One traced request: retrieve, then generate exactly once. */
  async run(question: string, options: QueryOptions = {}): Promise<QueryResult> {
    const topK = options.topK ?? DEFAULT_TOP_K;
    return this.deps.tracing.traceRun(
      'rag_query',
      { 'openinference.span.kind': 'CHAIN', question, top_k: topK },
      async (trace, span) => {
        const state: PipelineState = {
          stage: 'start',
          question,
          topK,
          filters: options.filters,
          context: [],
          answer: null,
        };
        while (state.stage !== 'done') {
          const stage = state.stage;
          throwIfAborted(options.signal);
          await this.runStage(stage, state, options.signal);
          state.stage = NEXT_STAGE[stage];
        }
        const answer = state.answer ?? NO_CONTEXT_ANSWER;
        span.setOutput(answer);
        return { answer, context: state.context, traceId: trace.traceId, traceUrl: trace.traceUrl };
      },
    );
  }

  private async runStage(
    stage: Exclude<PipelineStage, 'done'>,
    state: PipelineState,
    signal?: AbortSignal,
  ): Promise<void> {
    switch (stage) {
      case 'start':
        return;
      case 'retrieve':
        state.context = await this.retrieve(state.question, state.topK, state.filters, { signal });
        return;
      case 'generate':
        state.answer ??= await this.generate(state.question, state.context, { signal });
        return;
    }
  }

  private async retrieveDocuments(question: string, topK: number, signal?: AbortSignal): Promise<ContextItem[]> {
    const store = this.deps.vectorStore;
    if (!store) return [];
    return this.deps.tracing.span('vector_retrieve', { query: question, top_k: topK, store: store.name }, async (span) => {
      let hits: RetrievalHit[];
      try {
        hits = await store.query(question, topK, { signal });
      } catch (err) {
        if (isAbortError(err)) throw err;
        log.error('retrieve:store_failed', { store: store.name, error: errorMessage(err) });
        throw new RetrievalUnavailableError(`Document retrieval from ${store.name} failed`, { cause: err });
      }
      span.setAttribute('hit_count', hits.length);
      return hits.map((hit) => documentHitToContextItem(hit, store.name));
    });
  }
}
