// Shared retrieval types for the RAG layer: store hits, chunk records and fused context items.
import { z } from 'zod';

export type Payload = Record<string, unknown>;

/** One ranked result from a VectorStore. `score` is only comparable within one backend. */
export interface RetrievalHit {
  id: string;
  score: number | null;
  payload: Payload;
}

/** A record handed to VectorStore.upsert; `text` is the indexed field, everything else rides along. */
export type StoreRecord = Payload & { text: string };

export type ChunkRecord = StoreRecord & {
  source_doc_id: string;
  section_index: number;
};

const baseContextItem = z.object({
  id: z.string().nullable(),
  title: z.string().nullable(),
  text: z.string(),
  score: z.number().finite().nullable(),
  source: z.string().min(1),
  metadata: z.record(z.unknown()),
});

export const contextItemSchema = z.discriminatedUnion('type', [
  baseContextItem.extend({ type: z.literal('document') }),
  baseContextItem.extend({ type: z.literal('product') }),
]);

export type ContextItem = z.infer<typeof contextItemSchema>;

/** Cap on catalog products fused into one answer context. */
export const MAX_PRODUCT_CONTEXT_ITEMS = 3;
/** Default number of documents requested from the store. */
export const DEFAULT_TOP_K = 5;
