// Capability interface shared by the remote ANN store and the in-process lexical fallback.
import type { RetrievalHit, StoreRecord } from '../retrieval-types';

export interface VectorQueryOptions {
  signal?: AbortSignal;
}

export interface VectorStore {
  /** Backend label, surfaced as the `source` of document context items. */
  readonly name: string;
  /** Returns how many records were actually stored. */
  upsert(records: Iterable<StoreRecord>, options?: VectorQueryOptions): Promise<number>;
  /** Best-first hits; an empty query yields no hits. */
  query(text: string, topK: number, options?: VectorQueryOptions): Promise<RetrievalHit[]>;
}
