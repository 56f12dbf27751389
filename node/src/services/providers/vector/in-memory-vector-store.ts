// In-process lexical retrieval used when the ANN service is not available. Nothing is persisted.
import type { RetrievalHit, StoreRecord } from '../retrieval-types';
import { overlapScore, tokenSet } from '../retrieval-vector-utils';
import type { VectorStore } from './vector-store';

interface ScoredDocument {
  index: number;
  score: number;
  record: StoreRecord;
}

export class InMemoryVectorStore implements VectorStore {
  readonly name = 'in-memory';
  private documents: readonly StoreRecord[] = [];

  get size(): number {
    return this.documents.length;
  }

  async upsert(records: Iterable<StoreRecord>): Promise<number> {
    const accepted: StoreRecord[] = [];
    for (const record of records) {
      if (typeof record.text !== 'string' || !record.text) continue;
      accepted.push(record);
    }
    if (accepted.length > 0) {
      // Swap in a new array so concurrent queries keep iterating their own snapshot.
      this.documents = [...this.documents, ...accepted];
    }
    return accepted.length;
  }

  async query(text: string, topK: number): Promise<RetrievalHit[]> {
    if (!text) return [];
    const queryTokens = tokenSet(text);
    if (queryTokens.size === 0) return [];

    const snapshot = this.documents;
    const scored: ScoredDocument[] = [];
    snapshot.forEach((record, index) => {
      const score = overlapScore(queryTokens, tokenSet(record.text));
      if (score > 0) scored.push({ index, score, record });
    });

    // Array#sort is stable, so equal scores keep insertion order.
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, Math.max(0, topK)).map((s) => ({
      id: `inmemory-${s.index}`,
      score: s.score,
      payload: s.record,
    }));
  }
}
