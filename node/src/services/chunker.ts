// src/services/chunker.ts — recursive character splitter used by ingestion and the ETL CLI
import type { ChunkRecord, Payload } from './providers/retrieval-types';
import { childLogger } from './logger';

const log = childLogger('chunker');

/** Paragraph, line, word, character. */
export const DEFAULT_SEPARATORS = ['\n\n', '\n', ' ', ''] as const;

export interface ChunkerOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  separators?: readonly string[];
}

export type SourceRecord = Payload & { text?: unknown };

/** Length in code points, so a surrogate pair counts once. */
function charLength(value: string): number {
  return Array.from(value).length;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Splits text into chunks of at most `chunkSize` characters, preferring the coarsest separator
 * present. Pieces keep their leading separator so joining them back is lossless; consecutive
 * chunks share up to `chunkOverlap` characters of whole pieces.
 */
export class Chunker {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  private readonly separators: readonly string[];

  constructor(options: ChunkerOptions = {}) {
    this.chunkSize = options.chunkSize ?? 512;
    this.chunkOverlap = options.chunkOverlap ?? 50;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;
  }

  split(text: string): string[] {
    return this.splitRecursive(text, this.separators);
  }

  transform(records: Iterable<SourceRecord>): ChunkRecord[] {
    const chunked: ChunkRecord[] = [];
    let position = 0;
    for (const record of records) {
      const { text, ...base } = record;
      const sourceDocId = resolveSourceDocId(base, position);
      const body = typeof text === 'string' ? text : '';
      this.split(body).forEach((chunk, idx) => {
        chunked.push({ ...base, text: chunk, source_doc_id: sourceDocId, section_index: idx });
      });
      position++;
    }
    return chunked;
  }

  private splitRecursive(text: string, separators: readonly string[]): string[] {
    const finalChunks: string[] = [];

    let separator = separators[separators.length - 1] ?? '';
    let remaining: readonly string[] = [];
    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i];
      if (candidate === '') {
        separator = candidate;
        break;
      }
      if (text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(i + 1);
        break;
      }
    }

    const pieces = splitKeepingSeparator(text, separator);
    let goodPieces: string[] = [];
    for (const piece of pieces) {
      if (charLength(piece) < this.chunkSize) {
        goodPieces.push(piece);
        continue;
      }
      if (goodPieces.length > 0) {
        finalChunks.push(...this.mergePieces(goodPieces));
        goodPieces = [];
      }
      if (remaining.length === 0) {
        finalChunks.push(piece);
      } else {
        finalChunks.push(...this.splitRecursive(piece, remaining));
      }
    }
    if (goodPieces.length > 0) {
      finalChunks.push(...this.mergePieces(goodPieces));
    }
    return finalChunks;
  }

  private mergePieces(pieces: string[]): string[] {
    const chunks: string[] = [];
    let current: string[] = [];
    let total = 0;

    for (const piece of pieces) {
      const length = charLength(piece);
      if (total + length > this.chunkSize) {
        if (total > this.chunkSize) {
          log.debug('chunk:oversized', { length: total, chunkSize: this.chunkSize });
        }
        if (current.length > 0) {
          pushJoined(chunks, current);
          while (total > this.chunkOverlap || (total + length > this.chunkSize && total > 0)) {
            const dropped = current.shift();
            if (dropped === undefined) break;
            total -= charLength(dropped);
          }
        }
      }
      current.push(piece);
      total += length;
    }
    pushJoined(chunks, current);
    return chunks;
  }
}

function splitKeepingSeparator(text: string, separator: string): string[] {
  const pieces = separator ? text.split(new RegExp(`(?=${escapeRegExp(separator)})`)) : Array.from(text);
  return pieces.filter((p) => p !== '');
}

function pushJoined(chunks: string[], pieces: string[]): void {
  const joined = pieces.join('').trim();
  if (joined !== '') chunks.push(joined);
}

function resolveSourceDocId(base: Payload, position: number): string {
  for (const key of ['doc_id', 'source_doc_id', 'id']) {
    const value = base[key];
    if (typeof value === 'string' && value.trim()) return value;
    if (typeof value === 'number') return String(value);
  }
  return `doc-${position}`;
}
