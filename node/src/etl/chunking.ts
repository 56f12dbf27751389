// node/src/etl/chunking.ts — offline chunking of a JSONL document file
import { Chunker } from '@/services/chunker';
import { childLogger } from '@/services/logger';
import { isRecord, readJsonl, writeJsonl } from './loaders';

const log = childLogger('etl');

export interface ChunkingJob {
  documentsPath: string;
  outputPath: string;
  chunkSize: number;
  chunkOverlap: number;
}

export const DEFAULT_CHUNKING_JOB: ChunkingJob = {
  documentsPath: 'data/documents.jsonl',
  outputPath: 'artifacts/chunked_documents.jsonl',
  chunkSize: 512,
  chunkOverlap: 50,
};

export interface ChunkingResult {
  outputPath: string;
  documents: number;
  chunks: number;
}

export async function runChunking(job: ChunkingJob): Promise<ChunkingResult> {
  const rows = await readJsonl(job.documentsPath);
  const records = rows.filter(isRecord);
  if (records.length !== rows.length) {
    log.warn('etl:skipped_rows', { skipped: rows.length - records.length, path: job.documentsPath });
  }
  const chunker = new Chunker({ chunkSize: job.chunkSize, chunkOverlap: job.chunkOverlap });
  const chunks = await writeJsonl(job.outputPath, chunker.transform(records));
  log.info('etl:chunked', { documents: records.length, chunks, output: job.outputPath });
  return { outputPath: job.outputPath, documents: records.length, chunks };
}
