// node/src/etl/cli.ts — `npm run etl:chunk -- --documents in.jsonl --output out.jsonl`
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { errorMessage, logger } from '@/services/logger';
import { DEFAULT_CHUNKING_JOB, runChunking, type ChunkingJob } from './chunking';

const argsSchema = z
  .object({
    documents: z.string().default(DEFAULT_CHUNKING_JOB.documentsPath),
    output: z.string().default(DEFAULT_CHUNKING_JOB.outputPath),
    'chunk-size': z.coerce.number().int().positive().default(DEFAULT_CHUNKING_JOB.chunkSize),
    'chunk-overlap': z.coerce.number().int().nonnegative().default(DEFAULT_CHUNKING_JOB.chunkOverlap),
  })
  .refine((a) => a['chunk-overlap'] < a['chunk-size'], {
    message: '--chunk-overlap must be smaller than --chunk-size',
  });

export function parseChunkingArgs(argv: string[]): ChunkingJob {
  const { values } = parseArgs({
    args: argv,
    options: {
      documents: { type: 'string' },
      output: { type: 'string' },
      'chunk-size': { type: 'string' },
      'chunk-overlap': { type: 'string' },
    },
  });
  const args = argsSchema.parse(values);
  return {
    documentsPath: args.documents,
    outputPath: args.output,
    chunkSize: args['chunk-size'],
    chunkOverlap: args['chunk-overlap'],
  };
}

async function main(): Promise<void> {
  const result = await runChunking(parseChunkingArgs(process.argv.slice(2)));
  logger.info(`Chunked documents written to ${result.outputPath}`);
}

if (process.argv[1] && import.meta.url.endsWith(process.argv[1].replace(/\\/g, '/'))) {
  main().catch((err: unknown) => {
    logger.error('etl:failed', { error: errorMessage(err) });
    process.exit(1);
  });
}
