// node/scripts/ingest.ts — push a JSONL document file to a running backend's ingest endpoint
import 'dotenv/config';
import { parseArgs } from 'node:util';
import axios from 'axios';
import { isRecord, readJsonl } from '@/etl/loaders';
import { errorMessage, logger } from '@/services/logger';

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    endpoint: { type: 'string', default: 'http://localhost:8000/api/ingest' },
    path: { type: 'string', default: 'data/documents.jsonl' },
    'api-key': { type: 'string', default: process.env.API_KEY },
  },
});

async function main(): Promise<void> {
  const documents = (await readJsonl(values.path)).filter(isRecord);
  const headers: Record<string, string> = {};
  if (values['api-key']) headers['X-API-Key'] = values['api-key'];

  const res = await axios.post(values.endpoint, { documents }, { headers, timeout: 120_000 });
  logger.info('ingest:done', { status: res.status, body: res.data });
}

main().catch((err: unknown) => {
  logger.error('ingest:failed', { error: errorMessage(err) });
  process.exit(1);
});
