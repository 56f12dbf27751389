// node/src/routes/ingest.ts — chunk and store knowledge-base documents
import express, { type Request, type RequestHandler, type Response } from 'express';
import { requireApiKey } from '@/middleware/api-key';
import { errorMessage, logger } from '@/services/logger';
import type { PipelineContainer } from '@/services/pipeline-deps';
import { sendError } from '@/utils/errorResponse';
import { StoreUnavailableError } from '@/utils/errors';
import { abortOnDisconnect } from './abort';
import { ingestRequestSchema } from './validation';

export function createIngestRouter({ config, pipeline }: PipelineContainer, rateLimiter: RequestHandler) {
  const router = express.Router();

  router.post('/', requireApiKey(config.apiKey), rateLimiter, async (req: Request, res: Response) => {
    try {
      if (!pipeline.pipelineReady) throw new StoreUnavailableError('Pipeline not available');
      const body = ingestRequestSchema.parse(req.body ?? {});
      const signal = abortOnDisconnect(res);
      const count = await pipeline.ingest(body.documents, { signal });
      res.status(202).json({ records_ingested: count });
    } catch (err) {
      logger.warn('ingest:request_failed', { error: errorMessage(err) });
      sendError(res, err);
    }
  });

  return router;
}
