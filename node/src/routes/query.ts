// node/src/routes/query.ts — answer a question from the knowledge base and catalog
import express, { type Request, type RequestHandler, type Response } from 'express';
import { requireApiKey } from '@/middleware/api-key';
import { errorMessage, logger } from '@/services/logger';
import type { PipelineContainer } from '@/services/pipeline-deps';
import { sendError } from '@/utils/errorResponse';
import { isAbortError } from '@/utils/errors';
import { abortOnDisconnect } from './abort';
import { queryRequestSchema } from './validation';

export function createQueryRouter({ config, pipeline }: PipelineContainer, rateLimiter: RequestHandler) {
  const router = express.Router();

  router.post('/', requireApiKey(config.apiKey), rateLimiter, async (req: Request, res: Response) => {
    const signal = abortOnDisconnect(res);
    try {
      const body = queryRequestSchema.parse(req.body ?? {});
      const result = await pipeline.run(body.question, {
        topK: body.top_k,
        filters: { brand: body.brand, category: body.category, tag: body.tag, size: body.size },
        signal,
      });
      res.json({
        answer: result.answer,
        context: result.context,
        trace_id: result.traceId,
        trace_url: result.traceUrl,
      });
    } catch (err) {
      if (isAbortError(err)) {
        logger.info('query:cancelled');
        return;
      }
      logger.error('query:request_failed', { error: errorMessage(err) });
      sendError(res, err);
    }
  });

  return router;
}
