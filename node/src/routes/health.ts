// node/src/routes/health.ts — liveness plus whether a retrieval backend exists
import express, { type Request, type Response } from 'express';
import type { PipelineContainer } from '@/services/pipeline-deps';

export function createHealthRouter({ config, pipeline }: PipelineContainer) {
  const router = express.Router();

  router.get('/', (_req: Request, res: Response) => {
    res.status(200).json({
      app: config.appName,
      version: config.apiVersion,
      pipeline_ready: pipeline.pipelineReady,
    });
  });

  return router;
}
