// node/src/app.ts — Express application wiring, separate from listen() so tests can mount it
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { createQueryRateLimiter } from '@/middleware/rate-limit-query';
import { createHealthRouter } from '@/routes/health';
import { createIngestRouter } from '@/routes/ingest';
import { createProductsRouter } from '@/routes/products';
import { createQueryRouter } from '@/routes/query';
import { logger } from '@/services/logger';
import type { PipelineContainer } from '@/services/pipeline-deps';

export function createApp(container: PipelineContainer) {
  const { config } = container;
  const app = express();

  app.use(attachCorrelationId);
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins, credentials: true }));
  app.use(express.json({ limit: '10mb' }));
  app.use(compression());

  if (config.nodeEnv === 'development') {
    app.use(morgan('dev'));
  } else if (config.nodeEnv !== 'test') {
    app.use(
      morgan('combined', {
        stream: { write: (line: string) => logger.info(line.trimEnd()) },
      }),
    );
  }

  const rateLimiter = createQueryRateLimiter(config.rateLimit);

  app.get('/', (_req, res) => {
    res.json({ message: `${config.appName} is running` });
  });
  app.use('/api/health', createHealthRouter(container));
  app.use('/api/ingest', createIngestRouter(container, rateLimiter));
  app.use('/api/query', createQueryRouter(container, rateLimiter));
  app.use('/api/products', createProductsRouter(container));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
