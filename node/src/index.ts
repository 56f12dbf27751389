// node/src/index.ts — HTTP entry point
// Must stay first: imports are evaluated in order and the logger reads LOG_LEVEL on load.
import 'dotenv/config';
import { createApp } from './app';
import { getConfig } from './config/app.config';
import { errorMessage, logger } from './services/logger';
import { getPipelineDeps } from './services/pipeline-deps';
import {
  onShutdown,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from './stability/errorHandlers';

async function startServer(): Promise<void> {
  const config = getConfig();
  setupUnhandledRejectionHandler(config.nodeEnv);
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  const container = await getPipelineDeps();
  onShutdown(() => container.tracing.shutdown());

  const app = createApp(container);
  const server = app.listen(config.port, '0.0.0.0', () => {
    logger.info('server:listening', {
      url: `http://localhost:${config.port}`,
      environment: config.nodeEnv,
      pipelineReady: container.pipeline.pipelineReady,
    });
  });
  setServerInstance(server);
}

startServer().catch((err: unknown) => {
  logger.fatal('server:start_failed', { error: errorMessage(err) });
  process.exit(1);
});
