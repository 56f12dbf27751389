// node/src/stability/errorHandlers.ts — process-level failure and shutdown handling
import type { Server } from 'node:http';
import { errorMessage, logger } from '@/services/logger';

const SHUTDOWN_TIMEOUT_MS = 15_000;

type Cleanup = () => Promise<void>;

let serverInstance: Server | null = null;
const cleanups: Cleanup[] = [];
let shuttingDown = false;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Registers work to run once the server stops accepting requests, e.g. flushing spans. */
export function onShutdown(cleanup: Cleanup): void {
  cleanups.push(cleanup);
}

export function setupUnhandledRejectionHandler(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    // Keep serving in production; fail fast elsewhere.
    if (nodeEnv !== 'production') process.exit(1);
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.error('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  }
}

function closeServer(): Promise<void> {
  const server = serverInstance;
  if (!server) return Promise.resolve();
  return new Promise((resolve) => {
    server.close((err) => {
      if (err) logger.warn('process:server_close_failed', { error: err.message });
      resolve();
    });
  });
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  const forced = setTimeout(() => {
    logger.error('process:shutdown_timeout', { timeoutMs: SHUTDOWN_TIMEOUT_MS });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forced.unref();

  await closeServer();
  for (const cleanup of cleanups) {
    try {
      await cleanup();
    } catch (err) {
      logger.warn('process:cleanup_failed', { error: errorMessage(err) });
    }
  }
  clearTimeout(forced);
  process.exit(exitCode);
}
