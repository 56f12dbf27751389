// src/services/logger.ts — structured logging for backend
import { Logger, type ILogObj } from 'tslog';

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function resolveMinLevel(raw: string | undefined): number {
  return LEVELS[(raw ?? 'info').toLowerCase()] ?? LEVELS.info;
}

export const logger = new Logger<ILogObj>({
  name: 'catalog-rag',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});

export function childLogger(name: string): Logger<ILogObj> {
  return logger.getSubLogger({ name });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
