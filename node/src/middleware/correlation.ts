// node/src/middleware/correlation.ts — correlation id on every request/response pair
import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

export const CORRELATION_HEADER = 'x-correlation-id';

const VALID_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/** Reuses a well-formed inbound id, else mints one; exposed to handlers as res.locals.correlationId. */
export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const inbound = req.header(CORRELATION_HEADER);
  const correlationId = inbound && VALID_ID.test(inbound) ? inbound : randomUUID();
  res.locals.correlationId = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);
  next();
}

export function correlationIdOf(res: Response): string | undefined {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : undefined;
}
