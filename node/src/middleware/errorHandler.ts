// node/src/middleware/errorHandler.ts — last-resort JSON error responses
import type { NextFunction, Request, Response } from 'express';
import { errorMessage, logger } from '@/services/logger';
import { createErrorResponse, sendError } from '@/utils/errorResponse';
import { correlationIdOf } from './correlation';

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse('not_found', `Route ${req.method} ${req.path} not found`));
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  // Malformed JSON bodies surface here from express.json().
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json(createErrorResponse('bad_request', 'Malformed JSON body'));
    return;
  }
  logger.error('http:unhandled_error', {
    method: req.method,
    path: req.path,
    correlationId: correlationIdOf(res),
    error: errorMessage(err),
  });
  sendError(res, err);
}
