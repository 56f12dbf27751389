// node/src/middleware/api-key.ts — X-API-Key check; a no-op when no key is configured
import crypto from 'node:crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { createErrorResponse } from '@/utils/errorResponse';

export const API_KEY_HEADER = 'x-api-key';

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

export function requireApiKey(expected: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expected) {
      next();
      return;
    }
    const provided = req.header(API_KEY_HEADER);
    if (!provided || !safeEqual(provided, expected)) {
      res.status(401).json(createErrorResponse('unauthorized', 'Invalid or missing API key'));
      return;
    }
    next();
  };
}
