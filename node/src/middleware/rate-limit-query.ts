// node/src/middleware/rate-limit-query.ts — per-identity limiter for ingest and query routes
import type { Request } from 'express';
import rateLimit from 'express-rate-limit';
import { createErrorResponse } from '@/utils/errorResponse';
import { API_KEY_HEADER } from './api-key';

/** Callers are identified by their API key, falling back to the client address. */
export function rateLimitIdentity(req: Request): string {
  return req.header(API_KEY_HEADER) || req.ip || 'anonymous';
}

export function createQueryRateLimiter(options: { limit: number; windowMs: number }) {
  return rateLimit({
    windowMs: options.windowMs,
    max: options.limit,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: rateLimitIdentity,
    handler: (_req, res) => {
      res.status(429).json(createErrorResponse('rate_limited', 'Rate limit exceeded'));
    },
  });
}
