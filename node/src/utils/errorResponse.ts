// src/utils/errorResponse.ts — uniform JSON error bodies for the HTTP surface
import type { Response } from 'express';
import { ZodError } from 'zod';
import { AppError } from './errors';

export interface ErrorResponse {
  error: string;
  message: string;
  errors?: Array<{ path: string; message: string }>;
}

export function createErrorResponse(
  error: string,
  message: string,
  errors?: Array<{ path: string; message: string }>,
): ErrorResponse {
  return {
    error,
    message,
    ...(errors && errors.length > 0 && { errors }),
  };
}

export function zodIssues(err: ZodError): Array<{ path: string; message: string }> {
  return err.errors.map((e) => ({
    path: e.path.join('.') || 'root',
    message: e.message,
  }));
}

export function sendError(res: Response, err: unknown): Response {
  if (err instanceof ZodError) {
    return res.status(400).json(createErrorResponse('bad_request', 'Invalid request', zodIssues(err)));
  }
  if (err instanceof AppError) {
    return res.status(err.status).json(createErrorResponse(err.code, err.message));
  }
  return res.status(500).json(createErrorResponse('internal_error', 'Internal Server Error'));
}
