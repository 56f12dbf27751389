// node/src/routes/validation.ts — request body and query schemas for the public API
import { z } from 'zod';
import { DEFAULT_TOP_K } from '@/services/providers/retrieval-types';

const optionalFilter = z
  .string()
  .trim()
  .nullish()
  .transform((v) => (v ? v : undefined));

export const ingestRequestSchema = z.object({
  documents: z.array(z.record(z.unknown())),
});

export const queryRequestSchema = z.object({
  question: z.string().trim().min(1, 'question is required and cannot be empty'),
  top_k: z
    .number()
    .int()
    .min(1, 'top_k must be at least 1')
    .max(50)
    .nullish()
    .transform((v) => v ?? DEFAULT_TOP_K),
  brand: optionalFilter,
  category: optionalFilter,
  tag: optionalFilter,
  size: optionalFilter,
});

export const productQuerySchema = z.object({
  brand: optionalFilter,
  category: optionalFilter,
  tag: optionalFilter,
  size: optionalFilter,
  query: optionalFilter,
});
