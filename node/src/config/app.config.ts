// src/config/app.config.ts — typed application settings parsed from the environment
import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const booleanFlag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .optional()
  .transform((v) => (v === undefined ? undefined : v === '1' || v === 'true' || v === 'yes'));

export const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(8000),
    NODE_ENV: z.string().default('development'),
    APP_NAME: z.string().default('RAG Chatbot Backend'),
    API_VERSION: z.string().default('v1'),
    CORS_ORIGIN: optionalString,

    API_KEY: optionalString,
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
    RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),

    WEAVIATE_URL: optionalString,
    WEAVIATE_API_KEY: optionalString,
    VECTOR_COLLECTION_NAME: z.string().regex(/^[A-Z][_0-9A-Za-z]*$/, 'must be a Weaviate class name').default('KnowledgeChunk'),
    VECTOR_STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    LEXICAL_FALLBACK: booleanFlag.transform((v) => v ?? true),

    OPENAI_API_KEY: optionalString,
    LLM_MODEL: z.string().default('gpt-4o-mini'),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    EMBEDDINGS_MODEL: z.string().default('text-embedding-3-small'),

    PHOENIX_ENDPOINT: optionalString,
    PHOENIX_PROJECT_NAME: optionalString,

    PRODUCT_DATA_PATH: optionalString.transform((v) => v ?? 'data/products.jsonl'),

    CHUNK_SIZE: z.coerce.number().int().positive().default(512),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  nodeEnv: string;
  appName: string;
  apiVersion: string;
  corsOrigins: string[] | undefined;
  apiKey: string | undefined;
  rateLimit: { limit: number; windowMs: number };
  vectorStore: {
    url: string | undefined;
    apiKey: string | undefined;
    collectionName: string;
    timeoutMs: number;
    lexicalFallback: boolean;
    embeddingsModel: string;
  };
  llm: { apiKey: string | undefined; model: string; timeoutMs: number };
  tracing: { endpoint: string | undefined; projectName: string };
  catalog: { path: string };
  chunking: { chunkSize: number; chunkOverlap: number };
}

export function buildConfig(env: Env): AppConfig {
  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    appName: env.APP_NAME,
    apiVersion: env.API_VERSION,
    corsOrigins: env.CORS_ORIGIN?.split(',').map((o) => o.trim()),
    apiKey: env.API_KEY,
    rateLimit: { limit: env.RATE_LIMIT_PER_MINUTE, windowMs: env.RATE_LIMIT_WINDOW_SECONDS * 1000 },
    vectorStore: {
      url: env.WEAVIATE_URL,
      apiKey: env.WEAVIATE_API_KEY,
      collectionName: env.VECTOR_COLLECTION_NAME,
      timeoutMs: env.VECTOR_STORE_TIMEOUT_MS,
      lexicalFallback: env.LEXICAL_FALLBACK,
      embeddingsModel: env.EMBEDDINGS_MODEL,
    },
    llm: { apiKey: env.OPENAI_API_KEY, model: env.LLM_MODEL, timeoutMs: env.LLM_TIMEOUT_MS },
    tracing: { endpoint: env.PHOENIX_ENDPOINT, projectName: env.PHOENIX_PROJECT_NAME ?? env.APP_NAME },
    catalog: { path: env.PRODUCT_DATA_PATH },
    chunking: { chunkSize: env.CHUNK_SIZE, chunkOverlap: env.CHUNK_OVERLAP },
  };
}

/** Parses an environment map; throws a ZodError listing every invalid variable. */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  return buildConfig(envSchema.parse(source));
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
