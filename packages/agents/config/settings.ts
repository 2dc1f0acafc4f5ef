// Application settings: parsed from environment variables with zod
// Optional credentials stay undefined; every collaborator degrades to its fallback without one.

import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { isDebugEnabled } from '../utils/logger.js';

const optionalSecret = z
  .string()
  .optional()
  .transform(v => (v && v.trim().length > 0 ? v.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalSecret,
  PIPELINE_LLM_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),
  PIPELINE_LLM_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.2),
  LLM_TIMEOUT_MS: positiveInt(30_000),

  OPENAI_API_KEY: optionalSecret,
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  WHISPER_API_KEY: optionalSecret,
  WHISPER_MODEL: z.string().min(1).default('whisper-1'),

  ALPHA_VANTAGE_API_KEY: optionalSecret,
  ALPHA_VANTAGE_BASE_URL: z.string().url().default('https://www.alphavantage.co/query'),
  QUOTE_TIMEOUT_MS: positiveInt(10_000),
  QUOTE_RATE_LIMIT: positiveInt(5),

  RAG_VECTOR_STORE: z.enum(['pg', 'none']).default('none'),
  RAG_TOP_K: positiveInt(5),

  PIPELINE_STORE_BACKEND: z
    .string()
    .optional()
    .transform((v): StoreBackend => {
      const value = v?.trim().toLowerCase();
      return value === 'postgres' || value === 'pg' ? 'postgres' : 'local';
    }),

  PG_HOST: z.string().default('localhost'),
  PG_PORT: positiveInt(5432),
  PG_USER: z.string().default('pipelines'),
  PG_PASSWORD: z.string().default(''),
  PG_DATABASE: z.string().default('pipelines'),
  PG_POOL_MAX: positiveInt(10),

  PIPELINE_DEBUG: z.string().optional(),
});

export type StoreBackend = 'local' | 'postgres';

export interface LlmSettings {
  apiKey?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export interface PgSettings {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  poolMax: number;
}

export interface AppSettings {
  llm: LlmSettings;
  openai: { apiKey?: string; embeddingModel: string };
  whisper: { apiKey?: string; model: string };
  quotes: { apiKey?: string; baseUrl: string; timeoutMs: number; rateLimitPerMinute: number };
  rag: { vectorStore: 'pg' | 'none'; topK: number };
  storeBackend: StoreBackend;
  pg: PgSettings;
  debug: boolean;
}

/**
 * Build AppSettings from an environment map (defaults to process.env).
 * Throws ConfigError listing every malformed variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${problems.join('; ')}`);
  }
  const e = parsed.data;

  return {
    llm: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.PIPELINE_LLM_MODEL,
      temperature: e.PIPELINE_LLM_TEMPERATURE,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    openai: { apiKey: e.OPENAI_API_KEY, embeddingModel: e.EMBEDDING_MODEL },
    // Whisper reuses the OpenAI key unless a dedicated one is given
    whisper: { apiKey: e.WHISPER_API_KEY ?? e.OPENAI_API_KEY, model: e.WHISPER_MODEL },
    quotes: {
      apiKey: e.ALPHA_VANTAGE_API_KEY,
      baseUrl: e.ALPHA_VANTAGE_BASE_URL,
      timeoutMs: e.QUOTE_TIMEOUT_MS,
      rateLimitPerMinute: e.QUOTE_RATE_LIMIT,
    },
    rag: { vectorStore: e.RAG_VECTOR_STORE, topK: e.RAG_TOP_K },
    storeBackend: e.PIPELINE_STORE_BACKEND,
    pg: {
      host: e.PG_HOST,
      port: e.PG_PORT,
      user: e.PG_USER,
      password: e.PG_PASSWORD,
      database: e.PG_DATABASE,
      poolMax: e.PG_POOL_MAX,
    },
    debug: isDebugEnabled(e.PIPELINE_DEBUG),
  };
}
