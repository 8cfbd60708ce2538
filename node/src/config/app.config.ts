// node/src/config/app.config.ts — environment-backed configuration, validated once at startup
import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_TYPE: z.enum(['pretty', 'json', 'hidden']).default('pretty'),

  OPENAI_API_KEY: optionalString,
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
  OPENAI_SELECT_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_ENRICH_MODEL: z.string().default('gpt-4o-mini'),

  PINECONE_API_KEY: optionalString,
  PINECONE_INDEX_NAME: z.string().default('funding-search'),
  PINECONE_NAMESPACE: z.string().default('openai-v3'),

  FUNDING_CSV_PATH: z.string().default('data/funding_programs.csv'),
  CURATED_SOURCES_PATH: z.string().default('data/curated-sources.json'),

  TOP_K: z.coerce.number().int().positive().default(8),
  SHORTLIST_SIZE: z.coerce.number().int().positive().default(8),
  SELECTION_SIZE: z.coerce.number().int().positive().default(3),
  SOURCE_CONCURRENCY: z.coerce.number().int().positive().default(4),

  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  RETRIEVAL_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),

  REDIS_URL: optionalString,
  SESSION_TTL_MINUTES: z.coerce.number().int().positive().default(30),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
});

export type LogLevelName = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  log: { level: LogLevelName; type: 'pretty' | 'json' | 'hidden' };
  openai: {
    apiKey?: string;
    embeddingModel: string;
    embeddingDimensions?: number;
    selectModel: string;
    enrichModel: string;
  };
  pinecone: { apiKey?: string; indexName: string; namespace: string };
  data: { fundingCsvPath: string; curatedSourcesPath: string };
  pipeline: { topK: number; want: number; wanted: number; sourceConcurrency: number };
  resilience: {
    requestTimeoutMs: number;
    retrievalTimeoutMs: number;
    llmTimeoutMs: number;
    maxRetries: number;
  };
  session: { redisUrl?: string; ttlMinutes: number };
  corsOrigins: string[];
}

/**
 * Parses an environment map into the typed app configuration.
 * Throws a readable error listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((e) => `${e.path.join('.') || 'env'}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    log: { level: e.LOG_LEVEL, type: e.LOG_TYPE },
    openai: {
      apiKey: e.OPENAI_API_KEY,
      embeddingModel: e.OPENAI_EMBEDDING_MODEL,
      embeddingDimensions: e.EMBEDDING_DIMENSIONS,
      selectModel: e.OPENAI_SELECT_MODEL,
      enrichModel: e.OPENAI_ENRICH_MODEL,
    },
    pinecone: {
      apiKey: e.PINECONE_API_KEY,
      indexName: e.PINECONE_INDEX_NAME,
      namespace: e.PINECONE_NAMESPACE,
    },
    data: {
      fundingCsvPath: e.FUNDING_CSV_PATH,
      curatedSourcesPath: e.CURATED_SOURCES_PATH,
    },
    pipeline: {
      topK: e.TOP_K,
      want: e.SHORTLIST_SIZE,
      wanted: e.SELECTION_SIZE,
      sourceConcurrency: e.SOURCE_CONCURRENCY,
    },
    resilience: {
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
      retrievalTimeoutMs: e.RETRIEVAL_TIMEOUT_MS,
      llmTimeoutMs: e.LLM_TIMEOUT_MS,
      maxRetries: e.MAX_RETRIES,
    },
    session: { redisUrl: e.REDIS_URL, ttlMinutes: e.SESSION_TTL_MINUTES },
    corsOrigins: e.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean),
  };
}

export const appConfig: AppConfig = loadConfig();
