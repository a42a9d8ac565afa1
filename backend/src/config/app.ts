import { z } from 'zod';
import { config as loadEnv } from 'dotenv';

loadEnv();

// z.coerce.boolean() treats "false" as true, so flags are parsed explicitly.
const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ''
        ? fallback
        : ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase())
    );

const envSchema = z.object({
  PROJECT_NAME: z.string().default('farm-advisor-agent'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(8787),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  OPENAI_API_KEY: z.string().optional(),
  AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
  AZURE_OPENAI_API_KEY: z.string().optional(),
  AZURE_OPENAI_API_VERSION: z.string().default('2024-10-21'),

  AGENT_MODEL: z.string().default('gpt-5'),
  EXPANSION_MODEL: z.string().default('gpt-4o-mini'),
  EXPANSION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  VISION_MODEL: z.string().default('gpt-4o'),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(16),

  SCHEME_DB_PATH: z.string().default('./data/scheme-index.db'),
  SCHEME_DATA_PATH: z.string().default('./backend/data/schemes.json'),
  SCHEME_SEARCH_TOP_K: z.coerce.number().int().positive().default(2),
  SCHEME_CANDIDATES_PER_QUERY: z.coerce.number().int().positive().default(3),

  DATA_GOV_IN_API_KEY: z.string().optional(),
  MARKET_API_URL: z
    .string()
    .url()
    .default('https://api.data.gov.in/resource/9ef84268-d588-465a-a308-a864a43d0070'),
  MARKET_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  MARKET_MAX_RETRIES: z.coerce.number().int().min(0).default(2),

  DIAGNOSIS_IMAGE_DIR: z.string().default('./data/uploads'),
  DIAGNOSIS_IMAGE_MAX_MB: z.coerce.number().positive().default(10),

  SESSION_DB_PATH: z.string().default('./data/session-store.db'),
  AGENT_DEBUG: flag(false),

  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(10),
  // Turns chain several model calls; keep this well above a single completion latency.
  REQUEST_TIMEOUT_MS: z.coerce.number().default(120000),
  CORS_ORIGIN: z.string().default('http://localhost:5173')
});

export type AppConfig = z.infer<typeof envSchema>;

export const config = envSchema.parse(process.env);
export const isDevelopment = config.NODE_ENV === 'development';
export const isProduction = config.NODE_ENV === 'production';
export const isTest = config.NODE_ENV === 'test';
