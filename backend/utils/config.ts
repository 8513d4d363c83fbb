import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { ConfigurationError } from './errors';

const TIER_WORKERS = {
  constrained: { classification: 5, translation: 20 },
  standard: { classification: 10, translation: 40 },
} as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  FRONTEND_URL: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  STORAGE_BACKEND: z.enum(['postgres', 'sqlite']).optional(),
  DATABASE_URL: z.string().optional(),
  SQLITE_PATH: z.string().default('intel.db'),

  OPENAI_API_KEY: z.string().optional(),
  CLASSIFIER_MODEL: z.string().default('gpt-4o-mini'),
  TRANSLATION_MODEL: z.string().default('gpt-4o-mini'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CLASSIFIER_MAX_TOKENS: z.coerce.number().int().positive().default(800),

  SCRAPER_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  INTEL_TIER: z.enum(['constrained', 'standard']).default('standard'),
  CLASSIFICATION_WORKERS: z.coerce.number().int().positive().optional(),
  TRANSLATION_WORKERS: z.coerce.number().int().positive().optional(),

  CACHE_FRESHNESS_HOURS: z.coerce.number().positive().default(12),
  RETENTION_MONTHS: z.coerce.number().int().positive().default(3),
  SCHEDULE_TYPE: z.enum(['production', 'testing', 'off']).default('off'),
});

export type StorageConfig =
  | { kind: 'postgres'; databaseUrl: string }
  | { kind: 'sqlite'; path: string };

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  frontendUrl?: string;
  storage: StorageConfig;
  openai: {
    apiKey?: string;
    classifierModel: string;
    translationModel: string;
    timeoutMs: number;
    classifierMaxTokens: number;
  };
  workers: {
    classification: number;
    translation: number;
  };
  scraperTimeoutMs: number;
  cacheFreshnessHours: number;
  retentionMonths: number;
  scheduleType: 'production' | 'testing' | 'off';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${fromZodError(parsed.error).message}`);
  }
  const e = parsed.data;

  const backend = e.STORAGE_BACKEND ?? (e.DATABASE_URL ? 'postgres' : 'sqlite');
  let storage: StorageConfig;
  if (backend === 'postgres') {
    if (!e.DATABASE_URL) {
      throw new ConfigurationError("DATABASE_URL must be set when STORAGE_BACKEND is postgres");
    }
    storage = { kind: 'postgres', databaseUrl: e.DATABASE_URL };
  } else {
    storage = { kind: 'sqlite', path: e.SQLITE_PATH };
  }

  const tier = TIER_WORKERS[e.INTEL_TIER];

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    frontendUrl: e.FRONTEND_URL,
    storage,
    openai: {
      apiKey: e.OPENAI_API_KEY || undefined,
      classifierModel: e.CLASSIFIER_MODEL,
      translationModel: e.TRANSLATION_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
      classifierMaxTokens: e.CLASSIFIER_MAX_TOKENS,
    },
    workers: {
      classification: e.CLASSIFICATION_WORKERS ?? tier.classification,
      translation: e.TRANSLATION_WORKERS ?? tier.translation,
    },
    scraperTimeoutMs: e.SCRAPER_TIMEOUT_MS,
    cacheFreshnessHours: e.CACHE_FRESHNESS_HOURS,
    retentionMonths: e.RETENTION_MONTHS,
    scheduleType: e.SCHEDULE_TYPE,
  };
}
