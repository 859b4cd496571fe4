/**
 * Configuration Module
 *
 * Reads settings from environment variables (loaded from .env by the entry
 * point) and validates them with zod. Service URLs are required; everything
 * else has a default.
 */

import { z } from 'zod';
import { ConfigurationError, type AppConfig } from './types.js';

export * from './types.js';

/**
 * Treat empty strings as unset so defaults apply to `FOO=` lines in .env
 */
function env<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const url = z
  .string()
  .url()
  .transform((value) => value.replace(/\/+$/, ''));

const positiveInt = (fallback: number) => env(z.coerce.number().int().positive().default(fallback));
const nonNegativeInt = (fallback: number) => env(z.coerce.number().int().min(0).default(fallback));

const envSchema = z
  .object({
    PORT: positiveInt(8000),

    OPTIMIZER_SERVICE_URL: env(url),
    GENERATOR_SERVICE_URL: env(url),
    STRATEGIST_SERVICE_URL: env(url),

    RECORD_STORE_URL: env(url.optional()),
    RECORD_STORE_API_KEY: env(z.string().optional()),
    RECORD_STORE_SCORES_TABLE: env(z.string().default('structures')),
    RECORD_STORE_PROMPTS_TABLE: env(z.string().default('prompts')),
    RECORD_STORE_HISTORY_TABLE: env(z.string().default('history')),
    RECORD_STORE_SETTINGS_TABLE: env(z.string().default('batch_settings')),

    LIKE_THRESHOLD: positiveInt(25),
    EXPLORATION_RATE: env(z.coerce.number().min(0).max(1).default(0.2)),
    SCORE_MAX_AGE_MS: nonNegativeInt(24 * 60 * 60 * 1000),

    DEFAULT_BATCH_IDEAS: positiveInt(3),
    DEFAULT_NUM_PROMPTS: positiveInt(30),
    DEFAULT_RENDERER: env(z.string().default('ImageFX')),
    GENERATOR_BATCH_SIZE: positiveInt(10),
    GENERATOR_BATCH_DELAY_MS: nonNegativeInt(2000),

    TRAIN_TIMEOUT_MS: positiveInt(600_000),
    SCORE_TIMEOUT_MS: positiveInt(120_000),
    UPDATE_TIMEOUT_MS: positiveInt(30_000),
    STRATEGIST_TIMEOUT_MS: positiveInt(120_000),
    GENERATOR_TIMEOUT_MS: positiveInt(60_000),
    RECORD_STORE_TIMEOUT_MS: positiveInt(30_000),

    HTTP_MAX_ATTEMPTS: positiveInt(3),
    HTTP_RETRY_BASE_DELAY_MS: nonNegativeInt(1000),

    SHUTDOWN_GRACE_MS: nonNegativeInt(10_000),
    REQUEST_LOGGING: env(z.enum(['true', 'false']).default('true')),
  })
  .superRefine((values, ctx) => {
    if (values.RECORD_STORE_URL && !values.RECORD_STORE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RECORD_STORE_API_KEY'],
        message: 'Required when RECORD_STORE_URL is set',
      });
    }
  });

/**
 * Parse and validate configuration from the given environment
 *
 * @throws ConfigurationError listing every invalid or missing variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parseResult = envSchema.safeParse(source);
  if (!parseResult.success) {
    throw new ConfigurationError(
      parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parseResult.data;

  return {
    port: values.PORT,
    services: {
      optimizerUrl: values.OPTIMIZER_SERVICE_URL,
      generatorUrl: values.GENERATOR_SERVICE_URL,
      strategistUrl: values.STRATEGIST_SERVICE_URL,
    },
    recordStore:
      values.RECORD_STORE_URL && values.RECORD_STORE_API_KEY
        ? {
            url: values.RECORD_STORE_URL,
            apiKey: values.RECORD_STORE_API_KEY,
            scoresTable: values.RECORD_STORE_SCORES_TABLE,
            promptsTable: values.RECORD_STORE_PROMPTS_TABLE,
            historyTable: values.RECORD_STORE_HISTORY_TABLE,
            settingsTable: values.RECORD_STORE_SETTINGS_TABLE,
          }
        : null,
    learning: {
      likeThreshold: values.LIKE_THRESHOLD,
      explorationRate: values.EXPLORATION_RATE,
      scoreMaxAgeMs: values.SCORE_MAX_AGE_MS,
    },
    generation: {
      defaultBatchIdeas: values.DEFAULT_BATCH_IDEAS,
      defaultNumPrompts: values.DEFAULT_NUM_PROMPTS,
      defaultRenderer: values.DEFAULT_RENDERER,
      generatorBatchSize: values.GENERATOR_BATCH_SIZE,
      generatorBatchDelayMs: values.GENERATOR_BATCH_DELAY_MS,
    },
    timeouts: {
      trainMs: values.TRAIN_TIMEOUT_MS,
      scoreMs: values.SCORE_TIMEOUT_MS,
      updateMs: values.UPDATE_TIMEOUT_MS,
      strategistMs: values.STRATEGIST_TIMEOUT_MS,
      generatorMs: values.GENERATOR_TIMEOUT_MS,
      recordStoreMs: values.RECORD_STORE_TIMEOUT_MS,
    },
    retry: {
      maxAttempts: values.HTTP_MAX_ATTEMPTS,
      baseDelayMs: values.HTTP_RETRY_BASE_DELAY_MS,
    },
    shutdownGraceMs: values.SHUTDOWN_GRACE_MS,
    requestLogging: values.REQUEST_LOGGING === 'true',
  };
}
