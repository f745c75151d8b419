import path from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

/**
 * Schema for validating environment variables.
 * Everything has a default except REDIS_URL, which is checked when the redis
 * comparison store is selected.
 */
const configSchema = z.object({
  // Server
  PORT: z.string().default('8000'),
  HOST: z.string().default('0.0.0.0'),

  // OpenAI. The key is optional so the mock generator works without one.
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_TEMPERATURE: z.string().default('0.7'),
  OPENAI_MAX_TOKENS: z.string().default('300'),
  OPENAI_TIMEOUT_MS: z.string().default('60000'),
  // Transport-level retries performed by the OpenAI SDK
  OPENAI_MAX_RETRIES: z.string().default('2'),

  // Content-level retries (empty or malformed model output)
  GENERATION_MAX_RETRIES: z.string().default('2'),
  GENERATION_RETRY_BASE_DELAY_MS: z.string().default('500'),
  GENERATION_RETRY_JITTER_MS: z.string().default('200'),

  // Data files
  DATA_DIR: z.string().default('./data'),
  SCRAPED_PRODUCTS_PATH: z.string().optional(),
  PROCESSED_PRODUCTS_PATH: z.string().optional(),
  COMPARISON_PATH: z.string().optional(),

  // Comparison store
  COMPARISON_STORE: z.enum(['file', 'redis']).default('file'),
  REDIS_URL: z.string().optional(),
  COMPARISON_REDIS_KEY: z.string().default('catalog:comparison'),

  // CORS configuration, "*" allows any origin
  CORS_ORIGINS: z.string().default('*'),

  DEBUG: z.string().default('0'),
});

function toInt(value: string, name: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Configuration validation failed:\n  - ${name}: expected an integer, got '${value}'`);
  }
  return parsed;
}

function toFloat(value: string, name: string): number {
  const parsed = parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Configuration validation failed:\n  - ${name}: expected a number, got '${value}'`);
  }
  return parsed;
}

function isTruthy(value: string): boolean {
  return value === '1' || value === 'true';
}

/**
 * Parse and validate an environment map into the typed application config.
 * Throws a descriptive error if validation fails.
 */
export function parseConfig(source: Record<string, string | undefined>) {
  let env: z.infer<typeof configSchema>;
  try {
    env = configSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const messages = error.issues.map((err) => `  - ${err.path.join('.')}: ${err.message}`);
      throw new Error(`Configuration validation failed:\n${messages.join('\n')}`);
    }
    throw error;
  }

  if (env.COMPARISON_STORE === 'redis' && !env.REDIS_URL) {
    throw new Error(
      'Configuration validation failed:\n  - REDIS_URL: required when COMPARISON_STORE=redis'
    );
  }

  const dataDir = env.DATA_DIR;
  const apiKey = env.OPENAI_API_KEY?.trim();

  return {
    port: toInt(env.PORT, 'PORT'),
    host: env.HOST,

    openai: {
      apiKey: apiKey && apiKey.length > 0 ? apiKey : undefined,
      model: env.OPENAI_MODEL,
      temperature: toFloat(env.OPENAI_TEMPERATURE, 'OPENAI_TEMPERATURE'),
      maxTokens: toInt(env.OPENAI_MAX_TOKENS, 'OPENAI_MAX_TOKENS'),
      timeoutMs: toInt(env.OPENAI_TIMEOUT_MS, 'OPENAI_TIMEOUT_MS'),
      maxRetries: toInt(env.OPENAI_MAX_RETRIES, 'OPENAI_MAX_RETRIES'),
    },

    generation: {
      maxRetries: toInt(env.GENERATION_MAX_RETRIES, 'GENERATION_MAX_RETRIES'),
      backoff: {
        baseDelayMs: toInt(env.GENERATION_RETRY_BASE_DELAY_MS, 'GENERATION_RETRY_BASE_DELAY_MS'),
        jitterMs: toInt(env.GENERATION_RETRY_JITTER_MS, 'GENERATION_RETRY_JITTER_MS'),
      },
    },

    paths: {
      scrapedProducts: env.SCRAPED_PRODUCTS_PATH ?? path.join(dataDir, 'scraped_products.json'),
      processedProducts: env.PROCESSED_PRODUCTS_PATH ?? path.join(dataDir, 'processed_products.json'),
      comparison: env.COMPARISON_PATH ?? path.join(dataDir, 'product_comparison.json'),
    },

    comparisonStore: {
      type: env.COMPARISON_STORE,
      redis: {
        url: env.REDIS_URL,
        key: env.COMPARISON_REDIS_KEY,
      },
    },

    cors: {
      origins: env.CORS_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    },

    debug: isTruthy(env.DEBUG),
  } as const;
}

export type Config = ReturnType<typeof parseConfig>;

/**
 * Load `.env` into process.env and parse it.
 */
export function loadConfig(): Config {
  dotenvConfig();
  return parseConfig(process.env);
}
