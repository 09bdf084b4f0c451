/**
 * Configuration Module
 *
 * Builds the application configuration from environment variables.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * Nothing is read at import time: callers construct an {@link AppConfig}
 * with {@link loadConfig} and pass it to each component.
 *
 * @module config
 */

import { z } from 'zod';
import { DEFAULT_EXTRACTION_MODEL } from './models.js';

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised for problems that make a component unusable before any remote call:
 * missing API keys, invalid window sizes, missing purchase amounts.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Environment Schema
// ============================================================================

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  // API Keys (optional here; required lazily by the components that call out)
  YOUTUBE_API_KEY: z.string().optional(),
  GOOGLE_AI_API_KEY: z.string().optional(),

  EXTRACTION_MODEL: z.string().optional(),

  CREATOR_SIGNALS_CHANNELS_FILE: z.string().default('data/source_youtubers.csv'),
  CREATOR_SIGNALS_LEDGER_FILE: z.string().default('data/portfolio_simulation.csv'),

  RECENCY_WINDOW_DAYS: positiveInt(7),
  // 0 expires on the day of purchase
  VALID_PURCHASE_DAYS: nonNegativeInt(4),
  MAX_ASSETS: positiveInt(5),

  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

export type EnvInput = Record<string, string | undefined>;

/**
 * Application configuration passed explicitly into every component.
 */
export interface AppConfig {
  readonly nodeEnv: 'development' | 'test' | 'production';
  readonly apiKeys: {
    readonly youtube?: string;
    readonly googleAi?: string;
  };
  readonly models: {
    readonly extraction: string;
  };
  /** CSV of creators to follow */
  readonly channelsFile: string;
  /** Append-only simulated purchase ledger */
  readonly ledgerFile: string;
  /** Trailing window, in days, for "new enough" uploads */
  readonly recencyWindowDays: number;
  /** Days until a simulated purchase expires */
  readonly validPurchaseDays: number;
  /** How many top-ranked tickers to carry into a purchase */
  readonly maxAssets: number;
}

const API_KEY_NAMES = ['youtube', 'googleAi'] as const;

export type ApiKeyName = (typeof API_KEY_NAMES)[number];

const API_KEY_ENV_NAMES: Record<ApiKeyName, string> = {
  youtube: 'YOUTUBE_API_KEY',
  googleAi: 'GOOGLE_AI_API_KEY',
};

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate an environment map and build an {@link AppConfig}.
 *
 * Empty strings count as unset for API keys.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: EnvInput = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment variables: ${details}`);
  }

  const data = parsed.data;

  return Object.freeze({
    nodeEnv: data.NODE_ENV,
    apiKeys: Object.freeze({
      youtube: data.YOUTUBE_API_KEY || undefined,
      googleAi: data.GOOGLE_AI_API_KEY || undefined,
    }),
    models: Object.freeze({
      extraction: data.EXTRACTION_MODEL || DEFAULT_EXTRACTION_MODEL,
    }),
    channelsFile: data.CREATOR_SIGNALS_CHANNELS_FILE,
    ledgerFile: data.CREATOR_SIGNALS_LEDGER_FILE,
    recencyWindowDays: data.RECENCY_WINDOW_DAYS,
    validPurchaseDays: data.VALID_PURCHASE_DAYS,
    maxAssets: data.MAX_ASSETS,
  });
}

/**
 * Check if a specific API is configured
 */
export function hasApiKey(config: AppConfig, api: ApiKeyName): boolean {
  return !!config.apiKeys[api];
}

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(config: AppConfig, api: ApiKeyName): string {
  const key = config.apiKeys[api];
  if (!key) {
    throw new ConfigurationError(
      `Missing required API key: ${API_KEY_ENV_NAMES[api]}. ` +
        `Please set it in your .env file.`
    );
  }
  return key;
}

/**
 * List the environment variable names of API keys that are not set.
 */
export function missingApiKeys(config: AppConfig): string[] {
  return API_KEY_NAMES.filter((name) => !config.apiKeys[name])
    .map((name) => API_KEY_ENV_NAMES[name]);
}

export { DEFAULT_EXTRACTION_MODEL, getExtractionModelConfig } from './models.js';
export type { ModelConfig } from './models.js';
