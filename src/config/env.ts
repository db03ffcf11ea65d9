import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = (fallback: boolean) =>
  z.enum(['true', 'false']).default(fallback ? 'true' : 'false').transform(v => v === 'true');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: positiveInt(3000),
  GOOGLE_MAPS_API_KEY: z.string().trim().min(1).optional(),
  GEMINI_API_KEY: z.string().trim().min(1).optional(),
  GEMINI_ENABLED: flag(true),
  GEMINI_MODEL: z.string().trim().min(1).optional(),
  CACHE_DIR: z.string().trim().min(1).default('./cache'),
  REVIEW_CACHE_TTL_SECONDS: positiveInt(3600),
  ANALYSIS_CACHE_TTL_SECONDS: positiveInt(86_400),
  FALLBACK_ANALYSIS_CACHE_TTL_SECONDS: positiveInt(3600),
  MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  MAX_REVIEW_COUNT: z.coerce.number().int().min(1).max(500).default(500),
  DEFAULT_REVIEW_COUNT: positiveInt(200),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  googleMapsApiKey: string | undefined;
  geminiApiKey: string | undefined;
  geminiEnabled: boolean;
  geminiModel: string | undefined;
  cacheDir: string;
  reviewCacheTtlSeconds: number;
  analysisCacheTtlSeconds: number;
  fallbackAnalysisCacheTtlSeconds: number;
  maxRetries: number;
  maxReviewCount: number;
  defaultReviewCount: number;
}

/**
 * Reads and validates the environment.
 * Empty strings are treated as unset so a blank `.env` line falls back to the default.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = EnvSchema.safeParse(cleaned);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    googleMapsApiKey: e.GOOGLE_MAPS_API_KEY,
    geminiApiKey: e.GEMINI_API_KEY,
    geminiEnabled: e.GEMINI_ENABLED,
    geminiModel: e.GEMINI_MODEL,
    cacheDir: e.CACHE_DIR,
    reviewCacheTtlSeconds: e.REVIEW_CACHE_TTL_SECONDS,
    analysisCacheTtlSeconds: e.ANALYSIS_CACHE_TTL_SECONDS,
    fallbackAnalysisCacheTtlSeconds: e.FALLBACK_ANALYSIS_CACHE_TTL_SECONDS,
    maxRetries: e.MAX_RETRIES,
    maxReviewCount: e.MAX_REVIEW_COUNT,
    defaultReviewCount: Math.min(e.DEFAULT_REVIEW_COUNT, e.MAX_REVIEW_COUNT),
  };
}

export interface ConfigStatus {
  googleMapsConfigured: boolean;
  geminiConfigured: boolean;
  generativeEnabled: boolean;
  warnings: string[];
}

/**
 * Reports which integrations are usable. Never includes key values.
 */
export function getConfigStatus(config: AppConfig): ConfigStatus {
  const warnings: string[] = [];

  if (!config.googleMapsApiKey) {
    warnings.push('GOOGLE_MAPS_API_KEY is not set; restaurant search and review fetch will fail');
  }
  if (config.geminiEnabled && !config.geminiApiKey) {
    warnings.push('GEMINI_API_KEY is not set but generative analysis is enabled; fallback analysis will be used');
  }
  if (config.fallbackAnalysisCacheTtlSeconds > config.analysisCacheTtlSeconds) {
    warnings.push('FALLBACK_ANALYSIS_CACHE_TTL_SECONDS exceeds ANALYSIS_CACHE_TTL_SECONDS');
  }

  return {
    googleMapsConfigured: Boolean(config.googleMapsApiKey),
    geminiConfigured: Boolean(config.geminiApiKey),
    generativeEnabled: config.geminiEnabled && Boolean(config.geminiApiKey),
    warnings,
  };
}
