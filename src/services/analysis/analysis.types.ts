import { z } from 'zod';
import { MAX_BEST_DISHES, MAX_COMPLAINTS, MAX_HIGHLIGHTS } from '../../config/index.js';

export const AnalysisResultSchema = z.object({
  cuisineType: z.string(),
  ambience: z.string(),
  highlights: z.array(z.string()),
  complaints: z.array(z.string()),
  overallSentiment: z.string(),
  priceRange: z.string(),
  bestDishes: z.array(z.string()),
  serviceQuality: z.string(),
  usedFallback: z.boolean(),
});

export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;

/** Value stored in the analysis cache under a review fingerprint. */
export const StoredAnalysisSchema = z.object({
  analysis: AnalysisResultSchema,
  reviewCount: z.number(),
  restaurantName: z.string(),
});

export type StoredAnalysis = z.infer<typeof StoredAnalysisSchema>;

export interface AnalysisOutcome {
  analysis: AnalysisResult;
  fromCache: boolean;
  cacheKey: string;
  reviewCount: number;
}

export interface AnalysisCacheDiagnostics {
  cachedAnalyses: number;
  fallbackEntries: number;
  expiredEntries: number;
  cacheFileExists: boolean;
  cacheFile: string;
}

/** Anything with review text and a rating can be analyzed. */
export interface AnalyzableReview {
  text: string;
  rating: number;
}

const ModelObjectSchema = z.record(z.string(), z.unknown());

function asText(value: unknown, fallback: string): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

function asList(value: unknown, cap: number): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .slice(0, cap)
    .filter(item => item !== null && item !== undefined && item !== '' && item !== false && item !== 0)
    .map(item => (typeof item === 'string' ? item : JSON.stringify(item)).trim())
    .filter(item => item.length > 0);
}

/**
 * Coerces the model's JSON object into an AnalysisResult.
 * Keys follow the snake_case contract of the prompt. Returns null when the
 * value is not a JSON object.
 */
export function cleanModelAnalysis(raw: unknown): AnalysisResult | null {
  const parsed = ModelObjectSchema.safeParse(raw);
  if (!parsed.success || Array.isArray(raw)) return null;

  const data = parsed.data;
  return {
    cuisineType: asText(data['cuisine_type'], 'Not specified'),
    ambience: asText(data['ambience'], 'Not described'),
    highlights: asList(data['highlights'], MAX_HIGHLIGHTS),
    complaints: asList(data['complaints'], MAX_COMPLAINTS),
    overallSentiment: asText(data['overall_sentiment'], 'Mixed'),
    priceRange: asText(data['price_range'], 'Not mentioned'),
    bestDishes: asList(data['best_dishes'], MAX_BEST_DISHES),
    serviceQuality: asText(data['service_quality'], 'Not mentioned'),
    usedFallback: false,
  };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * First greedy `{...}` span of the text, else the whole text, as JSON.
 * undefined when neither parses.
 */
export function extractJsonObject(text: string): unknown {
  const match = /\{[\s\S]*\}/.exec(text);
  const fromSpan = match ? parseJson(match[0]) : undefined;
  return fromSpan !== undefined ? fromSpan : parseJson(text);
}
