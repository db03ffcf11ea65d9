/**
 * Centralized tuning constants.
 * Values that change per deployment (keys, TTLs, retry counts) live in env.ts;
 * the numbers below are fixed behaviour of the pipeline.
 */

// === Reviews ===

/** Reviews whose trimmed text is at most this long are treated as noise. */
export const MIN_REVIEW_TEXT_LENGTH = 10;

/** Hard cap for reviews returned per place. */
export const MAX_REVIEW_COUNT = 500;

/** Fields requested from the place-details endpoint when fetching reviews. */
export const REVIEW_DETAIL_FIELDS = ['name', 'reviews', 'rating', 'user_ratings_total'] as const;

// === Analysis ===

/** Number of leading reviews that make up the analysis fingerprint. */
export const FINGERPRINT_REVIEW_COUNT = 10;

/** Characters of each review text that enter the fingerprint. */
export const FINGERPRINT_TEXT_LENGTH = 100;

/** Maximum reviews rendered into the summarization prompt. */
export const MAX_REVIEWS_FOR_PROMPT = 30;

export const MAX_HIGHLIGHTS = 5;
export const MAX_COMPLAINTS = 4;
export const MAX_BEST_DISHES = 3;

// === Generative endpoint ===

export const GENERATIVE_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

export const DEFAULT_GENERATIVE_MODEL = 'gemini-1.5-flash';
export const SECONDARY_GENERATIVE_MODEL = 'gemini-1.0-pro';

/** Per-attempt timeouts (ms): the first call of a configuration gets more room. */
export const GENERATIVE_FIRST_ATTEMPT_TIMEOUT_MS = 60_000;
export const GENERATIVE_RETRY_TIMEOUT_MS = 30_000;

/** 429: wait min(base * (attempt + 1), max). */
export const GENERATIVE_RATE_LIMIT_BASE_MS = 60_000;
export const GENERATIVE_RATE_LIMIT_MAX_MS = 300_000;

/** Fixed delay after an unexpected HTTP status. */
export const GENERATIVE_HTTP_ERROR_DELAY_MS = 5_000;

/** Fixed delay after a timed-out attempt. */
export const GENERATIVE_TIMEOUT_DELAY_MS = 10_000;

/** Base for 2^attempt backoff on transport errors. */
export const BACKOFF_BASE_MS = 1_000;

export const GENERATION_CONFIG = {
  temperature: 0.1,
  topK: 40,
  topP: 0.95,
  maxOutputTokens: 1024,
} as const;

export const SAFETY_CATEGORIES = [
  'HARM_CATEGORY_HARASSMENT',
  'HARM_CATEGORY_HATE_SPEECH',
  'HARM_CATEGORY_SEXUALLY_EXPLICIT',
  'HARM_CATEGORY_DANGEROUS_CONTENT',
] as const;

export const SAFETY_THRESHOLD = 'BLOCK_MEDIUM_AND_ABOVE';

// === Mapping provider ===

export const GOOGLE_MAPS_BASE_URL = 'https://maps.googleapis.com/maps/api';

/** Timeout (ms) for every mapping-provider call. */
export const GOOGLE_MAPS_TIMEOUT_MS = 10_000;

// === Restaurant search ===

export const DEFAULT_SEARCH_RADIUS = 1000;
export const MIN_SEARCH_RADIUS = 100;
export const MAX_SEARCH_RADIUS = 5000;

export const DEFAULT_MIN_REVIEWS = 100;
export const MAX_MIN_REVIEWS = 1000;

export const DEFAULT_MAX_RESULTS = 5;
export const MIN_RESULTS = 1;
export const MAX_RESULTS = 20;

/** Walking speed used for straight-line estimates (km/h). */
export const WALKING_SPEED_KMH = 5;

// === Jobs ===

/** Background analysis jobs older than this are swept. */
export const ANALYSIS_JOB_TTL_MS = 10 * 60 * 1000;
