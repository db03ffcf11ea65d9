/**
 * Generative Client
 * Executes one prompt against the generateContent endpoint, walking an
 * ordered list of model/auth configurations.
 *
 * Per configuration, up to maxRetries attempts; the first attempt gets 60s,
 * later ones 30s, body read included:
 * - 200      → success, stop
 * - 429      → wait min(60s × (attempt + 1), 300s), same configuration
 * - 404      → next configuration
 * - 403      → stop everything (credentials)
 * - other    → wait 5s
 * - timeout  → wait 10s
 * - network  → wait 2^attempt s
 *
 * A wait is only taken when another attempt of the same configuration follows.
 * Stateless apart from its options; safe to share.
 */

import {
  BACKOFF_BASE_MS,
  DEFAULT_GENERATIVE_MODEL,
  GENERATION_CONFIG,
  GENERATIVE_BASE_URL,
  GENERATIVE_FIRST_ATTEMPT_TIMEOUT_MS,
  GENERATIVE_HTTP_ERROR_DELAY_MS,
  GENERATIVE_RATE_LIMIT_BASE_MS,
  GENERATIVE_RATE_LIMIT_MAX_MS,
  GENERATIVE_RETRY_TIMEOUT_MS,
  GENERATIVE_TIMEOUT_DELAY_MS,
  SAFETY_CATEGORIES,
  SAFETY_THRESHOLD,
  SECONDARY_GENERATIVE_MODEL,
} from '../config/index.js';
import { AnalysisError, describeError } from '../lib/errors/analysis-error.js';
import { logger as defaultLogger, type Logger } from '../lib/logger/structured-logger.js';
import { exponentialDelay, sleep as defaultSleep, type Sleep } from '../lib/reliability/timeout-guard.js';
import { err, ok, type Result } from '../lib/result.js';
import { fetchJsonWithTimeout, isFetchError } from '../utils/fetch-with-timeout.js';
import {
  GenerateContentResponseSchema,
  extractCandidateText,
  type ConnectionCheck,
  type GenerateContentResponse,
  type GenerativeEndpoint,
  type GenerativeFailureReason,
  type GenerativeResponse,
} from './generative.types.js';

export interface GenerativeRequester {
  request(prompt: string): Promise<Result<GenerativeResponse, AnalysisError>>;
}

export interface GenerativeClientOptions {
  apiKey: string | undefined;
  /** Attempts per configuration */
  maxRetries: number;
  primaryModel?: string | undefined;
  endpoints?: GenerativeEndpoint[];
  baseUrl?: string;
  timeouts?: AttemptTimeouts;
  sleep?: Sleep;
  logger?: Logger;
}

export interface AttemptTimeouts {
  firstAttemptMs: number;
  retryMs: number;
}

const DEFAULT_ATTEMPT_TIMEOUTS: AttemptTimeouts = {
  firstAttemptMs: GENERATIVE_FIRST_ATTEMPT_TIMEOUT_MS,
  retryMs: GENERATIVE_RETRY_TIMEOUT_MS,
};

export function attemptTimeoutMs(attempt: number, timeouts: AttemptTimeouts = DEFAULT_ATTEMPT_TIMEOUTS): number {
  return attempt === 0 ? timeouts.firstAttemptMs : timeouts.retryMs;
}

export type AttemptOutcome =
  | { kind: 'success'; body: GenerateContentResponse }
  | { kind: 'rate_limited' }
  | { kind: 'not_found' }
  | { kind: 'forbidden' }
  | { kind: 'http_error'; status: number }
  | { kind: 'timeout' }
  | { kind: 'transport'; error: unknown };

export function defaultEndpoints(primaryModel: string = DEFAULT_GENERATIVE_MODEL): GenerativeEndpoint[] {
  return [
    { model: primaryModel, authMethod: 'header' },
    { model: SECONDARY_GENERATIVE_MODEL, authMethod: 'header' },
    { model: primaryModel, authMethod: 'query' },
  ];
}

/**
 * Wait before the next attempt of the same configuration, or null when the
 * outcome ends this configuration.
 */
export function retryDelayMs(outcome: AttemptOutcome, attempt: number): number | null {
  switch (outcome.kind) {
    case 'rate_limited':
      return Math.min(GENERATIVE_RATE_LIMIT_BASE_MS * (attempt + 1), GENERATIVE_RATE_LIMIT_MAX_MS);
    case 'http_error':
      return GENERATIVE_HTTP_ERROR_DELAY_MS;
    case 'timeout':
      return GENERATIVE_TIMEOUT_DELAY_MS;
    case 'transport':
      return exponentialDelay(attempt, BACKOFF_BASE_MS);
    case 'success':
    case 'not_found':
    case 'forbidden':
      return null;
  }
}

export function buildRequestBody(prompt: string) {
  return {
    contents: [{ parts: [{ text: prompt }] }],
    generationConfig: { ...GENERATION_CONFIG },
    safetySettings: SAFETY_CATEGORIES.map(category => ({ category, threshold: SAFETY_THRESHOLD })),
  };
}

export class GenerativeClient implements GenerativeRequester {
  private readonly endpoints: GenerativeEndpoint[];
  private readonly baseUrl: string;
  private readonly timeouts: AttemptTimeouts;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(private readonly options: GenerativeClientOptions) {
    this.endpoints = options.endpoints ?? defaultEndpoints(options.primaryModel ?? DEFAULT_GENERATIVE_MODEL);
    this.baseUrl = options.baseUrl ?? GENERATIVE_BASE_URL;
    this.timeouts = options.timeouts ?? DEFAULT_ATTEMPT_TIMEOUTS;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? defaultLogger;
  }

  get configured(): boolean {
    return Boolean(this.options.apiKey);
  }

  request(prompt: string): Promise<Result<GenerativeResponse, AnalysisError>> {
    return this.run(prompt, this.options.maxRetries);
  }

  /**
   * One attempt per configuration with a trivial prompt.
   */
  async checkConnection(): Promise<ConnectionCheck> {
    const result = await this.run('Reply with the single word OK.', 1);
    if (!result.ok) {
      return { success: false, message: result.error.message };
    }

    const text = extractCandidateText(result.value.body);
    return {
      success: true,
      model: result.value.model,
      message: text ? `Connected (${result.value.model}): ${text.trim().slice(0, 50)}` : `Connected (${result.value.model})`,
    };
  }

  private async run(prompt: string, attemptsPerEndpoint: number): Promise<Result<GenerativeResponse, AnalysisError>> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      return err(this.unavailable('GEMINI_API_KEY is not set', 'missing_api_key', 0));
    }

    const body = JSON.stringify(buildRequestBody(prompt));
    let attempts = 0;

    for (const endpoint of this.endpoints) {
      this.logger.info({ model: endpoint.model, authMethod: endpoint.authMethod }, '[Generative] Trying configuration');

      for (let attempt = 0; attempt < attemptsPerEndpoint; attempt++) {
        attempts++;
        const outcome = await this.attempt(endpoint, apiKey, body, attempt);

        if (outcome.kind === 'success') {
          this.logger.info({ model: endpoint.model, authMethod: endpoint.authMethod, attempts }, '[Generative] Request succeeded');
          return ok({ model: endpoint.model, authMethod: endpoint.authMethod, attempts, body: outcome.body });
        }

        if (outcome.kind === 'forbidden') {
          this.logger.error({ model: endpoint.model, attempts }, '[Generative] Forbidden, check API key permissions');
          return err(this.unavailable('Generative API access forbidden (403)', 'forbidden', attempts));
        }

        if (outcome.kind === 'not_found') {
          this.logger.warn({ model: endpoint.model }, '[Generative] Model not found, trying next configuration');
          break;
        }

        const delay = retryDelayMs(outcome, attempt);
        const hasNext = attempt < attemptsPerEndpoint - 1;
        this.logger.warn({
          model: endpoint.model,
          attempt: attempt + 1,
          timeoutMs: attemptTimeoutMs(attempt, this.timeouts),
          outcome: outcome.kind,
          ...(outcome.kind === 'http_error' && { status: outcome.status }),
          ...(outcome.kind === 'transport' && { error: describeError(outcome.error) }),
          ...(hasNext && delay !== null && { nextDelayMs: delay }),
        }, '[Generative] Attempt failed');

        if (hasNext && delay !== null && delay > 0) {
          await this.sleep(delay);
        }
      }
    }

    this.logger.error({ attempts, endpoints: this.endpoints.length }, '[Generative] All attempts failed');
    return err(this.unavailable('All generative API attempts failed', 'all_attempts_failed', attempts));
  }

  private async attempt(endpoint: GenerativeEndpoint, apiKey: string, body: string, attempt: number): Promise<AttemptOutcome> {
    const url = new URL(`${this.baseUrl}/models/${endpoint.model}:generateContent`);
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (endpoint.authMethod === 'header') {
      headers['x-goog-api-key'] = apiKey;
    } else {
      url.searchParams.set('key', apiKey);
    }

    try {
      const res = await fetchJsonWithTimeout(url, { method: 'POST', headers, body }, {
        timeoutMs: attemptTimeoutMs(attempt, this.timeouts),
        stage: 'generate_content',
        provider: 'gemini',
        logger: this.logger,
      });

      switch (res.status) {
        case 200:
          return { kind: 'success', body: GenerateContentResponseSchema.parse(res.body) };
        case 429:
          return { kind: 'rate_limited' };
        case 404:
          return { kind: 'not_found' };
        case 403:
          return { kind: 'forbidden' };
        default:
          return { kind: 'http_error', status: res.status };
      }
    } catch (error) {
      if (isFetchError(error) && error.kind === 'TIMEOUT') {
        return { kind: 'timeout' };
      }
      // unreadable 200 bodies land here too and are retried like transport errors
      return { kind: 'transport', error };
    }
  }

  private unavailable(message: string, reason: GenerativeFailureReason, attempts: number): AnalysisError {
    return new AnalysisError('GENERATIVE_UNAVAILABLE', message, { details: { reason, attempts } });
  }
}
