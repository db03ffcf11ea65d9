/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController to prevent hanging promises.
 * The timer covers the body read as well as the headers; it is cleared in finally.
 */

import { logger as defaultLogger, type Logger } from '../lib/logger/structured-logger.js';

export type FetchErrorKind = 'DNS_FAIL' | 'TIMEOUT' | 'ABORT' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  stage?: string;
  provider?: string;
  /** Optional caller-scoped abort signal; when aborted, the fetch is cancelled. */
  signal?: AbortSignal;
  logger?: Logger;
}

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly kind: FetchErrorKind,
    public readonly provider: string,
    public readonly host: string,
    public readonly timeoutMs: number,
    public readonly stage: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}

function classify(err: unknown, timedOut: boolean): FetchErrorKind {
  if (timedOut) return 'TIMEOUT';
  if (err instanceof Error && err.name === 'AbortError') return 'ABORT';
  const text = err instanceof Error
    ? `${err.message} ${err.cause instanceof Error ? err.cause.message : ''}`
    : String(err);
  if (text.includes('ENOTFOUND') || text.includes('getaddrinfo')) return 'DNS_FAIL';
  return 'NETWORK_ERROR';
}

/**
 * Settles with `read()` unless the signal aborts first.
 */
async function readWithin<T>(signal: AbortSignal, read: () => Promise<T>): Promise<T> {
  if (signal.aborted) throw signal.reason;

  let onAbort = () => {};
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([read(), aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

/**
 * Fetch with automatic timeout using AbortController.
 * `read` consumes the response while the timer is still armed, so a stalled
 * body fails with TIMEOUT like a stalled connect.
 * Only host and path are logged; query strings may carry API keys.
 *
 * @throws FetchError when the request or the body read fails
 */
export async function fetchWithTimeout<T>(
  url: string | URL,
  options: RequestInit,
  config: FetchWithTimeoutConfig,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const log = config.logger ?? defaultLogger;
  const urlObj = new URL(url);
  const host = urlObj.host;
  const path = urlObj.pathname;
  const stage = config.stage || 'unknown';
  const provider = config.provider || 'unknown';

  const controller = new AbortController();
  let timedOut = false;
  const startTime = Date.now();
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  const callerSignal = config.signal;
  const abortListener = () => controller.abort();
  if (callerSignal) {
    if (callerSignal.aborted) {
      controller.abort();
    } else {
      callerSignal.addEventListener('abort', abortListener);
    }
  }

  log.debug({ method: options.method || 'GET', host, path, timeoutMs: config.timeoutMs, stage }, '[FETCH] Request');

  try {
    const response = await fetch(urlObj, { ...options, signal: controller.signal });
    const value = await readWithin(controller.signal, () => read(response));
    log.debug({ status: response.status, host, path, durationMs: Date.now() - startTime }, '[FETCH] Response');
    return value;
  } catch (err) {
    const durationMs = Date.now() - startTime;
    const kind = classify(err, timedOut);

    log.warn({ errorKind: kind, host, path, durationMs, stage, provider }, '[FETCH] Request failed');

    throw new FetchError(
      `${provider} ${kind.toLowerCase().replace('_', ' ')} after ${durationMs}ms (${host})`,
      kind,
      provider,
      host,
      config.timeoutMs,
      stage,
      { cause: err }
    );
  } finally {
    clearTimeout(timeoutId);
    callerSignal?.removeEventListener('abort', abortListener);
  }
}

export interface JsonResponse {
  status: number;
  ok: boolean;
  /** Parsed body of a 2xx response; undefined otherwise */
  body: unknown;
}

/**
 * Fetches and reads the body inside the timeout. Bodies of non-2xx responses
 * are cancelled unread so the connection is released.
 *
 * @throws FetchError when the request or the body read fails
 * @throws SyntaxError when a 2xx body is not JSON
 */
export async function fetchJsonWithTimeout(
  url: string | URL,
  options: RequestInit,
  config: FetchWithTimeoutConfig
): Promise<JsonResponse> {
  const { status, ok, text } = await fetchWithTimeout(url, options, config, async res => {
    if (!res.ok) {
      await res.body?.cancel();
      return { status: res.status, ok: false, text: undefined };
    }
    return { status: res.status, ok: true, text: await res.text() };
  });

  return { status, ok, body: text === undefined ? undefined : JSON.parse(text) };
}
