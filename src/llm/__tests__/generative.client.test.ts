import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import pino from 'pino';
import { GenerativeClient, attemptTimeoutMs, retryDelayMs, type GenerativeClientOptions } from '../generative.client.js';

const silent = pino({ level: 'silent' });

type Step = { status: number; body?: unknown } | Error;

interface RecordedCall {
  url: URL;
  headers: Headers;
}

/**
 * Replies with the scripted steps in order; the last step repeats.
 */
function scriptFetch(steps: Step[]): RecordedCall[] {
  const calls: RecordedCall[] = [];
  mock.method(globalThis, 'fetch', async (input: string | URL | Request, init?: RequestInit) => {
    const step = steps[Math.min(calls.length, steps.length - 1)];
    calls.push({ url: new URL(String(input)), headers: new Headers(init?.headers) });
    if (step === undefined) throw new Error('no scripted step');
    if (step instanceof Error) throw step;
    return new Response(JSON.stringify(step.body ?? {}), { status: step.status });
  });
  return calls;
}

/**
 * Never answers; rejects once the request signal aborts.
 */
function stallFetch(): RecordedCall[] {
  const calls: RecordedCall[] = [];
  mock.method(globalThis, 'fetch', (input: string | URL | Request, init?: RequestInit) => {
    calls.push({ url: new URL(String(input)), headers: new Headers(init?.headers) });
    return new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (!signal) return reject(new Error('request sent without a signal'));
      signal.addEventListener('abort', () => reject(signal.reason));
    });
  });
  return calls;
}

/** Sends a partial body and never closes it */
function stalledBody(prefix: string): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode(prefix));
    },
  });
}

/** Warn-level logger that keeps every entry */
function captureLogger() {
  const entries: Array<Record<string, unknown>> = [];
  const logger = pino({ level: 'warn' }, {
    write(line: string) {
      entries.push(JSON.parse(line));
    },
  });
  const attemptFailures = () => entries.filter(entry => entry.msg === '[Generative] Attempt failed');
  return { logger, attemptFailures };
}

function textBody(text: string) {
  return { candidates: [{ content: { parts: [{ text }] } }] };
}

function createClient(overrides: Partial<GenerativeClientOptions> = {}) {
  const delays: number[] = [];
  const client = new GenerativeClient({
    apiKey: 'test-secret',
    maxRetries: 3,
    baseUrl: 'https://generative.test/v1beta',
    sleep: async (ms: number) => { delays.push(ms); },
    logger: silent,
    ...overrides,
  });
  return { client, delays };
}

describe('retryDelayMs', () => {
  it('should follow the per-outcome delay rules', () => {
    assert.equal(retryDelayMs({ kind: 'rate_limited' }, 0), 60_000);
    assert.equal(retryDelayMs({ kind: 'rate_limited' }, 2), 180_000);
    assert.equal(retryDelayMs({ kind: 'rate_limited' }, 9), 300_000);
    assert.equal(retryDelayMs({ kind: 'http_error', status: 500 }, 1), 5000);
    assert.equal(retryDelayMs({ kind: 'timeout' }, 0), 10_000);
    assert.equal(retryDelayMs({ kind: 'transport', error: new Error('reset') }, 2), 4000);
    assert.equal(retryDelayMs({ kind: 'not_found' }, 0), null);
  });
});

describe('attemptTimeoutMs', () => {
  it('should give the first attempt 60s and later attempts 30s', () => {
    assert.equal(attemptTimeoutMs(0), 60_000);
    assert.equal(attemptTimeoutMs(1), 30_000);
    assert.equal(attemptTimeoutMs(2), 30_000);
    assert.equal(attemptTimeoutMs(1, { firstAttemptMs: 40, retryMs: 20 }), 20);
  });
});

describe('GenerativeClient', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('should return the first successful response', async () => {
    const calls = scriptFetch([{ status: 200, body: textBody('{"cuisine_type":"Thai"}') }]);
    const { client, delays } = createClient();

    const result = await client.request('prompt');

    assert.ok(result.ok);
    assert.equal(result.value.model, 'gemini-1.5-flash');
    assert.equal(result.value.authMethod, 'header');
    assert.equal(result.value.attempts, 1);
    assert.equal(calls[0]?.url.pathname, '/v1beta/models/gemini-1.5-flash:generateContent');
    assert.equal(calls[0]?.headers.get('x-goog-api-key'), 'test-secret');
    assert.equal(calls[0]?.url.searchParams.get('key'), null);
    assert.deepEqual(delays, []);
  });

  it('should try every configuration and report exhaustion', async () => {
    const calls = scriptFetch([{ status: 500 }]);
    const { client, delays } = createClient();

    const result = await client.request('prompt');

    assert.ok(!result.ok);
    assert.equal(result.error.code, 'GENERATIVE_UNAVAILABLE');
    assert.deepEqual(result.error.details, { reason: 'all_attempts_failed', attempts: 9 });
    assert.equal(calls.length, 9);
    // no wait after the last attempt of each configuration
    assert.deepEqual(delays, [5000, 5000, 5000, 5000, 5000, 5000]);
    assert.equal(calls[8]?.url.searchParams.get('key'), 'test-secret');
    assert.equal(calls[8]?.headers.get('x-goog-api-key'), null);
  });

  it('should stop at once on 403', async () => {
    const calls = scriptFetch([{ status: 403 }]);
    const { client, delays } = createClient();

    const result = await client.request('prompt');

    assert.ok(!result.ok);
    assert.deepEqual(result.error.details, { reason: 'forbidden', attempts: 1 });
    assert.equal(calls.length, 1);
    assert.deepEqual(delays, []);
  });

  it('should move to the next configuration on 404', async () => {
    const calls = scriptFetch([{ status: 404 }, { status: 200, body: textBody('hello') }]);
    const { client, delays } = createClient();

    const result = await client.request('prompt');

    assert.ok(result.ok);
    assert.equal(result.value.model, 'gemini-1.0-pro');
    assert.equal(result.value.attempts, 2);
    assert.equal(calls[1]?.url.pathname, '/v1beta/models/gemini-1.0-pro:generateContent');
    assert.deepEqual(delays, []);
  });

  it('should wait before retrying a rate-limited configuration', async () => {
    scriptFetch([{ status: 429 }, { status: 200, body: textBody('hello') }]);
    const { client, delays } = createClient();

    const result = await client.request('prompt');

    assert.ok(result.ok);
    assert.equal(result.value.model, 'gemini-1.5-flash');
    assert.deepEqual(delays, [60_000]);
  });

  it('should back off exponentially on transport errors', async () => {
    scriptFetch([new TypeError('fetch failed'), new TypeError('fetch failed'), { status: 200, body: textBody('hi') }]);
    const { client, delays } = createClient();

    const result = await client.request('prompt');

    assert.ok(result.ok);
    assert.equal(result.value.attempts, 3);
    assert.deepEqual(delays, [1000, 2000]);
  });

  it('should fail without any request when no key is set', async () => {
    const calls = scriptFetch([{ status: 200, body: textBody('hi') }]);
    const { client } = createClient({ apiKey: undefined });

    const result = await client.request('prompt');

    assert.equal(client.configured, false);
    assert.ok(!result.ok);
    assert.deepEqual(result.error.details, { reason: 'missing_api_key', attempts: 0 });
    assert.equal(calls.length, 0);
  });

  it('should honour custom endpoints', async () => {
    const calls = scriptFetch([{ status: 200, body: textBody('hi') }]);
    const { client } = createClient({ endpoints: [{ model: 'custom-model', authMethod: 'query' }] });

    const result = await client.request('prompt');

    assert.ok(result.ok);
    assert.equal(result.value.authMethod, 'query');
    assert.equal(calls[0]?.url.searchParams.get('key'), 'test-secret');
  });

  it('should arm 60s for the first attempt of each configuration and 30s after', async () => {
    scriptFetch([{ status: 500 }]);
    const { logger, attemptFailures } = captureLogger();
    const { client } = createClient({ logger });

    await client.request('prompt');

    assert.deepEqual(
      attemptFailures().map(entry => entry.timeoutMs),
      [60_000, 30_000, 30_000, 60_000, 30_000, 30_000, 60_000, 30_000, 30_000]
    );
  });

  it('should treat an expired request as a timeout and wait 10s before retrying', async () => {
    const calls = stallFetch();
    const { logger, attemptFailures } = captureLogger();
    const { client, delays } = createClient({ logger, timeouts: { firstAttemptMs: 20, retryMs: 10 } });

    const result = await client.request('prompt');

    assert.ok(!result.ok);
    assert.deepEqual(result.error.details, { reason: 'all_attempts_failed', attempts: 9 });
    assert.equal(calls.length, 9);
    assert.deepEqual(delays, [10_000, 10_000, 10_000, 10_000, 10_000, 10_000]);
    const failures = attemptFailures();
    assert.ok(failures.every(entry => entry.outcome === 'timeout'));
    assert.deepEqual(failures.slice(0, 3).map(entry => entry.timeoutMs), [20, 10, 10]);
  });

  it('should time out when the response body stalls after the headers', async () => {
    mock.method(globalThis, 'fetch', async () => new Response(stalledBody('{"candidates":'), { status: 200 }));
    const { logger, attemptFailures } = captureLogger();
    const { client, delays } = createClient({ logger, maxRetries: 1, timeouts: { firstAttemptMs: 20, retryMs: 20 } });

    const result = await client.request('prompt');

    assert.ok(!result.ok);
    assert.deepEqual(result.error.details, { reason: 'all_attempts_failed', attempts: 3 });
    assert.deepEqual(attemptFailures().map(entry => entry.outcome), ['timeout', 'timeout', 'timeout']);
    assert.deepEqual(delays, []);
  });

  it('should release the body of an error response', async () => {
    let cancelled = 0;
    mock.method(globalThis, 'fetch', async () => new Response(new ReadableStream<Uint8Array>({
      cancel() {
        cancelled++;
      },
    }), { status: 403 }));
    const { client } = createClient();

    const result = await client.request('prompt');

    assert.ok(!result.ok);
    assert.deepEqual(result.error.details, { reason: 'forbidden', attempts: 1 });
    assert.equal(cancelled, 1);
  });

  describe('checkConnection', () => {
    it('should report the model and its reply', async () => {
      scriptFetch([{ status: 200, body: textBody(' OK \n') }]);
      const { client } = createClient();

      assert.deepEqual(await client.checkConnection(), {
        success: true,
        model: 'gemini-1.5-flash',
        message: 'Connected (gemini-1.5-flash): OK',
      });
    });

    it('should make one attempt per configuration', async () => {
      const calls = scriptFetch([{ status: 500 }]);
      const { client, delays } = createClient();

      const check = await client.checkConnection();

      assert.deepEqual(check, { success: false, message: 'All generative API attempts failed' });
      assert.equal(calls.length, 3);
      assert.deepEqual(delays, []);
    });
  });
});
