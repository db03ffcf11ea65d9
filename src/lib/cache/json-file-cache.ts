/**
 * JSON File Cache
 * Keyed, timestamped entries persisted as one JSON document.
 *
 * - Reads are served from memory; every mutation rewrites the whole file synchronously
 * - Stale entries are kept until overwritten and only reported by diagnostics
 * - The document carries a version; other versions load as an empty cache
 * - Entries are validated on load; invalid ones are skipped
 *
 * Not safe for several processes sharing one file (last writer wins).
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger as defaultLogger, type Logger } from '../logger/structured-logger.js';
import { isFresh } from './cache-policy.js';

export const CACHE_FILE_VERSION = 1;

export interface CacheEntry<T> {
  key: string;
  value: T;
  /** Epoch milliseconds */
  cachedAt: number;
}

export interface CacheDiagnostics {
  entries: number;
  expiredEntries: number;
  fileExists: boolean;
}

export interface JsonFileCacheOptions<T> {
  filePath: string;
  /** Short name used in log lines */
  name: string;
  /** Validates each stored value on load */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  now?: () => number;
  logger?: Logger;
}

const DocumentSchema = z.object({
  version: z.number(),
  entries: z.record(z.string(), z.unknown()),
});

const EntryEnvelopeSchema = z.object({
  key: z.string(),
  value: z.unknown(),
  cachedAt: z.number(),
});

export class JsonFileCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private readonly options: JsonFileCacheOptions<T>) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
    this.load();
  }

  get filePath(): string {
    return this.options.filePath;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Entry for key if present and younger than ttlMs, otherwise null.
   */
  get(key: string, ttlMs: number): CacheEntry<T> | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    return isFresh(entry.cachedAt, ttlMs, this.now()) ? entry : null;
  }

  /** Entry for key regardless of age. */
  peek(key: string): CacheEntry<T> | undefined {
    return this.entries.get(key);
  }

  values(): CacheEntry<T>[] {
    return Array.from(this.entries.values());
  }

  /**
   * Replace the entry for key and persist before returning.
   * A failed write is logged; the in-memory entry is still served.
   */
  set(key: string, value: T): CacheEntry<T> {
    const entry: CacheEntry<T> = { key, value, cachedAt: this.now() };
    this.entries.set(key, entry);
    this.persist();
    return entry;
  }

  /** Returns false only when the file could not be written. */
  delete(key: string): boolean {
    if (!this.entries.delete(key)) return true;
    return this.persist();
  }

  /** Returns false only when the file could not be written. */
  clear(): boolean {
    this.entries.clear();
    return this.persist();
  }

  /**
   * ttlMs may be a function so callers can age entries differently
   * (e.g. fallback analyses expire sooner).
   */
  diagnostics(ttlMs: number | ((entry: CacheEntry<T>) => number)): CacheDiagnostics {
    const now = this.now();
    let expiredEntries = 0;
    for (const entry of this.entries.values()) {
      const ttl = typeof ttlMs === 'function' ? ttlMs(entry) : ttlMs;
      if (!isFresh(entry.cachedAt, ttl, now)) expiredEntries++;
    }
    return {
      entries: this.entries.size,
      expiredEntries,
      fileExists: fs.existsSync(this.options.filePath),
    };
  }

  private load(): void {
    const { filePath, name } = this.options;
    if (!fs.existsSync(filePath)) return;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      this.logger.error({ cache: name, filePath, error: error instanceof Error ? error.message : String(error) },
        '[Cache] Failed to read cache file, starting empty');
      return;
    }

    const doc = DocumentSchema.safeParse(raw);
    if (!doc.success || doc.data.version !== CACHE_FILE_VERSION) {
      this.logger.warn({ cache: name, filePath, expectedVersion: CACHE_FILE_VERSION },
        '[Cache] Unrecognized cache file format, starting empty');
      return;
    }

    let skipped = 0;
    for (const [key, candidate] of Object.entries(doc.data.entries)) {
      const envelope = EntryEnvelopeSchema.safeParse(candidate);
      const value = envelope.success ? this.options.schema.safeParse(envelope.data.value) : undefined;
      if (envelope.success && value?.success && envelope.data.key === key) {
        this.entries.set(key, { key, value: value.data, cachedAt: envelope.data.cachedAt });
      } else {
        skipped++;
      }
    }

    this.logger.debug({ cache: name, loaded: this.entries.size, skipped }, '[Cache] Loaded');
  }

  private persist(): boolean {
    const { filePath, name } = this.options;
    const document = {
      version: CACHE_FILE_VERSION,
      entries: Object.fromEntries(this.entries),
    };

    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, JSON.stringify(document, null, 2), 'utf-8');
      return true;
    } catch (error) {
      this.logger.error({ cache: name, filePath, error: error instanceof Error ? error.message : String(error) },
        '[Cache] Failed to write cache file');
      return false;
    }
  }
}
