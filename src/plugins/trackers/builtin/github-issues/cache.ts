/**
 * ABOUTME: On-disk cache for remote tracker snapshots.
 * One JSON file holds every entry, keyed by repository and filter signature.
 * Writes go through writeJsonAtomic; a corrupt file reads as empty.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { errorMessage } from '../../../../errors.js';
import { writeJsonAtomic } from '../../../../utils/atomic-file.js';

export const CACHE_FILE_VERSION = 1;

export interface RateLimitSnapshot {
  remaining: number;
  /** Epoch milliseconds, null when unknown */
  resetAt: number | null;
}

export interface CacheEntry<T> {
  key: string;
  payload: T;
  /** ISO 8601 */
  fetchedAt: string;
  ttlSeconds: number;
  etag?: string;
  rateLimit?: RateLimitSnapshot;
  /** Set when a local write made the payload out of date; never fresh */
  stale?: boolean;
}

const RateLimitSnapshotSchema = z.object({
  remaining: z.number(),
  resetAt: z.number().nullable(),
});

const RawEntrySchema = z.object({
  key: z.string(),
  payload: z.unknown(),
  fetchedAt: z.string(),
  ttlSeconds: z.number(),
  etag: z.string().optional(),
  rateLimit: RateLimitSnapshotSchema.optional(),
  stale: z.boolean().optional(),
});

const CacheFileSchema = z.object({
  version: z.literal(CACHE_FILE_VERSION),
  entries: z.record(z.string(), RawEntrySchema),
});

type CacheFile = z.infer<typeof CacheFileSchema>;

/**
 * Build the cache key for a repository and label filter. Label order does not matter.
 */
export function cacheKey(repo: string, labels: readonly string[], excludeLabels: readonly string[]): string {
  const sorted = (values: readonly string[]): string => [...values].sort().join(',');
  return `${repo}|labels=${sorted(labels)}|exclude=${sorted(excludeLabels)}`;
}

/**
 * Whether the entry is younger than its TTL. A TTL of 0 is never fresh.
 */
export function isFresh(entry: CacheEntry<unknown>, now: Date): boolean {
  const fetched = Date.parse(entry.fetchedAt);
  if (entry.stale || Number.isNaN(fetched) || entry.ttlSeconds <= 0) {
    return false;
  }
  return now.getTime() - fetched < entry.ttlSeconds * 1000;
}

export interface CacheStoreOptions {
  onWarning?: (message: string) => void;
}

/**
 * Cache entries whose payload is validated by `payloadSchema` on read.
 * An entry whose payload no longer validates is treated as missing.
 */
export class CacheStore<T> {
  private readonly onWarning: (message: string) => void;

  constructor(
    readonly path: string,
    private readonly payloadSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: CacheStoreOptions = {}
  ) {
    this.onWarning = options.onWarning ?? ((message) => console.warn(`[cache] ${message}`));
  }

  private async readCacheFile(): Promise<CacheFile> {
    const empty: CacheFile = { version: CACHE_FILE_VERSION, entries: {} };
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
        return empty;
      }
      this.onWarning(`Cannot read cache ${this.path}: ${errorMessage(err)}; treating as empty`);
      return empty;
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (err) {
      this.onWarning(`Corrupt cache ${this.path} (${errorMessage(err)}); treating as empty`);
      return empty;
    }

    const parsed = CacheFileSchema.safeParse(document);
    if (!parsed.success) {
      this.onWarning(`Unrecognized cache format in ${this.path}; treating as empty`);
      return empty;
    }
    return parsed.data;
  }

  async get(key: string): Promise<CacheEntry<T> | undefined> {
    const file = await this.readCacheFile();
    const raw = file.entries[key];
    if (!raw) {
      return undefined;
    }
    const payload = this.payloadSchema.safeParse(raw.payload);
    if (!payload.success) {
      this.onWarning(`Discarding cache entry '${key}' with an invalid payload`);
      return undefined;
    }
    return { ...raw, payload: payload.data };
  }

  async put(entry: CacheEntry<T>): Promise<void> {
    const file = await this.readCacheFile();
    file.entries[entry.key] = entry;
    await writeJsonAtomic(this.path, file);
  }

  /**
   * Mark an entry as just fetched (e.g. after a 304). No-op when absent.
   */
  async touch(key: string, fetchedAt: Date, rateLimit?: RateLimitSnapshot): Promise<void> {
    const file = await this.readCacheFile();
    const entry = file.entries[key];
    if (!entry) {
      return;
    }
    file.entries[key] = {
      ...entry,
      fetchedAt: fetchedAt.toISOString(),
      rateLimit: rateLimit ?? entry.rateLimit,
      stale: undefined,
    };
    await writeJsonAtomic(this.path, file);
  }

  /**
   * Force the next read of an entry to refresh, keeping its payload as the
   * offline fallback. `revise` may patch the payload to reflect a local
   * write. The etag is dropped so the refresh cannot come back as a 304.
   * No-op when absent.
   */
  async markStale(key: string, revise?: (payload: T) => T): Promise<void> {
    const file = await this.readCacheFile();
    const entry = file.entries[key];
    if (!entry) {
      return;
    }
    let payload = entry.payload;
    if (revise) {
      const parsed = this.payloadSchema.safeParse(entry.payload);
      if (parsed.success) {
        payload = revise(parsed.data);
      }
    }
    file.entries[key] = { ...entry, payload, etag: undefined, stale: true };
    await writeJsonAtomic(this.path, file);
  }
}
