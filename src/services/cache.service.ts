import type { KVStore } from '../kv-client';
import type { CacheEntry } from '../types';
import { type Logger, createLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

export const LINK_KEY_PREFIX = 'link:';

/**
 * Fast-path copy of short links. A hint, never the source of truth:
 * reads that fail or time out are misses, writes that fail are dropped.
 */
export interface LinkCache {
  put(code: string, longUrl: string, logicalExpiry: number | null, ttlSeconds: number): Promise<void>;
  get(code: string): Promise<CacheEntry | null>;
  delete(code: string): Promise<void>;
}

/**
 * Storage-level TTL for a cache entry.
 *
 * Expiring links live in the cache exactly as long as they are valid;
 * everything else gets the default, which only bounds staleness.
 */
export function cacheTtlSeconds(logicalExpiry: number | null, now: number, defaultTtl: number): number {
  if (logicalExpiry === null) return defaultTtl;
  return Math.max(Math.ceil((logicalExpiry - now) / 1000), 0);
}

export function linkKey(code: string): string {
  return `${LINK_KEY_PREFIX}${code}`;
}

function decodeEntry(raw: string): CacheEntry | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof value !== 'object' || value === null) return null;
  if (!('longUrl' in value) || typeof value.longUrl !== 'string') return null;

  let expiresAt: number | null = null;
  if ('expiresAt' in value && value.expiresAt !== null) {
    if (typeof value.expiresAt !== 'number') return null;
    expiresAt = value.expiresAt;
  }

  return { longUrl: value.longUrl, expiresAt };
}

export interface KVLinkCacheOptions {
  timeoutMs: number;
  logger?: Logger;
}

/**
 * LinkCache on top of the KV server (SETEX / GET / DELETE).
 */
export class KVLinkCache implements LinkCache {
  private logger: Logger;

  constructor(
    private getClient: () => Promise<KVStore>,
    private options: KVLinkCacheOptions
  ) {
    this.logger = options.logger ?? createLogger('cache');
  }

  private async run<T>(label: string, operation: (client: KVStore) => Promise<T>): Promise<T> {
    return withTimeout(
      this.getClient().then(operation),
      this.options.timeoutMs,
      `cache ${label}`
    );
  }

  async put(code: string, longUrl: string, logicalExpiry: number | null, ttlSeconds: number): Promise<void> {
    // SETEX with 0 would either fail or store a dead entry
    if (ttlSeconds <= 0) return;

    const entry: CacheEntry = { longUrl, expiresAt: logicalExpiry };
    try {
      const stored = await this.run('put', (client) =>
        client.setex(linkKey(code), ttlSeconds, JSON.stringify(entry))
      );
      if (!stored) {
        this.logger.warn('Cache write rejected', { code });
      }
    } catch (error) {
      this.logger.warn('Cache write failed', { code, error });
    }
  }

  async get(code: string): Promise<CacheEntry | null> {
    let raw: string | null;
    try {
      raw = await this.run('get', (client) => client.get(linkKey(code)));
    } catch (error) {
      this.logger.warn('Cache read failed, treating as miss', { code, error });
      return null;
    }
    if (raw === null) return null;

    const entry = decodeEntry(raw);
    if (!entry) {
      this.logger.warn('Undecodable cache entry, treating as miss', { code });
    }
    return entry;
  }

  async delete(code: string): Promise<void> {
    try {
      await this.run('delete', (client) => client.delete(linkKey(code)));
    } catch (error) {
      this.logger.warn('Cache delete failed', { code, error });
    }
  }
}
