import { UnavailableError, errorMessage } from '../errors';
import type { LinkStore } from '../store/link-store';
import type { Clock, ResolveResult, ShortLink } from '../types';
import { type Logger, createLogger } from '../utils/logger';
import { isWellFormedCode } from '../utils/shortcode';
import { withTimeout } from '../utils/timeout';
import { type LinkCache, cacheTtlSeconds } from './cache.service';

export interface RedirectServiceDeps {
  store: LinkStore;
  cache: LinkCache;
  cacheDefaultTtl: number;
  storeTimeoutMs: number;
  clock?: Clock;
  logger?: Logger;
}

function isExpired(expiresAt: number | null, now: number): boolean {
  return expiresAt !== null && now >= expiresAt;
}

/**
 * Resolves short codes: cache first, store on miss.
 *
 * A cache hit is re-checked against the link's expiry on every call; the
 * cache TTL only bounds staleness. Expired links are purged lazily from
 * both stores. Purge failures are logged and retried by the next access.
 */
export class RedirectService {
  private store: LinkStore;
  private cache: LinkCache;
  private clock: Clock;
  private logger: Logger;
  private pendingCleanups = new Set<Promise<void>>();

  constructor(private deps: RedirectServiceDeps) {
    this.store = deps.store;
    this.cache = deps.cache;
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? createLogger('redirect');
  }

  async resolve(code: string): Promise<ResolveResult> {
    if (!isWellFormedCode(code)) {
      return { kind: 'not_found' };
    }

    const entry = await this.cache.get(code);
    if (entry) {
      if (isExpired(entry.expiresAt, this.clock())) {
        this.purgeInBackground(code);
        return { kind: 'gone' };
      }
      return { kind: 'found', longUrl: entry.longUrl };
    }

    const record = await this.findInStore(code);
    if (!record) {
      return { kind: 'not_found' };
    }

    const now = this.clock();
    if (isExpired(record.expiresAt, now)) {
      await this.purge(code);
      return { kind: 'gone' };
    }

    await this.repairCache(record, now);
    return { kind: 'found', longUrl: record.longUrl };
  }

  /**
   * Wait for background cleanups started so far.
   */
  async drain(): Promise<void> {
    await Promise.all([...this.pendingCleanups]);
  }

  // The timeout only bites on asynchronous stores. better-sqlite3 answers
  // synchronously and is bounded by its busy timeout instead.
  private async findInStore(code: string): Promise<ShortLink | null> {
    try {
      return await withTimeout(this.store.findByCode(code), this.deps.storeTimeoutMs, 'store findByCode');
    } catch (error) {
      this.logger.error('Store lookup failed', { code, error });
      throw new UnavailableError(`Link store unavailable: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Re-populate the cache after a miss. A delete can land between the store
   * read and the put; the put is then undone so a removed link stays removed.
   */
  private async repairCache(record: ShortLink, now: number): Promise<void> {
    try {
      await this.cache.put(
        record.code,
        record.longUrl,
        record.expiresAt,
        cacheTtlSeconds(record.expiresAt, now, this.deps.cacheDefaultTtl)
      );
      const current = await withTimeout(this.store.findByCode(record.code), this.deps.storeTimeoutMs, 'store findByCode');
      if (!current) {
        this.logger.debug('Link removed during cache repair', { code: record.code });
        await this.cache.delete(record.code);
      }
    } catch (error) {
      this.logger.warn('Cache repair failed', { code: record.code, error });
    }
  }

  /**
   * Remove an expired link from the store and the cache. Never throws.
   */
  private async purge(code: string): Promise<void> {
    try {
      const deleted = await withTimeout(this.store.deleteByCode(code), this.deps.storeTimeoutMs, 'store deleteByCode');
      if (deleted) {
        this.logger.debug('Purged expired link', { code });
      }
    } catch (error) {
      this.logger.warn('Lazy purge of expired link failed', { code, error });
    }
    try {
      await this.cache.delete(code);
    } catch (error) {
      this.logger.warn('Cache purge of expired link failed', { code, error });
    }
  }

  private purgeInBackground(code: string): void {
    const cleanup = this.purge(code).finally(() => {
      this.pendingCleanups.delete(cleanup);
    });
    this.pendingCleanups.add(cleanup);
  }
}
