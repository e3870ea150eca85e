import {
  ConflictError,
  InvalidCodeError,
  InvalidRequestError,
  InvariantViolationError,
} from '../errors';
import type { LinkStore } from '../store/link-store';
import type { Clock, CreateLinkRequest, CreateLinkResponse, OwnedLink, ShortLink } from '../types';
import { type Logger, createLogger } from '../utils/logger';
import { customCodeProblem, encodeBase62, isWellFormedCode } from '../utils/shortcode';
import { validateLongUrl } from '../utils/url';
import { type LinkCache, cacheTtlSeconds } from './cache.service';
import type { SequenceSource } from './sequence.service';

const MAX_OWNER_LENGTH = 128;
const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 100;

export interface LinkServiceDeps {
  store: LinkStore;
  cache: LinkCache;
  sequence: SequenceSource;
  baseUrl: string;
  cacheDefaultTtl: number;
  clock?: Clock;
  logger?: Logger;
}

function parseExpiry(value: CreateLinkRequest['expiresAt']): number | null {
  if (value === undefined || value === null) return null;

  const timestamp = typeof value === 'number' ? value : Date.parse(value);
  if (!Number.isFinite(timestamp)) {
    throw new InvalidRequestError('expires_at must be an ISO-8601 timestamp.');
  }
  return timestamp;
}

function parseOwner(value: string | undefined): string | null {
  if (value === undefined) return null;
  if (value.length === 0 || value.length > MAX_OWNER_LENGTH) {
    throw new InvalidRequestError(`owner must be 1-${MAX_OWNER_LENGTH} characters.`);
  }
  return value;
}

/**
 * Creates and deletes short links.
 */
export class LinkService {
  private store: LinkStore;
  private cache: LinkCache;
  private sequence: SequenceSource;
  private clock: Clock;
  private logger: Logger;

  constructor(private deps: LinkServiceDeps) {
    this.store = deps.store;
    this.cache = deps.cache;
    this.sequence = deps.sequence;
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? createLogger('links');
  }

  /**
   * Create a shortened URL, with a generated code unless one is supplied.
   * All validation happens before anything is written.
   */
  async createShortLink(request: CreateLinkRequest): Promise<CreateLinkResponse> {
    validateLongUrl(request.longUrl, this.deps.baseUrl);

    if (request.customCode !== undefined) {
      const problem = customCodeProblem(request.customCode);
      if (problem) {
        throw new InvalidCodeError(problem);
      }
    }

    const expiresAt = parseExpiry(request.expiresAt);
    const owner = parseOwner(request.owner);
    const draft = {
      longUrl: request.longUrl,
      owner,
      expiresAt,
      createdAt: this.clock(),
    };

    const link =
      request.customCode !== undefined
        ? await this.store.insert({ ...draft, code: request.customCode })
        : await this.insertGenerated(draft);

    this.logger.info('Short link created', { code: link.code, custom: request.customCode !== undefined });

    try {
      await this.cache.put(
        link.code,
        link.longUrl,
        link.expiresAt,
        cacheTtlSeconds(link.expiresAt, this.clock(), this.deps.cacheDefaultTtl)
      );
    } catch (error) {
      this.logger.warn('Cache pre-warm failed', { code: link.code, error });
    }

    return this.describe(link);
  }

  /**
   * Links created by `owner`, newest first. Served by the read-only connection.
   */
  async listOwnedLinks(owner: string, limit: number = DEFAULT_LIST_LIMIT): Promise<OwnedLink[]> {
    parseOwner(owner);
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      throw new InvalidRequestError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}.`);
    }

    const links = await this.store.listByOwner(owner, limit);
    return links.map((link) => ({ ...this.describe(link), createdAt: new Date(link.createdAt).toISOString() }));
  }

  private describe(link: ShortLink): CreateLinkResponse {
    return {
      code: link.code,
      shortUrl: `${this.deps.baseUrl.replace(/\/+$/, '')}/${link.code}`,
      longUrl: link.longUrl,
      expiresAt: link.expiresAt === null ? null : new Date(link.expiresAt).toISOString(),
    };
  }

  /**
   * Generated codes come from a counter that never repeats, so a conflict
   * here means a custom code already took this value (or the data is bad).
   * One retry with a fresh value; a second conflict is surfaced.
   */
  private async insertGenerated(draft: Omit<ShortLink, 'code'>): Promise<ShortLink> {
    const code = encodeBase62(await this.sequence.next());
    try {
      return await this.store.insert({ ...draft, code });
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
      this.logger.error('Generated code collided with an existing link', { code });
    }

    const retryCode = encodeBase62(await this.sequence.next());
    try {
      return await this.store.insert({ ...draft, code: retryCode });
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
      this.logger.error('Generated code collided again, giving up', { code: retryCode });
      throw new InvariantViolationError(`Generated codes "${code}" and "${retryCode}" are both in use`);
    }
  }

  /**
   * Delete a short link and its cached copy.
   * @returns false when no such link existed
   */
  async deleteShortLink(code: string): Promise<boolean> {
    // Anything else can't exist, and must never reach the cache protocol
    if (!isWellFormedCode(code)) {
      return false;
    }

    const deleted = await this.store.deleteByCode(code);
    await this.cache.delete(code);
    if (deleted) {
      this.logger.info('Short link deleted', { code });
    }
    return deleted;
  }
}
