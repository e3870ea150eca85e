import { Router, type Request, type Response, type NextFunction } from 'express';
import { InvalidRequestError, InvalidUrlError } from '../errors';
import type { LinkService } from '../services/link.service';
import type { RateLimiter } from '../services/rate-limiter';
import type { RedirectService } from '../services/redirect.service';
import type { LinkStore } from '../store/link-store';
import type { Clock, CreateLinkRequest, ShortenBody } from '../types';

export interface LinkRouterDeps {
  links: LinkService;
  redirects: RedirectService;
  store: LinkStore;
  rateLimiter: RateLimiter;
  clock?: Clock;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidRequestError(`${field} must be a string.`);
  }
  return value;
}

function optionalTimestamp(value: unknown): string | number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string' || typeof value === 'number') return value;
  throw new InvalidRequestError('expires_at must be an ISO-8601 string or epoch milliseconds.');
}

/**
 * Map a POST /shorten body onto the creation request.
 */
export function parseShortenBody(body: ShortenBody): CreateLinkRequest {
  const longUrl = optionalString(body.long_url, 'long_url');
  if (!longUrl) {
    throw new InvalidUrlError('URL is required.');
  }
  return {
    longUrl,
    customCode: optionalString(body.custom_code, 'custom_code'),
    expiresAt: optionalTimestamp(body.expires_at) ?? null,
    owner: optionalString(body.owner, 'owner'),
  };
}

function readBody(req: Request): ShortenBody {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new InvalidRequestError('Request body must be a JSON object.');
  }
  return {
    long_url: 'long_url' in body ? body.long_url : undefined,
    custom_code: 'custom_code' in body ? body.custom_code : undefined,
    expires_at: 'expires_at' in body ? body.expires_at : undefined,
    owner: 'owner' in body ? body.owner : undefined,
  };
}

export function createLinkRouter(deps: LinkRouterDeps): Router {
  const router = Router();
  const clock = deps.clock ?? Date.now;

  /**
   * Rate limiting middleware for URL creation
   */
  async function rateLimitMiddleware(req: Request, res: Response, next: NextFunction): Promise<void> {
    const identifier = req.ip || 'unknown';
    const result = await deps.rateLimiter.checkLimit(identifier);

    // Set rate limit headers
    res.setHeader('X-RateLimit-Limit', deps.rateLimiter.limit.toString());
    res.setHeader('X-RateLimit-Remaining', result.remaining.toString());
    res.setHeader('X-RateLimit-Reset', result.resetIn.toString());

    if (!result.allowed) {
      res.status(429).json({
        error: 'RATE_LIMITED',
        message: 'Rate limit exceeded. Please try again later.',
        retryAfter: result.resetIn,
      });
      return;
    }

    next();
  }

  /**
   * POST /shorten - Create a short URL
   */
  router.post('/shorten', rateLimitMiddleware, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseShortenBody(readBody(req));
      const result = await deps.links.createShortLink(request);
      res.status(201).json({
        short_url: result.shortUrl,
        code: result.code,
        expires_at: result.expiresAt,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /stats - Link counts, or one owner's links with ?owner=, read from the replica
   */
  router.get('/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const owner = optionalString(req.query.owner, 'owner');
      if (owner === undefined) {
        res.json(await deps.store.countLinks(clock()));
        return;
      }

      const limit = optionalString(req.query.limit, 'limit');
      const links = await deps.links.listOwnedLinks(owner, limit === undefined ? undefined : Number(limit));
      res.json({
        owner,
        links: links.map((link) => ({
          code: link.code,
          short_url: link.shortUrl,
          long_url: link.longUrl,
          expires_at: link.expiresAt,
          created_at: link.createdAt,
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /:code - Delete a short URL
   */
  router.delete('/:code', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const deleted = await deps.links.deleteShortLink(req.params.code);

      if (!deleted) {
        res.status(404).json({ error: 'NOT_FOUND', message: 'Short link not found' });
        return;
      }

      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /:code - Redirect to long URL
   */
  router.get('/:code', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await deps.redirects.resolve(req.params.code);

      switch (result.kind) {
        case 'found':
          res.redirect(302, result.longUrl);
          return;
        case 'gone':
          res.status(410).json({ error: 'GONE', message: 'Short link has expired' });
          return;
        case 'not_found':
          res.status(404).json({ error: 'NOT_FOUND', message: 'Short link not found' });
          return;
      }
    } catch (error) {
      next(error);
    }
  });

  return router;
}
