/**
 * Integration tests for the HTTP surface.
 *
 * Tests the full request/response cycle using supertest against an
 * in-memory database and kv store.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { UnavailableError } from '../../src/errors';
import { type Harness, T0, createHarness, createTestApp } from '../helpers/harness';

describe('short link API', () => {
  let h: Harness;
  let app: Application;

  beforeEach(() => {
    h = createHarness();
    app = createTestApp(h);
  });

  afterEach(() => {
    h.database.close();
  });

  describe('POST /shorten', () => {
    it('creates a link with a generated code (scenario A)', async () => {
      const response = await request(app).post('/shorten').send({ long_url: 'https://example.com/a' });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ short_url: 'http://sho.rt/1', code: '1', expires_at: null });

      const redirect = await request(app).get('/1');
      expect(redirect.status).toBe(302);
      expect(redirect.headers.location).toBe('https://example.com/a');
    });

    it('rejects a second use of the same custom code (scenario B)', async () => {
      const first = await request(app)
        .post('/shorten')
        .send({ long_url: 'https://example.com/a', custom_code: 'my-link' });
      const second = await request(app)
        .post('/shorten')
        .send({ long_url: 'https://example.com/b', custom_code: 'my-link' });

      expect(first.status).toBe(201);
      expect(first.body.code).toBe('my-link');
      expect(second.status).toBe(409);
      expect(second.body).toEqual({ error: 'CODE_IN_USE', message: 'Code "my-link" is already in use' });
    });

    it('rejects a disallowed scheme with 422 (scenario E)', async () => {
      const response = await request(app).post('/shorten').send({ long_url: 'ftp://example.com' });

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        error: 'UNSUPPORTED_SCHEME',
        message: 'Unsupported URL scheme "ftp". Only http and https are allowed.',
      });
    });

    it('rejects invalid URLs with 400', async () => {
      const missing = await request(app).post('/shorten').send({});
      const malformed = await request(app).post('/shorten').send({ long_url: 'not-a-url' });
      const selfLink = await request(app).post('/shorten').send({ long_url: 'http://sho.rt/1' });
      const tooLong = await request(app)
        .post('/shorten')
        .send({ long_url: `https://example.com/${'a'.repeat(2048)}` });

      expect(missing.body).toEqual({ error: 'INVALID_URL', message: 'URL is required.' });
      for (const response of [missing, malformed, selfLink, tooLong]) {
        expect(response.status).toBe(400);
        expect(response.body.error).toBe('INVALID_URL');
      }
    });

    it('rejects bad field types and bodies', async () => {
      const wrongType = await request(app).post('/shorten').send({ long_url: 42 });
      const badExpiry = await request(app)
        .post('/shorten')
        .send({ long_url: 'https://example.com/a', expires_at: 'someday' });
      const badCode = await request(app)
        .post('/shorten')
        .send({ long_url: 'https://example.com/a', custom_code: 'no spaces' });
      const badJson = await request(app).post('/shorten').set('Content-Type', 'application/json').send('{"long_url":');

      expect(wrongType.status).toBe(400);
      expect(wrongType.body).toEqual({ error: 'INVALID_REQUEST', message: 'long_url must be a string.' });
      expect(badExpiry.status).toBe(400);
      expect(badExpiry.body.error).toBe('INVALID_REQUEST');
      expect(badCode.status).toBe(400);
      expect(badCode.body.error).toBe('INVALID_CODE');
      expect(badJson.status).toBe(400);
      expect(badJson.body).toEqual({ error: 'INVALID_REQUEST', message: 'Request body is not valid JSON.' });
    });

    it('returns the expiry it stored', async () => {
      const response = await request(app)
        .post('/shorten')
        .send({ long_url: 'https://example.com/a', expires_at: '2026-01-02T00:00:00Z', owner: 'team-a' });

      expect(response.status).toBe(201);
      expect(response.body.expires_at).toBe('2026-01-02T00:00:00.000Z');
      expect((await h.store.findByCode(response.body.code))?.owner).toBe('team-a');
    });

    it('accepts expires_at as epoch milliseconds', async () => {
      const numeric = await request(app)
        .post('/shorten')
        .send({ long_url: 'https://example.com/a', expires_at: T0 + 60_000 });
      const wrongType = await request(app)
        .post('/shorten')
        .send({ long_url: 'https://example.com/a', expires_at: true });

      expect(numeric.status).toBe(201);
      expect(numeric.body.expires_at).toBe('2026-01-01T00:01:00.000Z');
      expect(wrongType.status).toBe(400);
      expect(wrongType.body).toEqual({
        error: 'INVALID_REQUEST',
        message: 'expires_at must be an ISO-8601 string or epoch milliseconds.',
      });
    });

    it('lets exactly one of many concurrent custom-code requests succeed', async () => {
      const responses = await Promise.all(
        Array.from({ length: 8 }, (_, i) =>
          request(app).post('/shorten').send({ long_url: `https://example.com/${i}`, custom_code: 'contested' })
        )
      );

      const statuses = responses.map((r) => r.status).sort();
      expect(statuses).toEqual([201, 409, 409, 409, 409, 409, 409, 409]);
    });

    it('answers 503 when the sequence source is down', async () => {
      vi.spyOn(h.sequence, 'next').mockRejectedValue(new UnavailableError('Sequence source unavailable: unreachable'));

      const response = await request(app).post('/shorten').send({ long_url: 'https://example.com/a' });
      expect(response.status).toBe(503);
      expect(response.body.error).toBe('UNAVAILABLE');
    });

    it('applies the rate limit when enabled', async () => {
      const limited = createTestApp(h, { enabled: true, maxRequests: 1, windowSeconds: 60 });

      const first = await request(limited).post('/shorten').send({ long_url: 'https://example.com/a' });
      const second = await request(limited).post('/shorten').send({ long_url: 'https://example.com/b' });

      expect(first.status).toBe(201);
      expect(first.headers['x-ratelimit-limit']).toBe('1');
      expect(first.headers['x-ratelimit-remaining']).toBe('0');
      expect(second.status).toBe(429);
      expect(second.body.error).toBe('RATE_LIMITED');
    });
  });

  describe('GET /:code', () => {
    it('answers 404 for codes never created (scenario D)', async () => {
      const response = await request(app).get('/never-made');
      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'NOT_FOUND', message: 'Short link not found' });
    });

    it('answers 410 for a link created already expired, and never 302 after (scenario C)', async () => {
      const created = await request(app)
        .post('/shorten')
        .send({ long_url: 'https://example.com/a', expires_at: new Date(T0 - 60_000).toISOString() });
      expect(created.status).toBe(201);

      const first = await request(app).get(`/${created.body.code}`);
      expect(first.status).toBe(410);
      expect(first.body).toEqual({ error: 'GONE', message: 'Short link has expired' });

      const second = await request(app).get(`/${created.body.code}`);
      expect([404, 410]).toContain(second.status);
    });

    it('answers 410 once time passes the expiry', async () => {
      const created = await request(app)
        .post('/shorten')
        .send({ long_url: 'https://example.com/a', expires_at: new Date(T0 + 30_000).toISOString() });

      expect((await request(app).get(`/${created.body.code}`)).status).toBe(302);
      h.clock.advance(30_000);
      expect((await request(app).get(`/${created.body.code}`)).status).toBe(410);
    });

    it('answers 503 when the store cannot be read', async () => {
      vi.spyOn(h.store, 'findByCode').mockRejectedValue(new Error('database is locked'));

      const response = await request(app).get('/abc');
      expect(response.status).toBe(503);
      expect(response.body).toEqual({ error: 'UNAVAILABLE', message: 'Link store unavailable: database is locked' });
    });

    it('answers 500 for unexpected failures', async () => {
      vi.spyOn(h.redirects, 'resolve').mockRejectedValue(new Error('boom'));

      const response = await request(app).get('/abc');
      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: 'INTERNAL', message: 'Internal server error' });
    });
  });

  describe('DELETE /:code', () => {
    it('deletes a link so it no longer resolves', async () => {
      await request(app).post('/shorten').send({ long_url: 'https://example.com/a', custom_code: 'temp' });

      expect((await request(app).delete('/temp')).status).toBe(204);
      expect((await request(app).get('/temp')).status).toBe(404);
      expect((await request(app).delete('/temp')).status).toBe(404);
    });

    it('refuses to hand out a deleted custom code again', async () => {
      await request(app).post('/shorten').send({ long_url: 'https://example.com/a', custom_code: 'temp' });
      await request(app).delete('/temp');

      const again = await request(app)
        .post('/shorten')
        .send({ long_url: 'https://other.example/new', custom_code: 'temp' });
      expect(again.status).toBe(409);
      expect(again.body.error).toBe('CODE_IN_USE');
      expect((await request(app).get('/temp')).status).toBe(404);
    });

    it('answers 404 for a code carrying a line break, without reaching the cache', async () => {
      const evict = vi.spyOn(h.cache, 'delete');
      const smuggled = 'x\nSETEX link:evil 3600 {"longUrl":"https://attacker.example","expiresAt":null}';

      const response = await request(app).delete(`/${encodeURIComponent(smuggled)}`);

      expect(response.status).toBe(404);
      expect(evict).not.toHaveBeenCalled();
      expect(h.kv.raw('link:evil')).toBeNull();
      expect((await request(app).get('/evil')).status).toBe(404);
    });
  });

  describe('GET /stats', () => {
    it('reports link counts', async () => {
      await request(app).post('/shorten').send({ long_url: 'https://example.com/a' });
      await request(app)
        .post('/shorten')
        .send({ long_url: 'https://example.com/b', expires_at: new Date(T0 - 1).toISOString() });

      const response = await request(app).get('/stats');
      expect(response.status).toBe(200);
      expect(response.body).toEqual({ total: 2, active: 1, expired: 1 });
    });

    it('lists one owner\'s links', async () => {
      await request(app).post('/shorten').send({ long_url: 'https://example.com/a', custom_code: 'mine', owner: 'team-a' });
      await request(app).post('/shorten').send({ long_url: 'https://example.com/b', custom_code: 'theirs', owner: 'team-b' });

      const response = await request(app).get('/stats?owner=team-a');
      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        owner: 'team-a',
        links: [
          {
            code: 'mine',
            short_url: 'http://sho.rt/mine',
            long_url: 'https://example.com/a',
            expires_at: null,
            created_at: '2026-01-01T00:00:00.000Z',
          },
        ],
      });
    });

    it('rejects a bad listing limit', async () => {
      const response = await request(app).get('/stats?owner=team-a&limit=lots');
      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'INVALID_REQUEST', message: 'limit must be an integer between 1 and 100.' });
    });
  });

  describe('GET /health', () => {
    it('reports healthy dependencies', async () => {
      const response = await request(app).get('/health');
      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'healthy', kv: 'connected', database: 'ok' });
    });

    it('reports 503 when the KV server is down', async () => {
      h.kv.failWith = new Error('connection refused');

      const response = await request(app).get('/health');
      expect(response.status).toBe(503);
      expect(response.body).toEqual({ status: 'unhealthy', kv: 'disconnected', database: 'ok' });
    });
  });

  it('answers unknown routes with 404', async () => {
    const response = await request(app).post('/nowhere');
    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'NOT_FOUND', message: 'Not Found' });
  });
});
