import type Database from 'better-sqlite3';
import { ConflictError } from '../errors';
import type { LinkStats, ShortLink } from '../types';
import type { LinkDatabase } from './database';
import type { LinkStore } from './link-store';

interface LinkRow {
  id: number;
  code: string;
  long_url: string;
  owner: string | null;
  expires_at: number | null;
  created_at: number;
}

interface CountRow {
  total: number;
  expired: number;
}

function toShortLink(row: LinkRow): ShortLink {
  return {
    id: row.id,
    code: row.code,
    longUrl: row.long_url,
    owner: row.owner,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}

/**
 * SQLite implementation of the link store.
 *
 * Writes and the redirect lookup use the write connection so a link is
 * visible right after it is created; reporting goes to the read-only one.
 * Removing a link retires its code in the same transaction, and inserts
 * check the retired set, so a code never maps to a second URL.
 */
export class SqliteLinkStore implements LinkStore {
  private writer: Database.Database;
  private reader: Database.Database;

  constructor(database: LinkDatabase) {
    this.writer = database.writer;
    this.reader = database.reader;
  }

  async insert(link: ShortLink): Promise<ShortLink> {
    const insertUnlessRetired = this.writer.transaction((candidate: ShortLink): LinkRow | undefined => {
      const retired = this.writer
        .prepare<[string], { code: string }>('SELECT code FROM retired_codes WHERE code = ?')
        .get(candidate.code);
      if (retired) {
        throw new ConflictError(candidate.code);
      }
      return this.writer
        .prepare<[string, string, string | null, number | null, number], LinkRow>(
          `INSERT INTO short_links (code, long_url, owner, expires_at, created_at)
           VALUES (?, ?, ?, ?, ?)
           RETURNING id, code, long_url, owner, expires_at, created_at`
        )
        .get(candidate.code, candidate.longUrl, candidate.owner, candidate.expiresAt, candidate.createdAt);
    });

    try {
      const row = insertUnlessRetired(link);
      if (!row) {
        throw new Error(`Insert of "${link.code}" returned no row`);
      }
      return toShortLink(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(link.code);
      }
      throw error;
    }
  }

  async findByCode(code: string): Promise<ShortLink | null> {
    const row = this.writer
      .prepare<[string], LinkRow>(
        `SELECT id, code, long_url, owner, expires_at, created_at
         FROM short_links
         WHERE code = ?`
      )
      .get(code);

    return row ? toShortLink(row) : null;
  }

  async deleteByCode(code: string): Promise<boolean> {
    const retire = this.writer.transaction((target: string): number => {
      const result = this.writer.prepare<[string]>('DELETE FROM short_links WHERE code = ?').run(target);
      if (result.changes > 0) {
        this.writer.prepare<[string]>('INSERT OR IGNORE INTO retired_codes (code) VALUES (?)').run(target);
      }
      return result.changes;
    });
    return retire(code) > 0;
  }

  async deleteExpiredBefore(timestamp: number): Promise<number> {
    const retireExpired = this.writer.transaction((cutoff: number): number => {
      this.writer
        .prepare<[number]>(
          `INSERT OR IGNORE INTO retired_codes (code)
           SELECT code FROM short_links WHERE expires_at IS NOT NULL AND expires_at < ?`
        )
        .run(cutoff);
      return this.writer
        .prepare<[number]>('DELETE FROM short_links WHERE expires_at IS NOT NULL AND expires_at < ?')
        .run(cutoff).changes;
    });
    return retireExpired(timestamp);
  }

  async countLinks(now: number): Promise<LinkStats> {
    const row = this.reader
      .prepare<[number], CountRow>(
        `SELECT
           COUNT(*) AS total,
           COALESCE(SUM(CASE WHEN expires_at IS NOT NULL AND expires_at <= ? THEN 1 ELSE 0 END), 0) AS expired
         FROM short_links`
      )
      .get(now);

    const total = row?.total ?? 0;
    const expired = row?.expired ?? 0;
    return { total, active: total - expired, expired };
  }

  async listByOwner(owner: string, limit: number): Promise<ShortLink[]> {
    const rows = this.reader
      .prepare<[string, number], LinkRow>(
        `SELECT id, code, long_url, owner, expires_at, created_at
         FROM short_links
         WHERE owner = ?
         ORDER BY created_at DESC, id DESC
         LIMIT ?`
      )
      .all(owner, limit);

    return rows.map(toShortLink);
  }
}
