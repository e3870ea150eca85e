import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export interface DatabaseOptions {
  /** Path to the SQLite file, or ':memory:' */
  path: string;
  /** Read-only replica for reporting queries; defaults to a read-only handle on `path` */
  replicaPath?: string;
  busyTimeoutMs?: number;
}

/**
 * Write connection plus the read-only connection reporting queries use.
 * For in-memory databases both are the same handle.
 */
export interface LinkDatabase {
  writer: Database.Database;
  reader: Database.Database;
  close(): void;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS short_links (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    code TEXT NOT NULL UNIQUE,
    long_url TEXT NOT NULL,
    owner TEXT,
    expires_at INTEGER,
    created_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_short_links_expires_at
    ON short_links(expires_at) WHERE expires_at IS NOT NULL;

  CREATE INDEX IF NOT EXISTS idx_short_links_owner
    ON short_links(owner) WHERE owner IS NOT NULL;

  -- Codes whose link was deleted or purged; never issued again
  CREATE TABLE IF NOT EXISTS retired_codes (
    code TEXT PRIMARY KEY
  );

  CREATE TABLE IF NOT EXISTS sequences (
    name TEXT PRIMARY KEY,
    value INTEGER NOT NULL
  );
`;

export function openLinkDatabase(options: DatabaseOptions): LinkDatabase {
  const inMemory = options.path === ':memory:';
  const timeout = options.busyTimeoutMs ?? 2000;

  if (!inMemory) {
    // Ensure directory exists
    const dir = path.dirname(options.path);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const writer = new Database(options.path, { timeout });
  if (!inMemory) {
    writer.pragma('journal_mode = WAL');
  }
  writer.exec(SCHEMA);

  const reader = inMemory
    ? writer
    : new Database(options.replicaPath ?? options.path, { readonly: true, fileMustExist: true, timeout });

  return {
    writer,
    reader,
    close(): void {
      if (reader !== writer) reader.close();
      writer.close();
    },
  };
}
