import type Database from 'better-sqlite3';
import type { KVStore } from '../kv-client';
import { UnavailableError, errorMessage } from '../errors';
import { withTimeout } from '../utils/timeout';

/**
 * Shared, durable, atomically incrementing counter. The first value
 * issued is 1 and no value is ever issued twice.
 */
export interface SequenceSource {
  /**
   * @throws UnavailableError when the increment cannot be performed
   */
  next(): Promise<number>;
}

/**
 * Counter kept in the KV server under a single well-known key (INCR).
 */
export class KVSequenceSource implements SequenceSource {
  constructor(
    private getClient: () => Promise<KVStore>,
    private key: string,
    private timeoutMs: number
  ) {}

  async next(): Promise<number> {
    try {
      return await withTimeout(
        this.getClient().then((client) => client.incr(this.key)),
        this.timeoutMs,
        'sequence next'
      );
    } catch (error) {
      throw new UnavailableError(`Sequence source unavailable: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Counter kept in the durable store's database. The upsert runs under
 * SQLite's write lock, so it is atomic across every connection to the file.
 */
export class SqliteSequenceSource implements SequenceSource {
  constructor(
    private db: Database.Database,
    private name: string
  ) {}

  async next(): Promise<number> {
    try {
      const row = this.db
        .prepare<[string], { value: number }>(
          `INSERT INTO sequences (name, value) VALUES (?, 1)
           ON CONFLICT(name) DO UPDATE SET value = value + 1
           RETURNING value`
        )
        .get(this.name);

      if (!row) {
        throw new Error('increment returned no row');
      }
      return row.value;
    } catch (error) {
      throw new UnavailableError(`Sequence source unavailable: ${errorMessage(error)}`, { cause: error });
    }
  }
}
