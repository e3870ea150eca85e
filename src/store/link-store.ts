import type { LinkStats, ShortLink } from '../types';

/**
 * Authoritative store of short links.
 *
 * Implementations:
 * - SqliteLinkStore: better-sqlite3, UNIQUE(code) enforces one link per code
 */
export interface LinkStore {
  /**
   * Insert a new link.
   * @throws ConflictError if the code is taken or was retired (decided by the store, atomically)
   */
  insert(link: ShortLink): Promise<ShortLink>;

  findByCode(code: string): Promise<ShortLink | null>;

  /**
   * Delete a link and retire its code. Deleting an absent code is not an error.
   * @returns whether a row was removed
   */
  deleteByCode(code: string): Promise<boolean>;

  /**
   * Bulk-delete links whose expiry is strictly before `timestamp` (epoch ms),
   * retiring their codes.
   * @returns number of rows removed
   */
  deleteExpiredBefore(timestamp: number): Promise<number>;

  // Reporting reads, served by the read-only connection

  countLinks(now: number): Promise<LinkStats>;

  listByOwner(owner: string, limit: number): Promise<ShortLink[]>;
}
