/**
 * In-memory stand-in for the KV server, driven by a manual clock.
 */

import type { KVStore } from '../../src/kv-client';

interface Entry {
  value: string;
  expiresAt: number | null;
}

export class MemoryKVStore implements KVStore {
  private entries = new Map<string, Entry>();

  /** When set, every command rejects with this error */
  failWith: Error | null = null;
  /** When true, every command hangs forever */
  hang = false;

  constructor(private clock: () => number = Date.now) {}

  private async command<T>(run: () => T): Promise<T> {
    if (this.hang) return new Promise<T>(() => {});
    if (this.failWith) throw this.failWith;
    return run();
  }

  private live(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && this.clock() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  /** Seconds left on a key, -1 without TTL, -2 when missing */
  ttl(key: string): number {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return Math.ceil((entry.expiresAt - this.clock()) / 1000);
  }

  raw(key: string): string | null {
    return this.live(key)?.value ?? null;
  }

  rawSet(key: string, value: string): void {
    this.entries.set(key, { value, expiresAt: null });
  }

  get(key: string): Promise<string | null> {
    return this.command(() => this.live(key)?.value ?? null);
  }

  setex(key: string, seconds: number, value: string): Promise<boolean> {
    return this.command(() => {
      if (seconds <= 0) return false;
      this.entries.set(key, { value, expiresAt: this.clock() + seconds * 1000 });
      return true;
    });
  }

  delete(key: string): Promise<boolean> {
    return this.command(() => this.entries.delete(key));
  }

  incr(key: string): Promise<number> {
    return this.command(() => {
      const entry = this.live(key);
      const next = (entry ? parseInt(entry.value, 10) : 0) + 1;
      this.entries.set(key, { value: String(next), expiresAt: entry?.expiresAt ?? null });
      return next;
    });
  }

  expire(key: string, seconds: number): Promise<boolean> {
    return this.command(() => {
      const entry = this.live(key);
      if (!entry) return false;
      entry.expiresAt = this.clock() + seconds * 1000;
      return true;
    });
  }

  ping(): Promise<boolean> {
    return this.command(() => true);
  }
}
