// Durable short-link record. Timestamps are epoch milliseconds.
export interface ShortLink {
  id?: number;
  code: string;
  longUrl: string;
  owner: string | null;
  expiresAt: number | null;
  createdAt: number;
}

// Value kept in the cache under link:<code>
export interface CacheEntry {
  longUrl: string;
  expiresAt: number | null;
}

// Input to the creation service
export interface CreateLinkRequest {
  longUrl: string;
  customCode?: string;
  expiresAt?: string | number | null;
  owner?: string;
}

// Response for link creation
export interface CreateLinkResponse {
  code: string;
  shortUrl: string;
  longUrl: string;
  expiresAt: string | null;
}

// One entry of an owner's link listing
export interface OwnedLink extends CreateLinkResponse {
  createdAt: string;
}

// Request body of POST /shorten
export interface ShortenBody {
  long_url?: unknown;
  custom_code?: unknown;
  expires_at?: unknown;
  owner?: unknown;
}

export type ResolveResult =
  | { kind: 'found'; longUrl: string }
  | { kind: 'not_found' }
  | { kind: 'gone' };

// Reporting counters, read from the replica connection
export interface LinkStats {
  total: number;
  active: number;
  expired: number;
}

// Rate limit result
export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetIn: number;
}

export type Clock = () => number;
