import { InvalidUrlError, UnsupportedSchemeError } from '../errors';

export const MAX_URL_LENGTH = 2048;

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

// Whitespace and control characters never survive into a stored URL
const FORBIDDEN_CHARS = /[\s\u0000-\u001f\u007f]/;

/**
 * Validate a destination URL. Throws InvalidUrlError or
 * UnsupportedSchemeError; returns the parsed URL otherwise.
 *
 * @param selfBaseUrl - base URL of this service; links back to it are refused
 */
export function validateLongUrl(longUrl: string, selfBaseUrl: string): URL {
  if (longUrl.length === 0) {
    throw new InvalidUrlError('URL is required.');
  }
  if (longUrl.length > MAX_URL_LENGTH) {
    throw new InvalidUrlError(`URL must be at most ${MAX_URL_LENGTH} characters.`);
  }
  if (FORBIDDEN_CHARS.test(longUrl)) {
    throw new InvalidUrlError('URL must not contain whitespace or control characters.');
  }

  let parsed: URL;
  try {
    parsed = new URL(longUrl);
  } catch {
    throw new InvalidUrlError('URL could not be parsed.');
  }

  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    throw new UnsupportedSchemeError(parsed.protocol.replace(/:$/, ''));
  }
  if (parsed.hostname.length === 0) {
    throw new InvalidUrlError('URL must have a host.');
  }

  const self = new URL(selfBaseUrl);
  if (parsed.host === self.host) {
    throw new InvalidUrlError('URL must not point back at this service.');
  }

  return parsed;
}
