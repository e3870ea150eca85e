/**
 * Base-62 alphabet, digits first: 0-9, a-z, A-Z.
 * Changing the order changes every generated code.
 */
export const BASE62_ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';

export const MAX_CODE_LENGTH = 12;

// Custom codes may also use '-' and '_', which generated codes never contain
const CODE_PATTERN = /^[0-9a-zA-Z_-]+$/;

// Path segments the router serves itself
const RESERVED_CODES = new Set(['shorten', 'health', 'stats']);

/**
 * Encode a sequence value as a base-62 short code.
 *
 * @example encodeBase62(61) === 'Z', encodeBase62(62) === '10'
 */
export function encodeBase62(n: number): string {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`Cannot encode ${n}: expected a non-negative safe integer`);
  }
  if (n === 0) return BASE62_ALPHABET[0];

  let code = '';
  let rest = n;
  while (rest > 0) {
    code = BASE62_ALPHABET[rest % 62] + code;
    rest = Math.floor(rest / 62);
  }
  return code;
}

/**
 * Whether a string could be a stored code at all (charset and length).
 */
export function isWellFormedCode(code: string): boolean {
  return code.length > 0 && code.length <= MAX_CODE_LENGTH && CODE_PATTERN.test(code);
}

/**
 * Validate a caller-chosen code; returns the reason it is rejected, or null.
 */
export function customCodeProblem(code: string): string | null {
  if (!isWellFormedCode(code)) {
    return `Custom code must be 1-${MAX_CODE_LENGTH} characters of letters, digits, '-' or '_'.`;
  }
  if (RESERVED_CODES.has(code.toLowerCase())) {
    return `Custom code "${code}" is reserved.`;
  }
  return null;
}
