/**
 * Unit tests for withTimeout.
 */

import { describe, it, expect } from 'vitest';
import { TimeoutError } from '../../src/errors';
import { withTimeout } from '../../src/utils/timeout';

describe('withTimeout', () => {
  it('resolves with the value when the operation is fast enough', async () => {
    await expect(withTimeout(Promise.resolve(42), 50, 'fast')).resolves.toBe(42);
  });

  it('passes the operation error through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 50, 'failing')).rejects.toThrow('boom');
  });

  it('rejects with a TimeoutError when the operation hangs', async () => {
    const result = withTimeout(new Promise<number>(() => {}), 10, 'cache get');

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow('cache get timed out after 10ms');
  });
});
