/**
 * Timeout Tests
 */

import { AppError } from '../../src/lib/errors.js';
import { withTimeout } from '../../src/lib/timeout.js';

describe('withTimeout', () => {
  it('should resolve with the value when it settles in time', async () => {
    await expect(withTimeout(Promise.resolve('PONG'), 50, 'ping')).resolves.toBe('PONG');
  });

  it('should pass a rejection through', async () => {
    await expect(withTimeout(Promise.reject(new Error('refused')), 50, 'ping')).rejects.toThrow(
      'refused'
    );
  });

  it('should reject with a TIMEOUT error when the promise never settles', async () => {
    const pending = withTimeout(new Promise<string>(() => undefined), 10, 'ping');

    await expect(pending).rejects.toThrow('ping timed out after 10ms');
    await expect(pending).rejects.toBeInstanceOf(AppError);
  });
});
