/**
 * Promise Timeouts
 */

import { AppError } from './errors.js';

/**
 * Settle with `promise`, or reject with a TIMEOUT error after `ms`
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new AppError('TIMEOUT', `${label} timed out after ${ms}ms`, 504)),
      ms
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
