/**
 * Exponential backoff around flaky I/O
 */

import { errorMessage } from './errors';

export interface RetryOptions {
  maxRetries: number;
  delayMs: number;
  backoff: number;
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` up to `maxRetries` times, waiting `delayMs * backoff^attempt`
 * between attempts. The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  const label = options.label ?? 'operation';
  const attempts = Math.max(1, options.maxRetries);
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;

      if (attempt < attempts - 1) {
        const waitMs = options.delayMs * Math.pow(options.backoff, attempt);
        console.warn(
          `[Retry] ${label} attempt ${attempt + 1} failed, retrying in ${waitMs}ms: ${errorMessage(err)}`
        );
        await wait(waitMs);
      } else {
        console.error(`[Retry] ${label}: all ${attempts} attempts failed`);
      }
    }
  }

  throw lastError;
}
