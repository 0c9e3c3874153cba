import * as core from '@actions/core';
import { setTimeout as delay } from 'timers/promises';
import { TransientApiError, describeError, isTransientError } from './errors.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface RetryOptions {
  retries: number;
  backoffMs: number;
  sleep?: Sleep;
}

/**
 * Runs `operation`, retrying transient failures with exponential backoff.
 * Non-transient errors are rethrown untouched; exhausting the retries throws
 * a {@link TransientApiError}.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const attempts = options.retries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isTransientError(error)) {
        throw error;
      }
      if (attempt >= attempts) {
        throw new TransientApiError(operation, attempt, error);
      }

      const backoff = options.backoffMs * 2 ** (attempt - 1);
      core.warning(
        `${operation} failed (attempt ${attempt}/${attempts}), retrying in ${backoff}ms: ${describeError(error)}`
      );
      await wait(backoff);
    }
  }
}
