// src/llm/utils/retry-with-backoff.ts

import { extractErrorCode, extractErrorMessage } from '../../common/utils/error-message.util';

/**
 * Retry with exponential backoff and jitter
 *
 * Retries transient network failures (ECONNRESET, ETIMEDOUT, EAI_AGAIN, ...).
 */

export interface RetryOptions {
  /** Retries after the first attempt, default 3 */
  maxRetries?: number;
  /** Delay before the first retry, default 200 */
  initialDelayMs?: number;
  /** Upper bound for a single delay, default 2000 */
  maxDelayMs?: number;
  /** Exponential factor, default 2 */
  factor?: number;
  /** ±20% random jitter, default true */
  jitter?: boolean;
  /** Substrings of error codes or messages that are worth retrying */
  retryableErrors?: string[];
  /** Sleep implementation, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRYABLE_ERRORS = [
  'ECONNRESET',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ECONNREFUSED',
  'no response received',
  'network',
  'timeout',
];

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function isRetryableError(error: unknown, retryableErrors: string[] = DEFAULT_RETRYABLE_ERRORS): boolean {
  const message = extractErrorMessage(error);
  const code = extractErrorCode(error);
  return retryableErrors.some((retryable) => message.includes(retryable) || code.includes(retryable));
}

/**
 * Delay before retry number `attempt` (0-based), without jitter
 */
export function backoffDelay(attempt: number, options: Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'factor'> = {}): number {
  const { initialDelayMs = 200, maxDelayMs = 2000, factor = 2 } = options;
  return Math.min(initialDelayMs * Math.pow(factor, attempt), maxDelayMs);
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    jitter = true,
    retryableErrors = DEFAULT_RETRYABLE_ERRORS,
    sleep = defaultSleep,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !isRetryableError(error, retryableErrors)) {
        throw error;
      }

      const baseDelay = backoffDelay(attempt, options);
      const jitterAmount = jitter ? baseDelay * 0.2 * (Math.random() * 2 - 1) : 0;
      await sleep(Math.round(Math.max(0, baseDelay + jitterAmount)));
    }
  }
}
