/**
 * Retry Logic
 * 
 * Configurable retry wrapper with exponential backoff.
 */

import { sleep as defaultSleep } from './time.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Delay before the retry that follows `attempt` (1-based)
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'backoffMultiplier'>
): number {
  const delay = options.initialDelay * Math.pow(options.backoffMultiplier, attempt - 1);
  return Math.min(delay, options.maxDelay);
}

/**
 * Execute a function with automatic retry on failure
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  const wait = opts.sleep ?? defaultSleep;

  if (opts.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be at least 1, got ${opts.maxAttempts}`);
  }

  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      
      // Check if we should retry
      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }
      
      // Last attempt, throw the error
      if (attempt === opts.maxAttempts) {
        throw error;
      }
      
      const delay = backoffDelay(attempt, opts);
      opts.onRetry?.(error, attempt, delay);
      
      await wait(delay);
    }
  }

  throw lastError;
}
