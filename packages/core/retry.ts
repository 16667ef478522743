/**
 * Retry with exponential backoff
 *
 * Per-call retries for operations that fail transiently. Backoff sleeps
 * honour an AbortSignal so a run-level cancellation never waits out a
 * retry delay.
 */

import { FetchError } from './errors.js';

export interface RetryOptions {
  /** Maximum number of attempts, first call included (default: 3) */
  maxAttempts?: number;
  /** Initial delay in ms (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in ms (default: 30000) */
  maxDelay?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Decides whether an error is worth another attempt */
  shouldRetry?: (error: Error) => boolean;
  /** Called before each retry */
  onRetry?: (error: Error, attempt: number, delay: number) => void;
  /** Aborts pending backoff sleeps; the abort reason is thrown */
  signal?: AbortSignal;
}

const TRANSIENT_PATTERNS = [
  'timeout',
  'econnreset',
  'econnrefused',
  'etimedout',
  'socket hang up',
  'too many requests',
  'service unavailable'
];

/**
 * FetchErrors carry their own classification; anything else is judged by
 * its message.
 */
export function isTransient(error: Error): boolean {
  if (error instanceof FetchError) return error.transient && error.kind !== 'cancelled';
  const message = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some(pattern => message.includes(pattern));
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
  shouldRetry: isTransient,
  onRetry: () => {}
};

/**
 * Delay after the given attempt (1-based)
 */
export function backoffDelay(attempt: number, options: RetryOptions = {}): number {
  const config = { ...DEFAULT_OPTIONS, ...options };
  return Math.min(
    config.initialDelay * Math.pow(config.backoffMultiplier, attempt - 1),
    config.maxDelay
  );
}

/**
 * Execute a function with retry logic
 *
 * @param fn - Receives the 1-based attempt number
 * @throws The last error once attempts are used up or it is not retryable
 *
 * @example
 * const body = await retry(() => download(url), {
 *   maxAttempts: 4,
 *   initialDelay: 2000,
 *   onRetry: (error, attempt) => log.warn('Retrying', { attempt, reason: error.message })
 * });
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error = new Error('retry: no attempts made');

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!config.shouldRetry(lastError) || attempt === config.maxAttempts) {
        throw lastError;
      }

      const delay = backoffDelay(attempt, config);
      config.onRetry(lastError, attempt, delay);
      await sleep(delay, options.signal);
    }
  }

  throw lastError;
}

/**
 * Promise-based sleep that rejects with the signal's reason when aborted
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  const error = new Error(reason === undefined ? 'Aborted' : String(reason));
  error.name = 'AbortError';
  return error;
}
