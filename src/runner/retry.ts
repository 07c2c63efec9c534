import type { RetryPolicy } from '../parser/schema.ts';
import { CancelledError, toError } from '../types/errors.ts';
import { RETRY_DEFAULTS, TIMEOUTS } from '../utils/constants.ts';
import { parseOptionalDuration } from '../utils/duration.ts';

/**
 * Time source for backoff sleeps. Injected so tests never wait on real timers.
 */
export interface Clock {
  now(): number;
  /** Resolves after `ms`, or rejects with CancelledError once `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Uniform in [0, 1) */
export type RandomSource = () => number;

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new CancelledError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

/** Retry settings with durations resolved to milliseconds */
export interface BackoffPolicy {
  maxAttempts: number;
  baseMs: number;
  multiplier: number;
  maxBackoffMs?: number;
  jitter: boolean;
}

export interface RetryDefaults {
  maxAttempts?: number;
  baseMs?: number;
  maxBackoffMs?: number;
}

export function resolveBackoffPolicy(
  retry: RetryPolicy | undefined,
  defaults: RetryDefaults = {}
): BackoffPolicy {
  const maxBackoff = retry?.max_backoff;
  return {
    maxAttempts: retry?.max_attempts ?? defaults.maxAttempts ?? RETRY_DEFAULTS.MAX_ATTEMPTS,
    baseMs: parseOptionalDuration(
      retry?.backoff_base,
      defaults.baseMs ?? TIMEOUTS.DEFAULT_RETRY_BASE_DELAY_MS
    ),
    multiplier: retry?.backoff_multiplier ?? RETRY_DEFAULTS.BACKOFF_MULTIPLIER,
    maxBackoffMs: maxBackoff === undefined ? defaults.maxBackoffMs : parseOptionalDuration(maxBackoff, 0),
    jitter: retry?.jitter ?? false,
  };
}

/**
 * Delay before the attempt after `attempt` (1-based):
 * `base * multiplier^(attempt-1)`, clamped to the cap, then scaled by [0.5, 1.5) with jitter.
 */
export function computeBackoff(
  attempt: number,
  policy: BackoffPolicy,
  random: RandomSource = Math.random
): number {
  let delay = policy.baseMs * policy.multiplier ** (attempt - 1);
  if (policy.maxBackoffMs !== undefined) {
    delay = Math.min(delay, policy.maxBackoffMs);
  }
  if (policy.jitter) {
    delay *= 0.5 + random();
  }
  return delay;
}

export interface RetryOptions {
  clock?: Clock;
  random?: RandomSource;
  signal?: AbortSignal;
  /** Errors for which this returns false are thrown without another attempt */
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Execute a function with retry logic. `fn` receives the 1-based attempt number and is
 * never called more than `policy.maxAttempts` times. Cancellation is never retried.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: BackoffPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const clock = options.clock ?? systemClock;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new CancelledError();
    }

    try {
      return await fn(attempt);
    } catch (caught) {
      const error = toError(caught);
      if (error instanceof CancelledError || options.signal?.aborted) {
        throw error;
      }
      if (attempt >= maxAttempts || (options.shouldRetry && !options.shouldRetry(error))) {
        throw error;
      }

      const delay = computeBackoff(attempt, policy, options.random);
      options.onRetry?.(attempt + 1, error, delay);
      await clock.sleep(delay, options.signal);
    }
  }
}
