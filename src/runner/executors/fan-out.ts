import { availableParallelism } from 'node:os';
import { StepError, toError } from '../../types/errors.ts';
import { LIMITS } from '../../utils/constants.ts';
import { Semaphore } from '../semaphore.ts';

/**
 * In-flight bound for a parallel or foreach step. An explicit `max_concurrency` wins; 0 or
 * absent falls back to the configured default, then to `min(children, cpu count)`.
 */
export function resolveConcurrency(
  requested: number | undefined,
  childCount: number,
  configured?: number
): number {
  const limit =
    requested !== undefined && requested > 0
      ? requested
      : (configured ?? Math.min(childCount, availableParallelism()));
  return Math.max(1, Math.min(limit, LIMITS.MAX_CONCURRENCY));
}

export type SlotResult<T> = { ok: true; value: T } | { ok: false; error: StepError };

export function firstSlotError<T>(slots: readonly SlotResult<T>[]): StepError | undefined {
  for (const slot of slots) {
    if (!slot.ok) return slot.error;
  }
  return undefined;
}

export interface FanOutOptions {
  limit: number;
  signal: AbortSignal;
  /** Abort the remaining tasks on the first failure that is not a cancellation */
  failFast: boolean;
  /** Wraps failures that did not come out of the step executor, e.g. a cancelled wait */
  toStepError: (index: number, error: Error) => StepError;
}

export interface FanOutResult<T> {
  /** One slot per task, in task order */
  slots: SlotResult<T>[];
  /** First failure that was not a cancellation, in completion order */
  firstFailure?: StepError;
  peakConcurrency: number;
}

/**
 * Run `count` tasks under a counting semaphore and join all of them.
 *
 * Tasks receive a child signal. It aborts with the parent's signal, and with the first
 * failure when `failFast` is set.
 */
export async function fanOut<T>(
  count: number,
  task: (index: number, signal: AbortSignal) => Promise<T>,
  options: FanOutOptions
): Promise<FanOutResult<T>> {
  const semaphore = new Semaphore(options.limit);
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  options.signal.addEventListener('abort', onAbort, { once: true });
  if (options.signal.aborted) controller.abort();

  const state: { firstFailure?: StepError } = {};

  try {
    const slots = await Promise.all(
      Array.from({ length: count }, async (_, index): Promise<SlotResult<T>> => {
        try {
          const value = await semaphore.run(
            () => task(index, controller.signal),
            controller.signal
          );
          return { ok: true, value };
        } catch (caught) {
          const error = toError(caught);
          const failure = error instanceof StepError ? error : options.toStepError(index, error);
          if (!state.firstFailure && !failure.cancelled) {
            state.firstFailure = failure;
            if (options.failFast) controller.abort();
          }
          return { ok: false, error: failure };
        }
      })
    );
    return { slots, firstFailure: state.firstFailure, peakConcurrency: semaphore.peakActive };
  } finally {
    options.signal.removeEventListener('abort', onAbort);
  }
}
