import { CancelledError, StepTimeoutError } from '../types/errors.ts';

/**
 * Run `fn` under a signal that aborts when `signal` does or when `timeoutMs` elapses.
 *
 * The returned promise settles as soon as either happens, even if `fn` ignores its signal:
 * expiry rejects with StepTimeoutError, parent cancellation with CancelledError.
 * A missing or zero timeout only links the signals.
 */
export async function withTimeout<T>(
  stepId: string,
  timeoutMs: number | undefined,
  signal: AbortSignal,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  if (signal.aborted) {
    throw new CancelledError();
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    onAbort = () => {
      controller.abort();
      reject(new CancelledError());
    };
    signal.addEventListener('abort', onAbort, { once: true });

    if (timeoutMs !== undefined && timeoutMs > 0) {
      timer = setTimeout(() => {
        const error = new StepTimeoutError(stepId, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    }
  });

  try {
    return await Promise.race([fn(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    if (onAbort) signal.removeEventListener('abort', onAbort);
  }
}
