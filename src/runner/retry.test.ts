import { describe, expect, it } from 'vitest';
import { CancelledError } from '../types/errors.ts';
import {
  type BackoffPolicy,
  type Clock,
  computeBackoff,
  resolveBackoffPolicy,
  systemClock,
  withRetry,
} from './retry.ts';

class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private current = 0;

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    this.sleeps.push(ms);
    this.current += ms;
  }
}

const policy = (overrides: Partial<BackoffPolicy> = {}): BackoffPolicy => ({
  maxAttempts: 3,
  baseMs: 100,
  multiplier: 2,
  jitter: false,
  ...overrides,
});

describe('computeBackoff', () => {
  it('should grow exponentially from the base', () => {
    expect([1, 2, 3].map((attempt) => computeBackoff(attempt, policy()))).toEqual([100, 200, 400]);
  });

  it('should clamp to the cap before jitter', () => {
    const capped = policy({ maxBackoffMs: 250, jitter: true });
    expect(computeBackoff(3, capped, () => 0)).toBe(125);
    expect(computeBackoff(3, capped, () => 0.5)).toBe(250);
  });
});

describe('resolveBackoffPolicy', () => {
  it('should parse durations and apply defaults', () => {
    expect(resolveBackoffPolicy({ max_attempts: 4, backoff_base: '250ms', max_backoff: 2 })).toEqual({
      maxAttempts: 4,
      baseMs: 250,
      multiplier: 2,
      maxBackoffMs: 2000,
      jitter: false,
    });
    expect(resolveBackoffPolicy(undefined, { maxAttempts: 2, baseMs: 10 })).toMatchObject({
      maxAttempts: 2,
      baseMs: 10,
      maxBackoffMs: undefined,
    });
  });
});

describe('withRetry', () => {
  it('should return result if fn succeeds on first try', async () => {
    const clock = new FakeClock();
    await expect(withRetry(async () => 'success', policy(), { clock })).resolves.toBe('success');
    expect(clock.sleeps).toEqual([]);
  });

  it('should retry and succeed', async () => {
    const clock = new FakeClock();
    const retries: number[] = [];
    let attempts = 0;

    const result = await withRetry(
      async (attempt) => {
        attempts = attempt;
        if (attempt < 3) throw new Error('fail');
        return 'success';
      },
      policy(),
      { clock, onRetry: (attempt) => retries.push(attempt) }
    );

    expect(result).toBe('success');
    expect(attempts).toBe(3);
    expect(retries).toEqual([2, 3]);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('should throw after exhausting attempts', async () => {
    let calls = 0;
    const fn = async () => {
      calls++;
      throw new Error('fail');
    };

    await expect(withRetry(fn, policy(), { clock: new FakeClock() })).rejects.toThrow('fail');
    expect(calls).toBe(3);
  });

  it('should never retry cancellation', async () => {
    let calls = 0;
    const fn = async () => {
      calls++;
      throw new CancelledError();
    };

    await expect(withRetry(fn, policy(), { clock: new FakeClock() })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(calls).toBe(1);
  });

  it('should stop when shouldRetry declines', async () => {
    let calls = 0;
    const fn = async () => {
      calls++;
      throw new Error('bad request');
    };

    await expect(
      withRetry(fn, policy(), { clock: new FakeClock(), shouldRetry: () => false })
    ).rejects.toThrow('bad request');
    expect(calls).toBe(1);
  });

  it('should not start an attempt after the signal aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          return 'x';
        },
        policy(),
        { clock: new FakeClock(), signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(CancelledError);
    expect(calls).toBe(0);
  });

  it('should cut a real backoff sleep short on abort', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = withRetry(
      async () => {
        throw new Error('fail');
      },
      policy({ baseMs: 5_000 }),
      { signal: controller.signal }
    );
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(Date.now() - started).toBeLessThan(1_000);
  });
});

describe('systemClock', () => {
  it('should reject immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(systemClock.sleep(1_000, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
