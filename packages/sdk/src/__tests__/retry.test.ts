/**
 * Tests for the retry combinator
 */
import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, withRetry } from '../retry.js';
import { BadGatewayError, ContinueWaitError, ServerError } from '../errors.js';

function recordingSleep() {
  const delays: number[] = [];
  const sleep = vi.fn((ms: number) => {
    delays.push(ms);
    return Promise.resolve();
  });
  return { delays, sleep };
}

describe('backoffDelay', () => {
  it('doubles from the multiplier', () => {
    const delays = [1, 2, 3, 4].map((n) => backoffDelay(n, { jitter: false }));
    expect(delays).toEqual([2_000, 4_000, 8_000, 16_000]);
  });

  it('caps at maxDelayMs', () => {
    expect(backoffDelay(5, { jitter: false })).toBe(30_000);
    expect(backoffDelay(10, { jitter: false })).toBe(30_000);
  });

  it('never goes below minDelayMs', () => {
    expect(backoffDelay(1, { multiplierMs: 100, minDelayMs: 1_000, jitter: false })).toBe(1_000);
  });

  it('keeps jitter within the cap', () => {
    for (let i = 0; i < 50; i++) {
      const delay = backoffDelay(5);
      expect(delay).toBeLessThanOrEqual(30_000);
      expect(delay).toBeGreaterThanOrEqual(30_000 - 1);
    }
    for (let i = 0; i < 50; i++) {
      const delay = backoffDelay(1);
      expect(delay).toBeGreaterThanOrEqual(2_000);
      expect(delay).toBeLessThan(3_000);
    }
  });
});

describe('withRetry', () => {
  it('returns the first success without waiting', async () => {
    const { sleep } = recordingSleep();
    const fn = vi.fn().mockResolvedValue('ok');
    await expect(withRetry(fn, { sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('502×4 then success returns the result after 5 calls', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi.fn()
      .mockRejectedValueOnce(new BadGatewayError())
      .mockRejectedValueOnce(new BadGatewayError())
      .mockRejectedValueOnce(new BadGatewayError())
      .mockRejectedValueOnce(new BadGatewayError())
      .mockResolvedValueOnce('done');

    await expect(withRetry(fn, { sleep, jitter: false })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(5);
    expect(delays).toEqual([2_000, 4_000, 8_000, 16_000]);
  });

  it('re-throws the last retryable error after 5 attempts', async () => {
    const { sleep } = recordingSleep();
    const errors = [1, 2, 3, 4, 5].map(() => new ContinueWaitError());
    const fn = vi.fn();
    for (const err of errors) fn.mockRejectedValueOnce(err);

    await expect(withRetry(fn, { sleep })).rejects.toBe(errors[4]);
    expect(fn).toHaveBeenCalledTimes(5);
    expect(sleep).toHaveBeenCalledTimes(4);
  });

  it('does not retry non-retryable errors', async () => {
    const { sleep } = recordingSleep();
    const err = new ServerError('boom');
    const fn = vi.fn().mockRejectedValue(err);

    await expect(withRetry(fn, { sleep })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('honours a custom predicate and attempt cap', async () => {
    const { sleep } = recordingSleep();
    const fn = vi.fn().mockRejectedValue(new Error('flaky'));

    await expect(
      withRetry(fn, { sleep, maxAttempts: 3, retryable: () => true }),
    ).rejects.toThrow('flaky');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('treats maxAttempts below 1 as a single attempt', async () => {
    const { sleep } = recordingSleep();
    const fn = vi.fn().mockRejectedValue(new BadGatewayError());

    await expect(withRetry(fn, { sleep, maxAttempts: 0 })).rejects.toBeInstanceOf(BadGatewayError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('reports each retry to onRetry', async () => {
    const { sleep } = recordingSleep();
    const onRetry = vi.fn();
    const err = new BadGatewayError();
    const fn = vi.fn().mockRejectedValueOnce(err).mockResolvedValueOnce(1);

    await withRetry(fn, { sleep, onRetry, jitter: false });
    expect(onRetry).toHaveBeenCalledWith(1, err, 2_000);
  });

  it('waits on a timer by default', async () => {
    vi.useFakeTimers();
    try {
      const fn = vi.fn().mockRejectedValueOnce(new BadGatewayError()).mockResolvedValueOnce('ok');
      const promise = withRetry(fn, { jitter: false });
      await vi.advanceTimersByTimeAsync(1_999);
      expect(fn).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      await expect(promise).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});
