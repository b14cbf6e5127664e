import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, retryWithBackoff, type RetryPolicy } from '../orchestrator/retry.js';
import { CancelledError, RetryExhaustedError, ValidationError } from '../utils/errors.js';
import { VirtualClock } from './helpers.js';

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1000, backoffFactor: 2, maxDelayMs: 30_000 };

describe('backoffDelay', () => {
  it('grows exponentially from the base delay', () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(policy, n))).toEqual([1000, 2000, 4000, 8000]);
  });

  it('is capped at maxDelayMs', () => {
    expect(backoffDelay({ ...policy, maxDelayMs: 3000 }, 5)).toBe(3000);
  });
});

describe('retryWithBackoff', () => {
  it('returns on the first success with the attempt count', async () => {
    const clock = new VirtualClock();
    const op = vi.fn(async () => 'done');

    await expect(retryWithBackoff(op, policy, { clock, label: 'news' })).resolves.toEqual({
      value: 'done',
      attempts: 1,
    });
    expect(clock.sleeps).toEqual([]);
  });

  it('waits between failed attempts and reports each retry', async () => {
    const clock = new VirtualClock();
    const onRetry = vi.fn();
    const op = vi
      .fn(async (_attempt: number) => 'done')
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    const outcome = await retryWithBackoff(op, policy, { clock, label: 'news', onRetry });

    expect(outcome).toEqual({ value: 'done', attempts: 3 });
    expect(op.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(onRetry.mock.calls.map(([info]) => [info.attempt, info.delayMs])).toEqual([
      [1, 1000],
      [2, 2000],
    ]);
  });

  it('throws RetryExhaustedError carrying the last error', async () => {
    const clock = new VirtualClock();
    const last = new Error('still down');
    const op = vi.fn(async () => {
      throw last;
    });

    const err = await retryWithBackoff(op, policy, { clock, label: 'news stage' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toMatchObject({
      message: 'news stage failed after 3 attempts: still down',
      attempts: 3,
      lastError: last,
    });
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('treats maxAttempts below 1 as a single attempt', async () => {
    const clock = new VirtualClock();
    const op = vi.fn(async () => {
      throw new Error('nope');
    });

    await expect(retryWithBackoff(op, { ...policy, maxAttempts: 0 }, { clock, label: 'x' })).rejects.toThrow(
      'x failed after 1 attempt: nope',
    );
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('does not retry validation errors', async () => {
    const clock = new VirtualClock();
    const op = vi.fn(async () => {
      throw new ValidationError('bad input');
    });

    await expect(retryWithBackoff(op, policy, { clock, label: 'x' })).rejects.toBeInstanceOf(ValidationError);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('honours a custom shouldRetry', async () => {
    const clock = new VirtualClock();
    const op = vi.fn(async () => {
      throw new Error('fatal');
    });

    await expect(
      retryWithBackoff(op, policy, { clock, label: 'x', shouldRetry: () => false }),
    ).rejects.toThrow('fatal');
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('stops with CancelledError when aborted during back-off', async () => {
    const clock = new VirtualClock();
    const controller = new AbortController();
    const op = vi.fn(async () => {
      throw new Error('flaky');
    });

    const pending = retryWithBackoff(op, policy, {
      clock,
      label: 'x',
      signal: controller.signal,
      onRetry: () => controller.abort(),
    });

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(op).toHaveBeenCalledTimes(1);
  });
});
