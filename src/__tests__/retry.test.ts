import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { retryUntil } from '../generation/retry.js';

const logger = pino({ level: 'silent' });

describe('retryUntil', () => {
  it('should return the first accepted value', async () => {
    const fn = vi.fn(async () => 'ok');

    const outcome = await retryUntil(fn, {
      accept: (value) => value === 'ok',
      onExhausted: () => 'fallback',
      logger,
    });

    expect(outcome).toEqual({ value: 'ok', attempts: 1, exhausted: false });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry rejected values and pass the attempt number', async () => {
    const fn = vi.fn(async (attempt: number) => (attempt === 0 ? '' : 'second'));

    const outcome = await retryUntil(fn, {
      accept: (value) => value.length > 0,
      onExhausted: () => 'fallback',
      logger,
    });

    expect(outcome).toEqual({ value: 'second', attempts: 2, exhausted: false });
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1]);
  });

  it('should hand the last value to onExhausted after retries + 1 attempts', async () => {
    let call = 0;
    const fn = vi.fn(async () => `value-${++call}`);
    const onExhausted = vi.fn((last: string | undefined) => `fallback after ${last}`);

    const outcome = await retryUntil(fn, {
      retries: 2,
      accept: () => false,
      onExhausted,
      logger,
    });

    expect(outcome).toEqual({ value: 'fallback after value-3', attempts: 3, exhausted: true });
    expect(onExhausted).toHaveBeenCalledWith('value-3', undefined);
  });

  it('should stop early when shouldRetry rejects an error', async () => {
    const error = new Error('forbidden');
    const fn = vi.fn(async (): Promise<string> => {
      throw error;
    });
    const onExhausted = vi.fn(() => 'fallback');

    const outcome = await retryUntil(fn, {
      retries: 5,
      accept: () => true,
      onExhausted,
      shouldRetry: () => false,
      logger,
    });

    expect(outcome).toEqual({ value: 'fallback', attempts: 1, exhausted: true });
    expect(onExhausted).toHaveBeenCalledWith(undefined, error);
  });

  it('should propagate an error thrown by onExhausted', async () => {
    await expect(
      retryUntil(async () => '', {
        retries: 1,
        accept: () => false,
        onExhausted: () => {
          throw new Error('gave up');
        },
        logger,
      })
    ).rejects.toThrow('gave up');
  });

  it('should make a single attempt when retries is 0', async () => {
    const fn = vi.fn(async () => '');

    const outcome = await retryUntil(fn, {
      retries: 0,
      accept: () => false,
      onExhausted: () => 'fallback',
      logger,
    });

    expect(outcome.attempts).toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should wait between attempts, doubling the base delay', async () => {
    const fn = vi.fn(async (attempt: number) => (attempt < 2 ? '' : 'third'));
    const startedAt = Date.now();

    const outcome = await retryUntil(fn, {
      retries: 2,
      baseDelayMs: 20,
      jitter: 0,
      accept: (value) => value.length > 0,
      onExhausted: () => 'fallback',
      logger,
    });

    // 20ms before the second attempt, 40ms before the third
    expect(outcome).toEqual({ value: 'third', attempts: 3, exhausted: false });
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(55);
  });

  it('should not wait after the last attempt', async () => {
    const startedAt = Date.now();

    await retryUntil(async () => '', {
      retries: 0,
      baseDelayMs: 1000,
      jitter: 0,
      accept: () => false,
      onExhausted: () => 'fallback',
      logger,
    });

    expect(Date.now() - startedAt).toBeLessThan(500);
  });
});
