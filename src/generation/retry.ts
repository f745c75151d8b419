import { setTimeout as sleep } from 'node:timers/promises';
import pino, { type Logger } from 'pino';

const defaultLogger = pino({ name: 'retry' });

/**
 * Wait between generation attempts: `baseDelayMs * 2^attempt` plus up to
 * `jitterMs` of random spread.
 */
export interface RetryBackoff {
  baseDelayMs: number;
  jitterMs: number;
}

export const NO_BACKOFF: RetryBackoff = { baseDelayMs: 0, jitterMs: 0 };

export interface RetryUntilOptions<T> {
  /** Additional attempts after the first one (default 2) */
  retries?: number;
  /** Base delay between attempts, doubled on each retry (default 0) */
  baseDelayMs?: number;
  /** Random jitter added to each delay (default 0) */
  jitter?: number;
  /** Whether a produced value is good enough to stop retrying */
  accept: (value: T) => boolean;
  /**
   * Produces the final value once every attempt has been rejected.
   * Receives the last produced value (if any attempt produced one) and the last
   * thrown error. May throw to turn exhaustion into a hard failure.
   */
  onExhausted: (last: T | undefined, lastError: unknown) => T;
  /** Whether a thrown error should be retried (default: always) */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Label used in log lines */
  label?: string;
  logger?: Logger;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
  /** True when the value came from onExhausted */
  exhausted: boolean;
}

/**
 * Bounded retry with a fallback.
 *
 * Runs `fn` up to `retries + 1` times until `accept` returns true. Thrown errors
 * count as failed attempts unless `shouldRetry` rejects them, in which case the
 * loop stops early. When attempts run out, the result of `onExhausted` is returned.
 *
 * @example
 * ```ts
 * const { value } = await retryUntil(
 *   () => generator.generate(prompt, system),
 *   { retries: 2, accept: (s) => s.trim() !== '', onExhausted: () => 'fallback' }
 * );
 * ```
 */
export async function retryUntil<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryUntilOptions<T>
): Promise<RetryOutcome<T>> {
  const retries = Math.max(0, options.retries ?? 2);
  const baseDelayMs = options.baseDelayMs ?? 0;
  const jitter = options.jitter ?? 0;
  const logger = options.logger ?? defaultLogger;
  const label = options.label ?? 'operation';

  let lastValue: T | undefined;
  let lastError: unknown;
  let attempts = 0;

  for (let attempt = 0; attempt <= retries; attempt++) {
    attempts = attempt + 1;
    try {
      const value = await fn(attempt);
      if (options.accept(value)) {
        return { value, attempts, exhausted: false };
      }
      lastValue = value;
      logger.warn({ label, attempt: attempts }, 'Generated value rejected');
    } catch (error) {
      lastError = error;
      logger.warn(
        { label, attempt: attempts, error: error instanceof Error ? error.message : String(error) },
        'Generation attempt failed'
      );
      if (options.shouldRetry && !options.shouldRetry(error, attempt)) {
        break;
      }
    }

    if (attempt < retries && (baseDelayMs > 0 || jitter > 0)) {
      await sleep(baseDelayMs * 2 ** attempt + Math.floor(Math.random() * jitter));
    }
  }

  return { value: options.onExhausted(lastValue, lastError), attempts, exhausted: true };
}
