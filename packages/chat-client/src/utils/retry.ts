/**
 * Retry utility with exponential backoff and jitter.
 *
 *   - Delay before retry `n` (1-based): `(2^n + random(0, 1)) * baseDelay`
 *   - No upper bound on the delay
 *   - Errors explicitly marked `retryable === false` are rethrown untouched
 *   - Everything else is wrapped in RemoteCallFailedError and retried
 *   - Once `maxRetries` retries have failed, RetryExhaustedError is thrown
 */

import {
  AbortError,
  ChatError,
  RemoteCallFailedError,
  RetryExhaustedError,
} from "../types/errors.js";
import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Configuration for retry behavior. */
export interface RetryPolicy {
  /** Total retry attempts (not counting the initial call). Default: 10. */
  maxRetries: number;
  /** Backoff unit in milliseconds. Default: 1000. */
  baseDelay: number;
  /** Source of jitter in [0, 1). Default: Math.random. */
  random: () => number;
  /** Receives retry and exhaustion events. */
  logger?: Logger;
  /** Label used in log lines, e.g. the provider name. */
  label?: string;
  /** Checked before every attempt and every backoff sleep. */
  signal?: AbortSignal;
  /** Called before each retry with the error, attempt number, and delay. */
  onRetry?: (error: RemoteCallFailedError, attempt: number, delay: number) => void;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

const DEFAULT_POLICY: RetryPolicy = {
  maxRetries: 10,
  baseDelay: 1000,
  random: Math.random,
};

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Calculate the delay before retry number `attempt`.
 *
 * `attempt` is 1-indexed (first retry = attempt 1).
 */
export function calculateDelay(
  attempt: number,
  baseDelay: number,
  random: () => number = Math.random,
): number {
  return (Math.pow(2, attempt) + random()) * baseDelay;
}

/** Largest delay a single Node timer honours; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY = 2 ** 31 - 1;

/** Promise-based sleep that waits out delays longer than one timer allows. */
async function sleep(ms: number): Promise<void> {
  let remaining = ms;
  while (remaining > 0) {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY);
    await new Promise<void>((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function throwIfAborted(signal: AbortSignal | undefined, attempt: number): void {
  if (signal?.aborted) {
    throw new AbortError(`Aborted before attempt ${attempt + 1}`, {
      cause: signal.reason,
    });
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Execute `fn` with automatic retries according to the given policy.
 *
 * Each retry runs `fn` again from scratch. The loop is iterative, so a large
 * `maxRetries` does not grow the call stack.
 *
 * @throws {RetryExhaustedError} after `maxRetries + 1` failed attempts.
 * @throws {AbortError} if `signal` fires between attempts.
 * @throws the original error when it is a ChatError with `retryable: false`.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  policy?: Partial<RetryPolicy>,
): Promise<T> {
  const p: RetryPolicy = { ...DEFAULT_POLICY, ...policy };
  const label = p.label ?? "remote";

  let attempt = 0;

  for (;;) {
    throwIfAborted(p.signal, attempt);

    try {
      return await fn();
    } catch (err: unknown) {
      if (err instanceof ChatError && !err.retryable) {
        throw err;
      }

      attempt += 1;
      const failure =
        err instanceof RemoteCallFailedError
          ? err
          : new RemoteCallFailedError(errorMessage(err), { attempt, cause: err });

      if (attempt > p.maxRetries) {
        p.logger?.error(
          `${label}: retries exhausted after ${attempt} attempts, last error: ${failure.message}`,
          { label, attempts: attempt },
        );
        throw new RetryExhaustedError(
          `${label}: gave up after ${attempt} attempts: ${failure.message}`,
          { attempts: attempt, cause: failure },
        );
      }

      const delay = calculateDelay(attempt, p.baseDelay, p.random);
      p.logger?.error(`${label} call failed: ${failure.message}`, {
        label,
        attempt,
      });
      p.logger?.info(
        `Retry ${attempt}/${p.maxRetries} in ${(delay / 1000).toFixed(2)}s`,
        { label, attempt, delay },
      );

      if (p.onRetry) {
        p.onRetry(failure, attempt, delay);
      }

      throwIfAborted(p.signal, attempt);
      await sleep(delay);
    }
  }
}
