// pattern: Imperative Shell

/**
 * Bounded retry with exponential backoff and jitter.
 * The caller decides which errors are retryable; a server-supplied
 * retry-after hint replaces the computed backoff when present.
 */

import { setTimeout as delay } from "node:timers/promises";
import { CancelledError, TransientError } from "../errors/index.js";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RetryOptions = {
  // total attempts, the first call included
  readonly maxAttempts: number;
  readonly initialBackoffMs: number;
  readonly maxBackoffMs: number;
  readonly isRetryableError: (error: unknown) => boolean;
  readonly retryAfterMs?: (error: unknown) => number | undefined;
  readonly onError?: (error: unknown, attempt: number) => void;
  readonly signal?: AbortSignal;
  readonly sleep?: SleepFn;
  readonly random?: () => number;
};

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export function computeBackoff(
  attempt: number,
  initialBackoffMs: number,
  maxBackoffMs: number,
  random: () => number,
): number {
  const exponential = Math.min(maxBackoffMs, initialBackoffMs * Math.pow(2, attempt));
  // jitter keeps between half and all of the exponential delay
  return Math.round(exponential * (0.5 + random() * 0.5));
}

/**
 * Parses a Retry-After header (delta seconds or an HTTP date) into
 * milliseconds from `now`.
 */
export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (header === null || header.trim() === "") {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function callWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  let lastError: unknown;

  for (let attempt = 0; attempt < options.maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      throw new CancelledError("operation cancelled", { cause: options.signal.reason });
    }

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (options.onError) {
        options.onError(error, attempt);
      }

      if (!options.isRetryableError(error)) {
        throw error;
      }

      if (attempt < options.maxAttempts - 1) {
        const hint = options.retryAfterMs?.(error);
        const backoffMs =
          hint !== undefined
            ? Math.min(hint, options.maxBackoffMs)
            : computeBackoff(attempt, options.initialBackoffMs, options.maxBackoffMs, random);
        try {
          await sleep(backoffMs, options.signal);
        } catch (sleepError) {
          if (options.signal?.aborted) {
            throw new CancelledError("operation cancelled during backoff", { cause: sleepError });
          }
          throw sleepError;
        }
      }
    }
  }

  throw new TransientError(
    `gave up after ${options.maxAttempts} attempts: ${messageOf(lastError)}`,
    { attempts: options.maxAttempts, cause: lastError },
  );
}
