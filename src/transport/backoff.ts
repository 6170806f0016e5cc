import { setTimeout as delay } from "node:timers/promises";
import type { RetryPolicy } from "../types.js";
import { CancelledError } from "../errors.js";

export const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitter: 0.2,
  retryableStatuses: RETRYABLE_STATUS_CODES,
  maxRetryAfterMs: 120_000,
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Delay before the attempt following `attempt` (1-based):
 * min(maxDelay, base × 2^(attempt−1)), scaled by a uniform factor in
 * [1 − jitter, 1 + jitter] and capped at maxDelay again.
 */
export function computeBackoff(
  attempt: number,
  policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs" | "jitter">,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const raw = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
  const jitter = Math.min(Math.max(policy.jitter, 0), 1);
  const factor = 1 + jitter * (2 * random() - 1);
  return Math.round(Math.min(policy.maxDelayMs, Math.max(0, raw * factor)));
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 * Returns undefined when absent or unparseable.
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (value === null || value === undefined) return undefined;
  const trimmed = value.trim();
  if (!trimmed) return undefined;

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Sleep that rejects with CancelledError as soon as the signal aborts.
 */
export const sleep: SleepFn = async (ms, signal) => {
  if (signal?.aborted) throw new CancelledError("Cancelled while waiting to retry.");
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError("Cancelled while waiting to retry.", { cause: error });
    }
    throw error;
  }
};
