/**
 * Bounded retry with capped exponential backoff for backend calls.
 */

import { z } from 'zod';

export interface RetryPolicy {
  /** Retries after the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

const RETRYABLE_STATUS = new Set([408, 409, 429]);
const RETRYABLE_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN', 'ENETUNREACH']);
const RETRYABLE_NAMES = new Set(['APIConnectionError', 'APIConnectionTimeoutError', 'AbortError', 'TimeoutError']);

const StatusSchema = z.object({ status: z.number() }).passthrough();
const CodeSchema = z.object({ code: z.string() }).passthrough();

/** HTTP status carried by an SDK error, if any. */
export function errorStatus(err: unknown): number | undefined {
  const result = StatusSchema.safeParse(err);
  return result.success ? result.data.status : undefined;
}

/**
 * Transient failures: 408, 409, 429, 5xx, connection resets and timeouts.
 * Authentication and request errors (401, 403, 400, 404, 422) are final.
 */
export function isTransientError(err: unknown): boolean {
  const status = errorStatus(err);
  if (status !== undefined) {
    return RETRYABLE_STATUS.has(status) || status >= 500;
  }
  if (err instanceof Error && RETRYABLE_NAMES.has(err.name)) return true;
  const code = CodeSchema.safeParse(err);
  return code.success && RETRYABLE_CODES.has(code.data.code);
}

/** Delay before retry `attempt` (1-based): base * 2^(attempt-1), capped. */
export function computeRetryDelayMs(attempt: number, policy: RetryPolicy): number {
  const raw = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, raw);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

/**
 * Run `operation`, retrying while `isRetryable` accepts the error and
 * attempts remain. The last error is rethrown.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  isRetryable: (err: unknown) => boolean = isTransientError,
  sleep: (ms: number) => Promise<void> = delay,
): Promise<RetryOutcome<T>> {
  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await operation(attempt), attempts: attempt };
    } catch (err) {
      if (attempt > policy.maxRetries || !isRetryable(err)) {
        throw err;
      }
      await sleep(computeRetryDelayMs(attempt, policy));
    }
  }
}
