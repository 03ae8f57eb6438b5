// Retry with exponential backoff
// Wraps a whole agent run; the agent loop itself never retries.

import { AgentCancelledError, isRetryableError } from '../../utils/errors.js';

export interface RetryInfo {
  /** The attempt about to start. */
  attempt: number;
  attempts: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  attempts: number;
  backoffMs: number;
  maxBackoffMs?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (info: RetryInfo) => void;
  signal?: AbortSignal;
}

/** Longest delay setTimeout honours; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function clampTimerDelay(ms: number): number {
  return Math.min(Math.max(0, ms), MAX_TIMER_DELAY_MS);
}

export function backoffDelay(failedAttempt: number, backoffMs: number, maxBackoffMs = Infinity): number {
  return Math.min(backoffMs * 2 ** (failedAttempt - 1), maxBackoffMs);
}

function cancellation(signal: AbortSignal): AgentCancelledError {
  const reason: unknown = signal.reason;
  return new AgentCancelledError(reason instanceof Error ? reason.message : undefined);
}

/** Resolves after `ms`, or rejects as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancellation(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(cancellation(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, clampTimerDelay(ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const isRetryable = options.isRetryable ?? isRetryableError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || options.signal?.aborted || !isRetryable(error)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, options.backoffMs, options.maxBackoffMs);
      options.onRetry?.({ attempt: attempt + 1, attempts, delayMs, error });
      await sleep(delayMs, options.signal);
    }
  }
}
