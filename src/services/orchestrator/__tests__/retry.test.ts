import { describe, it, expect, vi } from 'vitest';
import { MAX_TIMER_DELAY_MS, backoffDelay, clampTimerDelay, sleep, withRetry } from '../retry.js';
import { AgentCancelledError, ProviderCallError } from '../../../utils/errors.js';

describe('backoffDelay', () => {
  it('doubles per failed attempt up to the cap', () => {
    expect(backoffDelay(1, 100)).toBe(100);
    expect(backoffDelay(2, 100)).toBe(200);
    expect(backoffDelay(3, 100)).toBe(400);
    expect(backoffDelay(5, 100, 1000)).toBe(1000);
  });
});

describe('clampTimerDelay', () => {
  it('keeps delays within what setTimeout honours', () => {
    expect(clampTimerDelay(1500)).toBe(1500);
    expect(clampTimerDelay(-5)).toBe(0);
    expect(clampTimerDelay(30 * 24 * 60 * 60 * 1000)).toBe(MAX_TIMER_DELAY_MS);
  });
});

describe('withRetry', () => {
  it('retries retryable errors and returns the later success', async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ProviderCallError('groq', 'timeout', 'Request timed out'))
      .mockResolvedValueOnce('second attempt');
    const onRetry = vi.fn();

    await expect(withRetry(operation, { attempts: 2, backoffMs: 1, onRetry })).resolves.toBe('second attempt');

    expect(operation).toHaveBeenCalledTimes(2);
    expect(operation).toHaveBeenNthCalledWith(2, 2);
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 2, attempts: 2, delayMs: 1 }));
  });

  it('does not retry permanent errors', async () => {
    const authError = new ProviderCallError('groq', 'auth', 'groq API error (401): Invalid API Key', 401);
    const operation = vi.fn(async () => {
      throw authError;
    });

    await expect(withRetry(operation, { attempts: 3, backoffMs: 1 })).rejects.toBe(authError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last attempt', async () => {
    const operation = vi.fn(async () => {
      throw Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
    });

    await expect(withRetry(operation, { attempts: 3, backoffMs: 1 })).rejects.toThrow('read ECONNRESET');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('uses a custom predicate', async () => {
    const operation = vi.fn<(attempt: number) => Promise<number>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce(7);

    await expect(withRetry(operation, { attempts: 2, backoffMs: 1, isRetryable: () => true })).resolves.toBe(7);
  });

  it('stops waiting when the signal aborts during backoff', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      throw new ProviderCallError('groq', 'connection', 'Connection error.');
    });

    const pending = withRetry(operation, {
      attempts: 3,
      backoffMs: 60_000,
      signal: controller.signal,
      onRetry: () => controller.abort(new Error('deadline')),
    });

    await expect(pending).rejects.toBeInstanceOf(AgentCancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('sleep', () => {
  it('rejects immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(AgentCancelledError);
  });

  it('resolves after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });
});
