import { describe, it, expect, vi } from 'vitest';
import {
  classifyError,
  withRetry,
  withTimeout,
  sleep,
  TimeoutError,
  AbortError,
} from './retry.js';

describe('classifyError', () => {
  it('classifies 429 as rate_limit', () => {
    expect(classifyError(new Error('HTTP 429 Too Many Requests'))).toBe('rate_limit');
  });

  it('classifies 503 as server_error', () => {
    expect(classifyError(new Error('503 Service Unavailable'))).toBe('server_error');
  });

  it('classifies 401 and missing keys as auth_error', () => {
    expect(classifyError(new Error('401 Unauthorized'))).toBe('auth_error');
    expect(classifyError(new Error('DeepSeek API key not configured'))).toBe('auth_error');
  });

  it('classifies TimeoutError as timeout', () => {
    expect(classifyError(new TimeoutError('Operation timed out after 10ms'))).toBe('timeout');
  });

  it('classifies JSON failures as invalid_reply', () => {
    expect(classifyError(new Error('Reply is not valid JSON'))).toBe('invalid_reply');
  });

  it('handles non-Error values', () => {
    expect(classifyError('string error')).toBe('unknown');
    expect(classifyError(42)).toBe('unknown');
  });
});

describe('withRetry', () => {
  it('makes a single attempt by default', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('500 Internal Server Error'));
    await expect(withRetry(fn)).rejects.toThrow('500 Internal Server Error');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('returns result on first success', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    const { result, attempts } = await withRetry(fn, { maxRetries: 3 });
    expect(result).toBe('ok');
    expect(attempts).toBe(1);
  });

  it('retries retryable errors and succeeds', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('500 Internal Server Error'))
      .mockResolvedValue('recovered');

    const { result, attempts } = await withRetry(fn, {
      maxRetries: 2,
      initialDelayMs: 5,
    });

    expect(result).toBe('recovered');
    expect(attempts).toBe(2);
    expect(fn).toHaveBeenNthCalledWith(1, 0);
    expect(fn).toHaveBeenNthCalledWith(2, 1);
  });

  it('does not retry auth errors', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('401 Unauthorized'));
    await expect(withRetry(fn, { maxRetries: 3 })).rejects.toThrow('401 Unauthorized');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws after exhausting retries', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('429 rate limited'));
    await expect(
      withRetry(fn, { maxRetries: 2, initialDelayMs: 5 }),
    ).rejects.toThrow('429 rate limited');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('reports retries through onRetry', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('503 Service Unavailable'))
      .mockResolvedValue('ok');

    await withRetry(fn, { maxRetries: 1, initialDelayMs: 5, onRetry });

    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error), 'server_error', 5);
  });

  it('refuses to start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { abortSignal: controller.signal })).rejects.toThrow(AbortError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('withTimeout', () => {
  it('resolves if the promise settles first', async () => {
    await expect(withTimeout(Promise.resolve('done'), 5000)).resolves.toBe('done');
  });

  it('rejects with TimeoutError when the deadline passes', async () => {
    vi.useFakeTimers();
    const slow = new Promise(resolve => setTimeout(resolve, 5000));
    const pending = withTimeout(slow, 10);
    vi.advanceTimersByTime(10);
    await expect(pending).rejects.toThrow(TimeoutError);
    vi.useRealTimers();
  });

  it('passes through the original rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('fail')), 5000)).rejects.toThrow('fail');
  });

  it('skips the timer when timeoutMs is 0', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 0)).resolves.toBe('ok');
  });

  it('rejects with AbortError when the signal fires', async () => {
    const controller = new AbortController();
    const never = new Promise<never>(() => {});
    const pending = withTimeout(never, 10000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow(AbortError);
  });
});

describe('sleep', () => {
  it('rejects immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(1000, controller.signal)).rejects.toThrow('Operation aborted');
  });
});
