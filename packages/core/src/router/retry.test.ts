import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  classifyError,
  withRetry,
  withTimeout,
  TimeoutError,
  ProviderNotConfiguredError,
} from './retry.js';

beforeEach(() => {
  vi.restoreAllMocks();
});

describe('classifyError', () => {
  it.each([
    ['HTTP 429 Too Many Requests', 'rate_limit'],
    ['groq: rate limit reached for llama-3.3-70b', 'rate_limit'],
    ['HTTP 503 Service Unavailable', 'server_error'],
    ['HTTP 401 Unauthorized', 'auth_error'],
    ['Incorrect API key provided', 'auth_error'],
    ['HTTP 404 Not Found', 'not_found'],
    ['Request timed out', 'timeout'],
    ['Unexpected token < in JSON at position 0 (parse)', 'json_parse'],
    ['Something odd happened', 'unknown'],
  ])('classifies "%s" as %s', (message, category) => {
    expect(classifyError(new Error(message))).toBe(category);
  });

  it('classifies quota exhaustion ahead of the status code', () => {
    expect(classifyError(new Error('HTTP 429: token quota exceeded for project'))).toBe('quota');
    expect(classifyError(new Error('HTTP 403: insufficient entitlement'))).toBe('quota');
  });

  it('classifies typed errors by class', () => {
    expect(classifyError(new ProviderNotConfiguredError('WATSONX_MODEL is required.'))).toBe('not_configured');
    expect(classifyError(new TimeoutError('Operation timed out after 10ms'))).toBe('timeout');
  });

  it('handles non-Error values', () => {
    expect(classifyError('plain string')).toBe('unknown');
    expect(classifyError(undefined)).toBe('unknown');
  });
});

describe('withRetry', () => {
  it('returns on first success', async () => {
    const fn = vi.fn().mockResolvedValue({ executive_summary: 'ok' });
    const { result, attempts } = await withRetry(fn, { maxRetries: 2 });
    expect(result).toEqual({ executive_summary: 'ok' });
    expect(attempts).toBe(1);
  });

  it('backs off and retries server errors', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('HTTP 502 Bad Gateway'))
      .mockResolvedValue('recovered');

    const { result, attempts } = await withRetry(fn, {
      maxRetries: 2,
      initialDelayMs: 5,
      retryOn: ['server_error'],
      onRetry,
    });

    expect(result).toBe('recovered');
    expect(attempts).toBe(2);
    expect(fn).toHaveBeenNthCalledWith(1, 0);
    expect(fn).toHaveBeenNthCalledWith(2, 1);
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error), 'server_error', expect.any(Number));
  });

  it('does not retry quota errors', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('HTTP 429: quota exceeded'));

    await expect(withRetry(fn, { maxRetries: 3, initialDelayMs: 5 })).rejects.toThrow('quota exceeded');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('does not retry a missing configuration', async () => {
    const fn = vi.fn().mockRejectedValue(new ProviderNotConfiguredError('GROQ_API_KEY is required.'));

    await expect(withRetry(fn, { maxRetries: 3 })).rejects.toBeInstanceOf(ProviderNotConfiguredError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('rethrows the last error once retries are exhausted', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('HTTP 429 rate limited'));

    await expect(
      withRetry(fn, { maxRetries: 2, initialDelayMs: 5, retryOn: ['rate_limit'] }),
    ).rejects.toThrow('HTTP 429 rate limited');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('waits at least the Retry-After hint before retrying', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('HTTP 429 Too Many Requests, retry after 1'))
      .mockResolvedValue('ok');

    const { attempts } = await withRetry(fn, { maxRetries: 1, initialDelayMs: 5, onRetry });

    expect(attempts).toBe(2);
    expect(onRetry.mock.calls[0][3]).toBe(1000);
  });
});

describe('withTimeout', () => {
  it('resolves when the promise wins', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000)).resolves.toBe('done');
  });

  it('rejects with TimeoutError when the timer wins', async () => {
    const slow = new Promise(resolve => setTimeout(resolve, 1000));
    await expect(withTimeout(slow, 10)).rejects.toBeInstanceOf(TimeoutError);
  });

  it('passes other rejections through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000)).rejects.toThrow('boom');
  });

  it('does not arm a timer for 0 or Infinity', async () => {
    await expect(withTimeout(Promise.resolve(1), 0)).resolves.toBe(1);
    await expect(withTimeout(Promise.resolve(2), Infinity)).resolves.toBe(2);
  });
});
