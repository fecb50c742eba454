import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fetchWithRetry, HttpStatusError } from './retry.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

function mockResponse(status: number, statusText: string, headers?: Headers): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    headers: headers ?? new Headers(),
    json: async () => ({}),
  } as unknown as Response;
}

const fast = { maxRetries: 2, initialDelayMs: 5 };

describe('fetchWithRetry', () => {
  it('returns the first successful response', async () => {
    mockFetch.mockResolvedValueOnce(mockResponse(200, 'OK'));

    const response = await fetchWithRetry('https://search.test', {});
    expect(response.status).toBe(200);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it.each([429, 500, 502, 503])('retries a %i and then succeeds', async (status) => {
    mockFetch
      .mockResolvedValueOnce(mockResponse(status, 'Busy'))
      .mockResolvedValueOnce(mockResponse(200, 'OK'));

    const response = await fetchWithRetry('https://search.test', {}, fast);
    expect(response.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it.each([400, 401, 403, 404])('fails a %i without retrying', async (status) => {
    mockFetch.mockResolvedValueOnce(mockResponse(status, 'Nope'));

    await expect(fetchWithRetry('https://search.test/q', {}, fast))
      .rejects.toThrow(`HTTP ${status} Nope for https://search.test/q`);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxRetries with an HttpStatusError', async () => {
    mockFetch.mockResolvedValue(mockResponse(429, 'Too Many Requests'));

    const error = await fetchWithRetry('https://search.test', {}, fast).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({
      status: 429,
      message: 'HTTP 429 Too Many Requests (rate limited) for https://search.test',
    });
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('waits at least Retry-After seconds', async () => {
    const headers = new Headers({ 'Retry-After': '1' });
    mockFetch
      .mockResolvedValueOnce(mockResponse(503, 'Service Unavailable', headers))
      .mockResolvedValueOnce(mockResponse(200, 'OK'));

    const start = Date.now();
    await fetchWithRetry('https://search.test', {}, { maxRetries: 1, initialDelayMs: 5 });
    expect(Date.now() - start).toBeGreaterThanOrEqual(900);
  });

  it('retries transient network failures', async () => {
    mockFetch
      .mockRejectedValueOnce(new Error('fetch failed: ECONNRESET'))
      .mockResolvedValueOnce(mockResponse(200, 'OK'));

    const response = await fetchWithRetry('https://search.test', {}, fast);
    expect(response.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('rethrows other errors immediately', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Invalid URL'));

    await expect(fetchWithRetry('https://search.test', {}, fast)).rejects.toThrow('Invalid URL');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it.each(['AbortError', 'TimeoutError'])('never retries a %s', async (name) => {
    mockFetch.mockRejectedValueOnce(new DOMException('stopped', name));

    await expect(fetchWithRetry('https://search.test', {}, fast)).rejects.toMatchObject({ name });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('stops waiting when the signal aborts during backoff', async () => {
    mockFetch.mockResolvedValue(mockResponse(500, 'Internal Server Error'));
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    await expect(
      fetchWithRetry('https://search.test', { signal: controller.signal }, { maxRetries: 3, initialDelayMs: 5000 }),
    ).rejects.toMatchObject({ name: 'AbortError' });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
