import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TavilySearchClient, emptySearchResult } from './client.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    headers: new Headers(),
    json: async () => body,
  } as unknown as Response;
}

describe('TavilySearchClient', () => {
  it('is disabled without an API key and returns an empty result', async () => {
    const client = new TavilySearchClient('   ');

    expect(client.enabled).toBe(false);
    expect(await client.search('acme')).toEqual({ query: 'acme', answer: '', snippets: [], sources: [] });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('posts the query with defaults and keeps snippets aligned with their URLs', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({
      answer: ' Acme restructured in 2020. ',
      results: [
        { title: 'one', content: ' Lenders took control. ', url: 'https://news.test/1' },
        { title: 'two', content: '', url: 'https://news.test/2' },
        { title: 'three', content: 'Stores closed.', url: null },
      ],
    }));

    const client = new TavilySearchClient('test-secret');
    const result = await client.search('acme distress', { maxResults: 4 });

    expect(result).toEqual({
      query: 'acme distress',
      answer: 'Acme restructured in 2020.',
      snippets: ['Lenders took control.', 'Stores closed.'],
      sources: ['https://news.test/1', ''],
    });

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.tavily.com/search');
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body)).toEqual({
      api_key: 'test-secret',
      query: 'acme distress',
      max_results: 4,
      search_depth: 'advanced',
      include_answer: true,
    });
  });

  it('honours a custom endpoint and search options', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ results: [] }));

    const client = new TavilySearchClient('test-secret', { endpoint: 'https://search.test/api' });
    const result = await client.search('q', { searchDepth: 'basic', includeAnswer: false });

    expect(result).toEqual(emptySearchResult('q'));
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://search.test/api');
    expect(JSON.parse(init.body)).toMatchObject({ max_results: 5, search_depth: 'basic', include_answer: false });
  });

  it('degrades to an empty result on an HTTP error and reports it', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}, 401, 'Unauthorized'));
    const onError = vi.fn();

    const client = new TavilySearchClient('test-secret', { onError });
    const result = await client.search('acme');

    expect(result).toEqual(emptySearchResult('acme'));
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBe('acme');
    expect(onError.mock.calls[0][1].message).toBe('HTTP 401 Unauthorized for https://api.tavily.com/search');
  });

  it('degrades to an empty result on a malformed body', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ results: 'nope' }));
    const onError = vi.fn();

    const client = new TavilySearchClient('test-secret', { onError });
    expect(await client.search('acme')).toEqual(emptySearchResult('acme'));
    expect(onError.mock.calls[0][1].message).toMatch(/^Unexpected search response: /);
  });

  it('degrades to an empty result when the request itself fails', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Invalid URL'));

    const client = new TavilySearchClient('test-secret');
    expect(await client.search('acme')).toEqual(emptySearchResult('acme'));
  });
});
