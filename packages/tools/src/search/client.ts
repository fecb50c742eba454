import { z } from 'zod';
import { fetchWithRetry, type FetchRetryConfig } from '../retry.js';

const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

export const DEFAULT_SEARCH_TIMEOUT_MS = 15_000;

export type SearchDepth = 'basic' | 'advanced';

export interface SearchOptions {
  /** Default: 5. */
  maxResults?: number;
  /** Default: 'advanced'. */
  searchDepth?: SearchDepth;
  /** Ask the engine for a direct answer. Default: true. */
  includeAnswer?: boolean;
  signal?: AbortSignal;
}

export interface SearchResult {
  query: string;
  /** The engine's direct answer, or an empty string. */
  answer: string;
  snippets: string[];
  /** `sources[i]` is the URL of `snippets[i]`; empty when the engine gave none. */
  sources: string[];
}

export interface SearchClientOptions {
  timeoutMs?: number;
  endpoint?: string;
  retry?: FetchRetryConfig;
  /** Called with the reason whenever a search degrades to an empty result. */
  onError?: (query: string, error: Error) => void;
}

/** Anything that can answer a web query. */
export interface EvidenceSearch {
  readonly enabled: boolean;
  search(query: string, options?: SearchOptions): Promise<SearchResult>;
}

const TavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z.array(z.object({
    content: z.string().nullish(),
    url: z.string().nullish(),
  }).passthrough()).nullish(),
}).passthrough();

export function emptySearchResult(query: string): SearchResult {
  return { query, answer: '', snippets: [], sources: [] };
}

/**
 * Tavily web search. Search is best-effort: without an API key, or on any
 * HTTP, timeout or parse failure, `search` resolves to an empty result.
 */
export class TavilySearchClient implements EvidenceSearch {
  private readonly timeoutMs: number;
  private readonly endpoint: string;
  private readonly retry: FetchRetryConfig;
  private readonly onError?: (query: string, error: Error) => void;

  constructor(private readonly apiKey: string | undefined, options: SearchClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS;
    this.endpoint = options.endpoint ?? TAVILY_SEARCH_URL;
    this.retry = options.retry ?? { maxRetries: 1, initialDelayMs: 500 };
    this.onError = options.onError;
  }

  get enabled(): boolean {
    return Boolean(this.apiKey?.trim());
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult> {
    if (!this.enabled) return emptySearchResult(query);

    try {
      return await this.request(query, options);
    } catch (err) {
      this.onError?.(query, err instanceof Error ? err : new Error(String(err)));
      return emptySearchResult(query);
    }
  }

  private async request(query: string, options: SearchOptions): Promise<SearchResult> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    const response = await fetchWithRetry(
      this.endpoint,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'Accept': 'application/json' },
        body: JSON.stringify({
          api_key: this.apiKey,
          query,
          max_results: options.maxResults ?? 5,
          search_depth: options.searchDepth ?? 'advanced',
          include_answer: options.includeAnswer ?? true,
        }),
        signal,
      },
      this.retry,
    );

    const parsed = TavilyResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected search response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }

    const snippets: string[] = [];
    const sources: string[] = [];
    for (const row of parsed.data.results ?? []) {
      const content = (row.content ?? '').trim();
      const url = (row.url ?? '').trim();
      if (!content) continue;
      snippets.push(content);
      sources.push(url);
    }

    return { query, answer: (parsed.data.answer ?? '').trim(), snippets, sources };
  }
}
