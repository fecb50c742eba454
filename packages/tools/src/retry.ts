/**
 * HTTP retry for the search clients.
 *
 * Retries 429 and 5xx responses and transient network failures with
 * exponential backoff, honouring Retry-After. An aborted request is never
 * retried.
 */

export interface FetchRetryConfig {
  /** Default: 2. */
  maxRetries?: number;
  /** Delay before the first retry. Default: 1000. */
  initialDelayMs?: number;
  /** Default: 2. */
  backoffMultiplier?: number;
  /** Default: 15000. */
  maxDelayMs?: number;
}

const DEFAULTS: Required<FetchRetryConfig> = {
  maxRetries: 2,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 15000,
};

const TRANSIENT_MARKERS = ['fetch failed', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'socket hang up'];

export class HttpStatusError extends Error {
  constructor(readonly status: number, statusText: string, readonly url: string) {
    super(`HTTP ${status} ${statusText}${status === 429 ? ' (rate limited)' : ''} for ${url}`);
    this.name = 'HttpStatusError';
  }

  get retryable(): boolean {
    return this.status === 429 || (this.status >= 500 && this.status <= 599);
  }
}

export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  config: FetchRetryConfig = {},
): Promise<Response> {
  const settings = { ...DEFAULTS, ...config };
  const signal = init.signal ?? undefined;
  let lastError: Error = new Error('Fetch retry failed');

  for (let attempt = 0; attempt <= settings.maxRetries; attempt++) {
    let delay = backoffDelay(attempt, settings);
    try {
      const response = await fetch(url, init);
      if (response.ok) return response;

      const statusError = new HttpStatusError(response.status, response.statusText, url);
      if (!statusError.retryable) throw statusError;
      lastError = statusError;

      const retryAfter = Number.parseInt(response.headers.get('Retry-After') ?? '', 10);
      if (Number.isFinite(retryAfter)) {
        delay = Math.max(delay, retryAfter * 1000);
      }
    } catch (err) {
      if (isAbort(err) || err instanceof HttpStatusError) throw err;
      lastError = err instanceof Error ? err : new Error(String(err));
      if (!TRANSIENT_MARKERS.some(marker => lastError.message.includes(marker))) {
        throw lastError;
      }
    }

    if (attempt < settings.maxRetries) {
      await sleep(delay, signal);
    }
  }

  throw lastError;
}

function backoffDelay(attempt: number, settings: Required<FetchRetryConfig>): number {
  const base = settings.initialDelayMs * Math.pow(settings.backoffMultiplier, attempt);
  return Math.min(base + base * 0.1 * Math.random(), settings.maxDelayMs);
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DOMException('Aborted', 'AbortError'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new DOMException('Aborted', 'AbortError'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
