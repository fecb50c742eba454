/**
 * Backoff and timeouts for reasoning-provider calls.
 *
 * Quota, auth and configuration failures surface on the first attempt; rate
 * limits, 5xx responses and timeouts back off and retry.
 */

export type ErrorCategory =
  | 'quota'            // quota or entitlement exhausted
  | 'rate_limit'       // 429
  | 'server_error'     // 500/502/503
  | 'timeout'
  | 'auth_error'       // 401/403
  | 'not_found'        // 404
  | 'json_parse'       // reply was not a JSON object
  | 'not_configured'   // missing key, project or model
  | 'unknown';

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/** A provider is missing its API key, project or model. Never retried. */
export class ProviderNotConfiguredError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderNotConfiguredError';
  }
}

const CATEGORY_PATTERNS: ReadonlyArray<[ErrorCategory, RegExp]> = [
  // Quota wins over the status code: a 429 or 403 that names a quota is not transient
  ['quota', /quota|insufficient|entitlement/i],
  ['rate_limit', /\b429\b|rate limit|too many requests/i],
  ['server_error', /\b(500|502|503)\b|internal server error|bad gateway|service unavailable/i],
  ['auth_error', /\b(401|403)\b|unauthorized|forbidden|api key/i],
  ['not_found', /\b404\b|not found/i],
  ['timeout', /timeout|timed out|aborted/i],
  ['json_parse', /json.*(parse|unexpected token)|(parse|unexpected token).*json/i],
];

export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof ProviderNotConfiguredError) return 'not_configured';
  if (error instanceof TimeoutError) return 'timeout';

  const message = error instanceof Error ? error.message : String(error);
  const match = CATEGORY_PATTERNS.find(([, pattern]) => pattern.test(message));
  return match ? match[0] : 'unknown';
}

export interface RetryConfig {
  /** Retries after the first attempt. */
  maxRetries?: number;
  initialDelayMs?: number;
  backoffMultiplier?: number;
  maxDelayMs?: number;
  /** Per-attempt timeout; 0 or Infinity disables it. */
  timeoutMs?: number;
  retryOn?: readonly ErrorCategory[];
  onRetry?: (attempt: number, error: Error, category: ErrorCategory, delayMs: number) => void;
}

export interface RetryResult<T> {
  result: T;
  attempts: number;
}

/** Reasoning-provider calls: a couple of quick retries, then give up. */
export const PROVIDER_RETRY: Readonly<RetryConfig> = {
  maxRetries: 2,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  timeoutMs: 35000,
  retryOn: ['rate_limit', 'server_error', 'timeout'],
};

/** The JSON repair request is a single shot. */
export const JSON_REPAIR_RETRY: Readonly<RetryConfig> = {
  maxRetries: 0,
  timeoutMs: 35000,
};

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or the
 * retries are used up. `fn` receives the zero-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = {},
): Promise<RetryResult<T>> {
  const settings = { ...PROVIDER_RETRY, ...config };
  const maxRetries = settings.maxRetries ?? 0;
  const retryOn = settings.retryOn ?? [];

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await withTimeout(fn(attempt), settings.timeoutMs ?? 0);
      return { result, attempts: attempt + 1 };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      const category = classifyError(err);
      if (attempt >= maxRetries || !retryOn.includes(category)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, settings, error.message);
      settings.onRetry?.(attempt + 1, error, category, delayMs);
      await new Promise(resolve => setTimeout(resolve, delayMs));
    }
  }
}

function backoffDelay(attempt: number, settings: RetryConfig, message: string): number {
  const base = (settings.initialDelayMs ?? 1000) * Math.pow(settings.backoffMultiplier ?? 2, attempt);
  const jittered = Math.min(base * (1 + 0.1 * Math.random()), settings.maxDelayMs ?? Infinity);
  // Providers sometimes put a Retry-After hint (seconds) in the error text
  const hint = /retry.?after[:\s]+(\d+)/i.exec(message);
  return hint ? Math.max(jittered, Number(hint[1]) * 1000) : jittered;
}

/** Reject with `TimeoutError` when `promise` has not settled within `timeoutMs`. */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0 || timeoutMs === Infinity) return promise;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`Operation timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
