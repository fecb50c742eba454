import { classifyError, type ErrorCategory } from '../router/retry.js';

/** Longest error string recorded in a model breakdown. */
export const MAX_ERROR_LENGTH = 260;

const QUOTA_PATTERNS = [
  'quota',
  '429',
  '403',
  'permission',
  'rate limit',
  'too many requests',
  'insufficient',
];

/** A reasoning provider call that produced nothing usable. */
export class ProviderError extends Error {
  readonly provider: string;
  readonly category: ErrorCategory;

  constructor(provider: string, message: string, category?: ErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProviderError';
    this.provider = provider;
    this.category = category ?? classifyError(new Error(message));
  }
}

/** Collapse whitespace and cap at 260 characters. Blank input gives undefined. */
export function summarizeProviderError(error: unknown): string | undefined {
  if (error === undefined || error === null) return undefined;
  const text = error instanceof Error ? error.message : String(error);
  const compact = text.split(/\s+/).filter(Boolean).join(' ');
  if (!compact) return undefined;
  return compact.length <= MAX_ERROR_LENGTH ? compact : `${compact.slice(0, MAX_ERROR_LENGTH - 3)}...`;
}

/** True for quota, permission and rate-limit failures. */
export function isQuotaError(error: string | undefined): boolean {
  const lower = (error ?? '').toLowerCase();
  return QUOTA_PATTERNS.some(pattern => lower.includes(pattern));
}
