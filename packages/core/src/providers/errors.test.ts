import { describe, it, expect } from 'vitest';
import { ProviderError, summarizeProviderError, isQuotaError } from './errors.js';

describe('summarizeProviderError', () => {
  it('collapses whitespace', () => {
    expect(summarizeProviderError(new Error('HTTP 503:\n  upstream\tunavailable '))).toBe('HTTP 503: upstream unavailable');
  });

  it('truncates to 260 characters', () => {
    const summary = summarizeProviderError('x'.repeat(400));
    expect(summary).toHaveLength(260);
    expect(summary?.endsWith('...')).toBe(true);
    expect(summary?.slice(0, 257)).toBe('x'.repeat(257));
  });

  it('keeps a 260 character message intact', () => {
    expect(summarizeProviderError('y'.repeat(260))).toBe('y'.repeat(260));
  });

  it('returns undefined for blank input', () => {
    expect(summarizeProviderError('   ')).toBeUndefined();
    expect(summarizeProviderError(undefined)).toBeUndefined();
    expect(summarizeProviderError(null)).toBeUndefined();
  });
});

describe('isQuotaError', () => {
  it.each([
    'HTTP 429 Too Many Requests',
    'Token quota exceeded for this project',
    'HTTP 403: user lacks permission for foundation models',
    'insufficient_quota',
  ])('detects "%s"', (message) => {
    expect(isQuotaError(message)).toBe(true);
  });

  it('ignores other failures', () => {
    expect(isQuotaError('HTTP 500 Internal Server Error')).toBe(false);
    expect(isQuotaError(undefined)).toBe(false);
  });
});

describe('ProviderError', () => {
  it('classifies from the message when no category is given', () => {
    const error = new ProviderError('watsonx', 'HTTP 429: quota exceeded');
    expect(error.name).toBe('ProviderError');
    expect(error.provider).toBe('watsonx');
    expect(error.category).toBe('quota');
  });

  it('keeps an explicit category', () => {
    expect(new ProviderError('groq', 'groq: m: invalid JSON response', 'json_parse').category).toBe('json_parse');
  });
});
