/**
 * Ordered failover: try each candidate, check the shape of what came back,
 * and fall through to the next one (and finally to a deterministic
 * fallback) on failure. Every failure is kept as a short string.
 */

import { summarizeProviderError } from '../providers/errors.js';

export interface FailoverCandidate<T> {
  name: string;
  invoke: () => Promise<T>;
}

/** `true` accepts; `false` or a reason string rejects. */
export type FailoverValidator<T> = (value: T) => boolean | string;

export interface FailoverOptions<T> {
  candidates: readonly FailoverCandidate<T>[];
  validate?: FailoverValidator<T>;
  fallback?: () => T;
  /** Millisecond clock, injectable for tests. */
  now?: () => number;
}

export interface FailoverAttempt {
  name: string;
  ok: boolean;
  latencyMs: number;
  error?: string;
}

export interface FailoverResult<T> {
  /** Undefined only when every candidate failed and no fallback was given. */
  value: T | undefined;
  /** Candidate name, 'fallback', or undefined when nothing produced a value. */
  source: string | undefined;
  /** Failure strings keyed by candidate name. */
  errors: Record<string, string>;
  attempts: FailoverAttempt[];
}

export interface SettledFailoverResult<T> extends FailoverResult<T> {
  value: T;
  source: string;
}

export const FALLBACK_SOURCE = 'fallback';

export function runFailoverChain<T>(options: FailoverOptions<T> & { fallback: () => T }): Promise<SettledFailoverResult<T>>;
export function runFailoverChain<T>(options: FailoverOptions<T>): Promise<FailoverResult<T>>;
export async function runFailoverChain<T>(options: FailoverOptions<T>): Promise<FailoverResult<T>> {
  const now = options.now ?? Date.now;
  const errors: Record<string, string> = {};
  const attempts: FailoverAttempt[] = [];

  const record = (name: string, latencyMs: number, error: string) => {
    attempts.push({ name, ok: false, latencyMs, error });
    errors[name] = errors[name] ? `${errors[name]} | ${error}` : error;
  };

  for (const candidate of options.candidates) {
    const started = now();
    let value: T;
    try {
      value = await candidate.invoke();
    } catch (err) {
      record(candidate.name, elapsed(started, now), summarizeProviderError(err) ?? `${candidate.name} failed`);
      continue;
    }

    const latencyMs = elapsed(started, now);
    const verdict = options.validate ? options.validate(value) : true;
    if (verdict === true) {
      attempts.push({ name: candidate.name, ok: true, latencyMs });
      return { value, source: candidate.name, errors, attempts };
    }
    record(candidate.name, latencyMs, typeof verdict === 'string' ? verdict : `${candidate.name} response failed validation`);
  }

  if (options.fallback) {
    return { value: options.fallback(), source: FALLBACK_SOURCE, errors, attempts };
  }
  return { value: undefined, source: undefined, errors, attempts };
}

function elapsed(started: number, now: () => number): number {
  return Math.max(0, Math.round(now() - started));
}
