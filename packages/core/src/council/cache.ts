/**
 * Council result cache.
 *
 * Results are keyed by company identity, not by analysis parameters: a
 * second run for the same company, ticker and failure year returns the
 * stored output without calling any provider. Entries are frozen on
 * insert and never replaced.
 */

import { Semaphore } from './concurrency.js';
import type { CouncilOutput } from './types.js';

export const COUNCIL_SCHEMA_VERSION = 'v2';

export interface CouncilCacheKeyInput {
  companyName: string;
  ticker: string;
  failureYear?: number | null;
}

/** Deterministic key; fields are in sorted order. */
export function councilCacheKey(input: CouncilCacheKeyInput): string {
  return JSON.stringify({
    company: input.companyName,
    failure_year: input.failureYear ?? null,
    schema_version: COUNCIL_SCHEMA_VERSION,
    ticker: input.ticker,
  });
}

export interface CouncilCache {
  get(key: string): Promise<CouncilOutput | undefined>;
  /** Store `value` unless the key is taken; resolves to whichever entry is stored. */
  set(key: string, value: CouncilOutput): Promise<CouncilOutput>;
  clear(): Promise<void>;
  size(): number;
}

export interface MemoryCouncilCacheOptions {
  /** Oldest entries are evicted past this size. Unbounded when omitted. */
  maxEntries?: number;
}

export class MemoryCouncilCache implements CouncilCache {
  private readonly entries = new Map<string, CouncilOutput>();
  private readonly lock = new Semaphore(1);
  private readonly maxEntries: number;

  constructor(options: MemoryCouncilCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? Infinity;
    if (!(this.maxEntries >= 1)) {
      throw new Error('maxEntries must be at least 1');
    }
  }

  get(key: string): Promise<CouncilOutput | undefined> {
    return this.lock.run(async () => this.entries.get(key));
  }

  set(key: string, value: CouncilOutput): Promise<CouncilOutput> {
    return this.lock.run(async () => {
      const existing = this.entries.get(key);
      if (existing) return existing;

      const frozen = deepFreeze(value);
      this.entries.set(key, frozen);
      while (this.entries.size > this.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
      return frozen;
    });
  }

  clear(): Promise<void> {
    return this.lock.run(async () => {
      this.entries.clear();
    });
  }

  size(): number {
    return this.entries.size;
  }
}

/** Process-wide cache used when a caller does not inject one. */
export const defaultCouncilCache: CouncilCache = new MemoryCouncilCache();

export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return value;
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  return Object.freeze(value);
}
