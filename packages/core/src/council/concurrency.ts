/**
 * Bounded concurrency for the council.
 *
 * `Semaphore` gates async work with a FIFO wait queue. `runConcurrentPair`
 * is the one fan-out point of a council run: two tasks, at most two in
 * flight, each with its own timeout, joined with failures as values.
 */

import { withTimeout } from '../router/retry.js';

export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error('Semaphore permits must be a positive integer');
    }
    this.available = permits;
  }

  /** Wait for a permit. The returned function gives it back; calling it twice is a no-op. */
  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available--;
    } else {
      await new Promise<void>(resolve => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      // Hand the permit straight to the next waiter
      if (next) next();
      else this.available++;
    };
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

export type PairOutcome<T> =
  | { ok: true; value: T; latencyMs: number }
  | { ok: false; error: unknown; latencyMs: number };

export interface ConcurrentPairOptions {
  /** Per-task wait bound. A timeout settles that task only. */
  timeoutMs: number;
  now?: () => number;
}

export async function runConcurrentPair<A, B>(
  first: () => Promise<A>,
  second: () => Promise<B>,
  options: ConcurrentPairOptions,
): Promise<[PairOutcome<A>, PairOutcome<B>]> {
  const pool = new Semaphore(2);
  const now = options.now ?? Date.now;

  const settle = async <T>(task: () => Promise<T>): Promise<PairOutcome<T>> => {
    const started = now();
    const latency = () => Math.max(0, Math.round(now() - started));
    try {
      const value = await pool.run(() => withTimeout(Promise.resolve().then(task), options.timeoutMs));
      return { ok: true, value, latencyMs: latency() };
    } catch (error) {
      return { ok: false, error, latencyMs: latency() };
    }
  };

  return Promise.all([settle(first), settle(second)]);
}
