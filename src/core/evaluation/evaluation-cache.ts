/**
 * Bounded Evaluation Cache
 *
 * Holds evaluation results keyed by `deriveEvaluationCacheKey`. A `Map`
 * keeps insertion order, which doubles as the eviction order:
 *
 * - `lru`: a hit moves the entry to the back, so the front is least recently used
 * - `fifo`: hits leave the order alone, so the front is the oldest insert
 *
 * Entries older than `ttlMs` are dropped on read; `ttlMs: 0` disables expiry.
 */

import type { EvaluationResult } from './types';

export type EvictionPolicy = 'lru' | 'fifo';

export interface EvaluationCacheOptions {
  maxEntries: number;
  ttlMs: number;
  policy: EvictionPolicy;
  /** Millisecond clock, injectable for tests */
  now?: () => number;
}

interface CacheEntry {
  value: EvaluationResult;
  storedAt: number;
}

export class EvaluationCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly policy: EvictionPolicy;
  private readonly now: () => number;

  constructor(options: EvaluationCacheOptions) {
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries));
    this.ttlMs = Math.max(0, options.ttlMs);
    this.policy = options.policy;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns a copy of the cached result, or undefined on a miss or after
   * expiry. Callers overwrite `sessionId` themselves.
   */
  get(key: string): EvaluationResult | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }

    if (this.policy === 'lru') {
      this.entries.delete(key);
      this.entries.set(key, entry);
    }

    return structuredClone(entry.value);
  }

  put(key: string, value: EvaluationResult): void {
    // Re-inserting moves the key to the back under either policy
    this.entries.delete(key);
    this.entries.set(key, { value: structuredClone(value), storedAt: this.now() });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.ttlMs > 0 && this.now() - entry.storedAt >= this.ttlMs;
  }
}
