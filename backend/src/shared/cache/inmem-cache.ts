/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local runs without Redis) to work without external infra.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 */

import type { Cache } from './cache';

type CounterEntry = { value: number; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly counters = new Map<string, CounterEntry>();

  constructor(private readonly nowMs: () => number = Date.now) {}

  private getEntry(key: string): CounterEntry | null {
    const entry = this.counters.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.nowMs()) {
      this.counters.delete(key);
      return null;
    }

    return entry;
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);

    if (entry) {
      // Same as Redis: the window is fixed by the first hit, INCR keeps the TTL.
      entry.value += 1;
      return Promise.resolve(entry.value);
    }

    const expiresAtMs = opts?.ttlSeconds ? this.nowMs() + opts.ttlSeconds * 1000 : null;
    this.counters.set(key, { value: 1, expiresAtMs });

    return Promise.resolve(1);
  }
}
