/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Rate limiting counters must be fast, shared across instances and externalized.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.incr(key, { ttlSeconds }) -> counter with expiration
 */

export interface Cache {
  /**
   * Atomically increment a counter and (optionally) ensure it expires.
   * Returns the new value.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;
}
