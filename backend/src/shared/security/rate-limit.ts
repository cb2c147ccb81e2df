/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Slows down credential stuffing and reset-link spam:
 *   - login attempts: per email and per IP
 *   - forgot password: per email (silent)
 *   - reset password: per IP
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: "rl" })
 * - await limiter.hitOrThrow({ key: "login:ip:1.2.3.4", limit: 20, windowSeconds: 900 })
 * - const allowed = await limiter.hitOrSkip({ key: "forgot:email:<sha256>", limit: 3, windowSeconds: 3600 })
 *
 * TWO MODES:
 * - hitOrThrow: increments counter → throws RateLimitError if over limit.
 *   Used for login and reset-password — flows where 429 is the right response.
 * - hitOrSkip: increments counter → returns false if over limit (no throw).
 *   Used for forgot-password — the caller must see the same outcome whether or
 *   not the account exists, so a 429 there would be an enumeration signal.
 *
 * ATOMICITY:
 * - Both methods use INCR-then-check, not check-then-INCR. INCR is atomic in
 *   Redis: the request that pushes the counter over the limit sees a value > limit.
 *
 * DISABLING:
 * - Pass `disabled: true` in opts to skip all checks (used in tests via di.ts).
 * - Never check NODE_ENV here — that decision belongs to the composition root.
 */

import type { Cache } from '../cache/cache';

export type RateLimitRule = { limit: number; windowSeconds: number };

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  async hitOrThrow(input: { key: string } & RateLimitRule): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    if (current > input.limit) {
      throw new RateLimitError(fullKey, input.limit, input.windowSeconds);
    }
  }

  async hitOrSkip(input: { key: string } & RateLimitRule): Promise<boolean> {
    if (this.opts?.disabled) return true;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    return current <= input.limit;
  }
}
