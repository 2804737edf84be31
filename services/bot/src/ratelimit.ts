import type Redis from 'ioredis';

export interface RateLimitRule {
  windowSeconds: number;
  max: number;
}

export type RateLimitResult = { ok: true; count: number } | { ok: false; retryAfterSeconds: number };

export interface RateLimiter {
  consume(key: string, rule: RateLimitRule): Promise<RateLimitResult>;
}

/**
 * Fixed-window counter in Redis. The window key is created with its expiry in
 * the same transaction as the first increment, so a window can never outlive
 * its TTL. Requests over the limit are rejected, never queued.
 */
export class RedisRateLimiter implements RateLimiter {
  constructor(
    private readonly redis: Redis,
    private readonly prefix = 'bot:rl',
    private readonly nowSeconds: () => number = () => Math.floor(Date.now() / 1000),
  ) {}

  async consume(key: string, rule: RateLimitRule): Promise<RateLimitResult> {
    const bucket = Math.floor(this.nowSeconds() / rule.windowSeconds);
    const redisKey = `${this.prefix}:${key}:${bucket}`;

    const replies = await this.redis
      .multi()
      .set(redisKey, '0', 'EX', rule.windowSeconds, 'NX')
      .incr(redisKey)
      .ttl(redisKey)
      .exec();
    if (!replies) throw new Error(`Rate limit transaction for ${redisKey} was aborted`);

    const [, [incrErr, countRaw], [, ttlRaw]] = replies;
    if (incrErr) throw incrErr;

    const count = Number(countRaw);
    if (count > rule.max) {
      const ttl = Number(ttlRaw);
      return { ok: false, retryAfterSeconds: Math.max(1, ttl > 0 ? ttl : rule.windowSeconds) };
    }
    return { ok: true, count };
  }
}
