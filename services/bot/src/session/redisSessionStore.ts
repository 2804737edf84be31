import type Redis from 'ioredis';
import { z } from 'zod';
import { IDLE, pendingScrapeSchema } from './sessionStore';
import type { ChatSession, PendingScrape, SessionStore } from './sessionStore';

const sessionRedisKey = (key: string) => `bot:session:${key}`;

const storedSchema = z.object({
  pending: pendingScrapeSchema,
  expires_at: z.number(),
});

/** Sessions live in Redis under a TTL, so they survive bot restarts and expire without a sweeper. */
export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now,
  ) {}

  async get(key: string): Promise<ChatSession> {
    const raw = await this.redis.get(sessionRedisKey(key));
    if (!raw) return IDLE;

    const parsed = storedSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      await this.redis.del(sessionRedisKey(key));
      return IDLE;
    }
    return { state: 'awaiting_instruction', pending: parsed.data.pending, expiresAt: parsed.data.expires_at };
  }

  async awaitInstruction(key: string, pending: PendingScrape): Promise<void> {
    const expires_at = this.now() + this.ttlSeconds * 1000;
    await this.redis.set(sessionRedisKey(key), JSON.stringify({ pending, expires_at }), 'EX', this.ttlSeconds);
  }

  async reset(key: string): Promise<void> {
    await this.redis.del(sessionRedisKey(key));
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
