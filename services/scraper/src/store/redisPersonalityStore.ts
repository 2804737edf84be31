import type Redis from 'ioredis';
import { z } from 'zod';
import {
  DuplicateNameError,
  LastPersonalityError,
  PersonalityNotFoundError,
  UserNotFoundError,
} from '../errors';
import type { CreatePersonalityArgs, Personality, TelegramId, UserProfile, UserRecord } from '../types';
import { DEFAULT_PERSONALITY, seedRow, toPersonality, toRow } from './personalityStore';
import type { PersonalityRow, PersonalityStore } from './personalityStore';

const userKey = (id: TelegramId) => `scraper:user:${id}`;
const personalitiesKey = (id: TelegramId) => `scraper:user:${id}:personalities`;

const DEFAULT_FIELD = 'default_personality';

const rowSchema = z.object({
  name: z.string(),
  description: z.string(),
  prompt_template: z.string(),
  temperature: z.number(),
  max_tokens: z.number().int(),
  created_at: z.number(),
});

// KEYS[1] personalities hash, KEYS[2] user hash, ARGV[1] name.
// Returns -1 when missing, -2 when it is the last one, 1 on delete.
const DELETE_SCRIPT = `
if redis.call('HEXISTS', KEYS[1], ARGV[1]) == 0 then
  return -1
end
if redis.call('HLEN', KEYS[1]) <= 1 then
  return -2
end
redis.call('HDEL', KEYS[1], ARGV[1])
if redis.call('HGET', KEYS[2], '${DEFAULT_FIELD}') == ARGV[1] then
  local names = redis.call('HKEYS', KEYS[1])
  table.sort(names)
  redis.call('HSET', KEYS[2], '${DEFAULT_FIELD}', names[1])
end
return 1
`;

// KEYS[1] personalities hash, KEYS[2] user hash, ARGV[1] name, ARGV[2] row JSON,
// ARGV[3] '1' to make it the default. Returns -1 for an unknown user, -2 for a
// taken name, otherwise the default name after the insert.
const CREATE_SCRIPT = `
if redis.call('EXISTS', KEYS[2]) == 0 then
  return -1
end
if redis.call('HSETNX', KEYS[1], ARGV[1], ARGV[2]) == 0 then
  return -2
end
if ARGV[3] == '1' then
  redis.call('HSET', KEYS[2], '${DEFAULT_FIELD}', ARGV[1])
end
return redis.call('HGET', KEYS[2], '${DEFAULT_FIELD}')
`;

/**
 * Redis-backed store. The default flag is a single pointer on the user hash,
 * so at most one personality can ever be the default.
 */
export class RedisPersonalityStore implements PersonalityStore {
  constructor(
    private readonly redis: Redis,
    private readonly now: () => number = Date.now,
  ) {}

  async getOrCreateUser(telegramId: TelegramId, profile: UserProfile = {}): Promise<UserRecord> {
    const existing = await this.getUser(telegramId);
    if (existing) return existing;

    const uk = userKey(telegramId);
    const created_at = this.now();

    // every write is NX: concurrent first requests converge on one user
    const multi = this.redis.multi();
    multi.hsetnx(uk, 'telegram_id', String(telegramId));
    multi.hsetnx(uk, 'created_at', String(created_at));
    multi.hsetnx(uk, 'is_active', '1');
    multi.hsetnx(uk, DEFAULT_FIELD, DEFAULT_PERSONALITY);
    if (profile.username) multi.hsetnx(uk, 'username', profile.username);
    if (profile.first_name) multi.hsetnx(uk, 'first_name', profile.first_name);
    multi.hsetnx(personalitiesKey(telegramId), DEFAULT_PERSONALITY, JSON.stringify(seedRow(created_at)));
    await multi.exec();

    const stored = await this.getUser(telegramId);
    if (!stored) throw new Error(`User ${telegramId} vanished after creation`);
    return stored;
  }

  async getUser(telegramId: TelegramId): Promise<UserRecord | null> {
    const hash = await this.redis.hgetall(userKey(telegramId));
    if (!hash || !hash.telegram_id) return null;

    return {
      telegram_id: Number(hash.telegram_id),
      ...(hash.username ? { username: hash.username } : {}),
      ...(hash.first_name ? { first_name: hash.first_name } : {}),
      created_at: Number(hash.created_at),
      is_active: hash.is_active !== '0',
    };
  }

  async listPersonalities(telegramId: TelegramId): Promise<Personality[]> {
    const [rows, defaultName] = await Promise.all([
      this.redis.hgetall(personalitiesKey(telegramId)),
      this.redis.hget(userKey(telegramId), DEFAULT_FIELD),
    ]);
    return Object.values(rows).map((raw) => toPersonality(telegramId, parseRow(raw), defaultName));
  }

  async createPersonality(telegramId: TelegramId, args: CreatePersonalityArgs): Promise<Personality> {
    const row = toRow(args, this.now());
    const outcome: unknown = await this.redis.eval(
      CREATE_SCRIPT,
      2,
      personalitiesKey(telegramId),
      userKey(telegramId),
      row.name,
      JSON.stringify(row),
      args.is_default ? '1' : '0',
    );
    if (outcome === -1) throw new UserNotFoundError(telegramId);
    if (outcome === -2) throw new DuplicateNameError(row.name);
    return toPersonality(telegramId, row, typeof outcome === 'string' ? outcome : null);
  }

  async resolvePersonality(telegramId: TelegramId, name: string): Promise<Personality> {
    const defaultName = await this.redis.hget(userKey(telegramId), DEFAULT_FIELD);
    const wanted = name === DEFAULT_PERSONALITY ? defaultName : name;
    if (!wanted) throw new PersonalityNotFoundError(name);

    const raw = await this.redis.hget(personalitiesKey(telegramId), wanted);
    if (!raw) throw new PersonalityNotFoundError(name);
    return toPersonality(telegramId, parseRow(raw), defaultName);
  }

  async deletePersonality(telegramId: TelegramId, name: string): Promise<void> {
    const exists = await this.redis.exists(userKey(telegramId));
    if (!exists) throw new UserNotFoundError(telegramId);

    const outcome = Number(
      await this.redis.eval(DELETE_SCRIPT, 2, personalitiesKey(telegramId), userKey(telegramId), name),
    );
    if (outcome === -1) throw new PersonalityNotFoundError(name);
    if (outcome === -2) throw new LastPersonalityError(name);
  }
}

function parseRow(raw: string): PersonalityRow {
  return rowSchema.parse(JSON.parse(raw));
}
