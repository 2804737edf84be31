import RedisMock from 'ioredis-mock';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { RedisPersonalityStore } from '../src/store/redisPersonalityStore';
import { personalityStoreContract } from './helpers/personalityStoreContract';

// ioredis-mock instances share one keyspace
const redis = new RedisMock();

personalityStoreContract('redis', async () => {
  await redis.flushall();
  return new RedisPersonalityStore(redis, () => 1_700_000_000_000);
});

describe('redis personality store layout', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('inserts a default personality and moves the pointer in one round trip', async () => {
    await redis.flushall();
    const store = new RedisPersonalityStore(redis, () => 1_700_000_000_000);
    await store.getOrCreateUser(9);
    const evalSpy = vi.spyOn(redis, 'eval');
    const hsetSpy = vi.spyOn(redis, 'hset');

    const created = await store.createPersonality(9, { name: 'x', prompt_template: 'X {original_title}', is_default: true });

    expect(created.is_default).toBe(true);
    expect(evalSpy).toHaveBeenCalledTimes(1);
    expect(hsetSpy).not.toHaveBeenCalled();

    // a delete landing right after the create must promote a successor
    await store.deletePersonality(9, 'x');
    expect(await redis.hget('scraper:user:9', 'default_personality')).toBe('default');
    expect((await store.resolvePersonality(9, 'default')).name).toBe('default');
  });

  it('reports the existing default when creating a non-default personality', async () => {
    await redis.flushall();
    const store = new RedisPersonalityStore(redis, () => 1_700_000_000_000);
    await store.getOrCreateUser(9);

    const created = await store.createPersonality(9, { name: 'y', prompt_template: 'Y {original_title}' });

    expect(created.is_default).toBe(false);
    expect(await redis.hget('scraper:user:9', 'default_personality')).toBe('default');
  });

  it('stores the default as a pointer on the user hash', async () => {
    await redis.flushall();
    const store = new RedisPersonalityStore(redis, () => 1_700_000_000_000);
    await store.getOrCreateUser(42, { username: 'bob' });
    await store.createPersonality(42, { name: 'pirate', prompt_template: 'Arr {original_title}', is_default: true });

    expect(await redis.hget('scraper:user:42', 'default_personality')).toBe('pirate');
    expect(await redis.hget('scraper:user:42', 'username')).toBe('bob');
    expect(await redis.hkeys('scraper:user:42:personalities')).toEqual(['default', 'pirate']);
  });

  it('rejects a stored row that fails validation', async () => {
    await redis.flushall();
    const store = new RedisPersonalityStore(redis, () => 1_700_000_000_000);
    await store.getOrCreateUser(42);
    await redis.hset('scraper:user:42:personalities', 'broken', JSON.stringify({ name: 'broken' }));

    await expect(store.resolvePersonality(42, 'broken')).rejects.toThrow();
  });
});
