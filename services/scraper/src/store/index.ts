import { config } from '../config';
import { getRedis } from '../redis/client';
import { MemoryPersonalityStore } from './memoryPersonalityStore';
import type { PersonalityStore } from './personalityStore';
import { RedisPersonalityStore } from './redisPersonalityStore';

let _store: PersonalityStore | null = null;

export function getPersonalityStore(): PersonalityStore {
  if (_store) return _store;

  switch (config.storeBackend) {
    case 'memory':
      _store = new MemoryPersonalityStore();
      return _store;
    case 'redis':
      _store = new RedisPersonalityStore(getRedis());
      return _store;
    default:
      throw new Error(`Unsupported store backend: ${String(config.storeBackend)}`);
  }
}
