import {
  DuplicateNameError,
  LastPersonalityError,
  PersonalityNotFoundError,
  UserNotFoundError,
} from '../errors';
import type { CreatePersonalityArgs, Personality, TelegramId, UserProfile, UserRecord } from '../types';
import {
  DEFAULT_PERSONALITY,
  pickSuccessor,
  seedRow,
  toPersonality,
  toRow,
} from './personalityStore';
import type { PersonalityRow, PersonalityStore } from './personalityStore';

interface UserEntry {
  user: UserRecord;
  defaultName: string;
  personalities: Map<string, PersonalityRow>;
}

/**
 * Process-local backend. Every mutation completes without awaiting, so each
 * call is atomic with respect to the event loop.
 */
export class MemoryPersonalityStore implements PersonalityStore {
  private readonly users = new Map<TelegramId, UserEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async getOrCreateUser(telegramId: TelegramId, profile: UserProfile = {}): Promise<UserRecord> {
    const existing = this.users.get(telegramId);
    if (existing) return { ...existing.user };

    const created_at = this.now();
    const user: UserRecord = {
      telegram_id: telegramId,
      ...(profile.username ? { username: profile.username } : {}),
      ...(profile.first_name ? { first_name: profile.first_name } : {}),
      created_at,
      is_active: true,
    };
    this.users.set(telegramId, {
      user,
      defaultName: DEFAULT_PERSONALITY,
      personalities: new Map([[DEFAULT_PERSONALITY, seedRow(created_at)]]),
    });
    return { ...user };
  }

  async getUser(telegramId: TelegramId): Promise<UserRecord | null> {
    const entry = this.users.get(telegramId);
    return entry ? { ...entry.user } : null;
  }

  async listPersonalities(telegramId: TelegramId): Promise<Personality[]> {
    const entry = this.users.get(telegramId);
    if (!entry) return [];
    return [...entry.personalities.values()].map((row) => toPersonality(telegramId, row, entry.defaultName));
  }

  async createPersonality(telegramId: TelegramId, args: CreatePersonalityArgs): Promise<Personality> {
    const entry = this.requireUser(telegramId);
    if (entry.personalities.has(args.name)) throw new DuplicateNameError(args.name);

    const row = toRow(args, this.now());
    entry.personalities.set(row.name, row);
    if (args.is_default) entry.defaultName = row.name;
    return toPersonality(telegramId, row, entry.defaultName);
  }

  async resolvePersonality(telegramId: TelegramId, name: string): Promise<Personality> {
    const entry = this.users.get(telegramId);
    const wanted = name === DEFAULT_PERSONALITY && entry ? entry.defaultName : name;
    const row = entry?.personalities.get(wanted);
    if (!entry || !row) throw new PersonalityNotFoundError(name);
    return toPersonality(telegramId, row, entry.defaultName);
  }

  async deletePersonality(telegramId: TelegramId, name: string): Promise<void> {
    const entry = this.requireUser(telegramId);
    if (!entry.personalities.has(name)) throw new PersonalityNotFoundError(name);
    if (entry.personalities.size <= 1) throw new LastPersonalityError(name);

    entry.personalities.delete(name);
    if (entry.defaultName === name) {
      const successor = pickSuccessor([...entry.personalities.keys()]);
      if (successor) entry.defaultName = successor;
    }
  }

  private requireUser(telegramId: TelegramId): UserEntry {
    const entry = this.users.get(telegramId);
    if (!entry) throw new UserNotFoundError(telegramId);
    return entry;
  }
}
