import type {
  CreatePersonalityArgs,
  Personality,
  TelegramId,
  UserProfile,
  UserRecord,
} from '../types';

/** Name that always resolves to the user's default personality. */
export const DEFAULT_PERSONALITY = 'default';

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 100;

export const SEED_PERSONALITY = {
  name: DEFAULT_PERSONALITY,
  description: 'Default friendly personality',
  prompt_template: `Please rewrite the following Reddit post title in a more engaging way while keeping the main points:

{original_title}

Make it more conversational and add some personality. Keep the tone friendly and approachable.`,
  temperature: DEFAULT_TEMPERATURE,
  max_tokens: DEFAULT_MAX_TOKENS,
} as const;

/**
 * Users and their personalities. Every backend keeps two invariants:
 * a known user has at least one personality, and exactly one of them is
 * the default.
 */
export interface PersonalityStore {
  /** Creates the user together with the seeded default personality when missing. */
  getOrCreateUser(telegramId: TelegramId, profile?: UserProfile): Promise<UserRecord>;
  getUser(telegramId: TelegramId): Promise<UserRecord | null>;
  listPersonalities(telegramId: TelegramId): Promise<Personality[]>;
  createPersonality(telegramId: TelegramId, args: CreatePersonalityArgs): Promise<Personality>;
  /** `"default"` resolves to the flagged default; other names match exactly. */
  resolvePersonality(telegramId: TelegramId, name: string): Promise<Personality>;
  deletePersonality(telegramId: TelegramId, name: string): Promise<void>;
}

/** Stored form of a personality; the default flag lives on the user. */
export interface PersonalityRow {
  name: string;
  description: string;
  prompt_template: string;
  temperature: number;
  max_tokens: number;
  created_at: number;
}

export function toRow(args: CreatePersonalityArgs, now: number): PersonalityRow {
  return {
    name: args.name,
    description: args.description ?? '',
    prompt_template: args.prompt_template,
    temperature: args.temperature ?? DEFAULT_TEMPERATURE,
    max_tokens: args.max_tokens ?? DEFAULT_MAX_TOKENS,
    created_at: now,
  };
}

export function seedRow(now: number): PersonalityRow {
  return { ...SEED_PERSONALITY, created_at: now };
}

export function toPersonality(telegramId: TelegramId, row: PersonalityRow, defaultName: string | null): Personality {
  return {
    user_id: telegramId,
    ...row,
    is_default: row.name === defaultName,
  };
}

/** Which personality becomes default once the current default is deleted. */
export function pickSuccessor(names: string[]): string | null {
  if (names.length === 0) return null;
  return [...names].sort()[0];
}
