import { z } from 'zod';
import { scrapedPostSchema } from '../clients/scraperApi';

export const pendingScrapeSchema = z.object({
  telegram_id: z.number(),
  chat_id: z.number(),
  subreddit: z.string(),
  posts: z.array(scrapedPostSchema),
  metadata: z.object({
    sort_type: z.string(),
    time_filter: z.string(),
    count: z.number(),
    timestamp: z.string(),
  }),
});

/** A scrape waiting for the user's rewrite instructions. */
export type PendingScrape = z.infer<typeof pendingScrapeSchema>;

export type ChatSession =
  | { state: 'idle' }
  | { state: 'awaiting_instruction'; pending: PendingScrape; expiresAt: number };

export const IDLE: ChatSession = { state: 'idle' };

/**
 * Per chat+user conversation state. Awaiting sessions expire on their own;
 * an expired session reads back as idle.
 */
export interface SessionStore {
  get(key: string): Promise<ChatSession>;
  awaitInstruction(key: string, pending: PendingScrape): Promise<void>;
  reset(key: string): Promise<void>;
}

export function sessionKey(chatId: number, userId: number): string {
  return `${chatId}:${userId}`;
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, { pending: PendingScrape; expiresAt: number }>();

  constructor(
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now,
  ) {}

  async get(key: string): Promise<ChatSession> {
    const entry = this.sessions.get(key);
    if (!entry) return IDLE;
    if (entry.expiresAt <= this.now()) {
      this.sessions.delete(key);
      return IDLE;
    }
    return { state: 'awaiting_instruction', pending: entry.pending, expiresAt: entry.expiresAt };
  }

  async awaitInstruction(key: string, pending: PendingScrape): Promise<void> {
    this.sessions.set(key, { pending, expiresAt: this.now() + this.ttlSeconds * 1000 });
  }

  async reset(key: string): Promise<void> {
    this.sessions.delete(key);
  }
}
