import pino from 'pino';
import { vi } from 'vitest';
import type { RewrittenPost, ScrapedPost, ScrapeParams } from '../../src/clients/scraperApi';
import type { WebhookResponse } from '../../src/clients/workflowWebhook';
import type { RateLimitResult, RateLimitRule } from '../../src/ratelimit';

export const silentLogger = pino({ level: 'silent' });

export function post(overrides: Partial<ScrapedPost> = {}): ScrapedPost {
  return {
    id: 'p1',
    title: 'Python 4 confirmed',
    score: 10,
    url: 'https://example.com/p1',
    permalink: 'https://reddit.com/r/python/comments/p1/python_4_confirmed/',
    subreddit: 'python',
    ...overrides,
  };
}

export function fakeApi(posts: ScrapedPost[] = [post()]) {
  return {
    scrape: vi.fn(async (_params: ScrapeParams): Promise<ScrapedPost[]> => posts),
    enhanceTitles: vi.fn(
      async (items: ScrapedPost[], _instructions: string): Promise<RewrittenPost[]> =>
        items.map((item) => ({ ...item, original_title: item.title, ai_title: item.title.toUpperCase() })),
    ),
  };
}

export function fakeWebhook(response: WebhookResponse = { message: 'Workflow started' }) {
  return { send: vi.fn(async (_payload: unknown): Promise<WebhookResponse> => response) };
}

export function fakeLimiter(result: RateLimitResult = { ok: true, count: 1 }) {
  return { consume: vi.fn(async (_key: string, _rule: RateLimitRule): Promise<RateLimitResult> => result) };
}

/** Collects replies in send order. */
export function replies() {
  const sent: string[] = [];
  const reply = async (text: string) => {
    sent.push(text);
  };
  return { sent, reply };
}
