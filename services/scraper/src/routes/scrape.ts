import { randomUUID } from 'crypto';
import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { ScrapeHandler } from '../handler/scrapeHandler';
import { MAX_POSTS } from '../reddit/fetcher';
import { DEFAULT_PERSONALITY } from '../store/personalityStore';
import type { ScrapeResponse } from '../types';
import { badRequest, statusFor, summarizeIssues, toBoolean, toNumber } from './reply';

// ---------- Schemas ----------
const scrapeSchema = z.object({
  subreddit: z.string().trim().min(1, 'subreddit required'),
  // clamped to 50 by the fetcher, not rejected
  limit: z.preprocess(toNumber, z.number().int()).optional(),
  sort: z.string().optional(),
  time_filter: z.string().optional(),
  // alias used by older chat clients on /api/scrape-simple
  time: z.string().optional(),
  telegram_id: z.preprocess(toNumber, z.number().int()).optional(),
  personality_name: z.string().min(1).optional(),
  use_ai: z.preprocess(toBoolean, z.boolean()).optional(),
  username: z.string().optional(),
  first_name: z.string().optional(),
});

type ScrapeBody = z.infer<typeof scrapeSchema>;

const enhanceSchema = z.object({
  titles: z
    .array(z.object({ title: z.string().min(1, 'title required') }).passthrough())
    .min(1, 'titles required')
    .max(MAX_POSTS),
  prompt: z.string().trim().min(1, 'prompt required'),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().max(1000).optional(),
});

const DEFAULT_LIMIT = 10;

// ---------- Helpers ----------
function failedEnvelope(message: string, telegramId: number | null): ScrapeResponse {
  return { task_id: randomUUID(), status: 'failed', message, telegram_id: telegramId, results: null };
}

function invalidScrape(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send(failedEnvelope(`Invalid request: ${summarizeIssues(error)}`, null));
}

function objectOrEmpty(value: unknown): Record<string, unknown> {
  return value && typeof value === 'object' && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

function toRequest(body: ScrapeBody, useAi: boolean) {
  return {
    subreddit: body.subreddit,
    limit: body.limit ?? DEFAULT_LIMIT,
    sort: body.sort ?? 'hot',
    time_filter: body.time_filter ?? body.time ?? 'week',
    telegram_id: body.telegram_id ?? null,
    personality_name: body.personality_name ?? DEFAULT_PERSONALITY,
    use_ai: useAi,
    username: body.username,
    first_name: body.first_name,
  };
}

// ---------- Routes ----------
export async function registerScrapeRoutes(app: FastifyInstance, handler: ScrapeHandler) {
  // Fetch + optional AI rewrite
  app.post('/api/scrape', async (req, reply) => {
    const parsed = scrapeSchema.safeParse(req.body);
    if (!parsed.success) return invalidScrape(reply, parsed.error);

    const { response, error } = await handler.scrape(toRequest(parsed.data, parsed.data.use_ai ?? true));
    return reply.code(error === undefined ? 200 : statusFor(error)).send(response);
  });

  // Fetch only; parameters may arrive in the query string
  app.post('/api/scrape-simple', async (req, reply) => {
    const parsed = scrapeSchema.safeParse({ ...objectOrEmpty(req.query), ...objectOrEmpty(req.body) });
    if (!parsed.success) return invalidScrape(reply, parsed.error);

    const { response, error } = await handler.scrape(toRequest(parsed.data, false));
    return reply.code(error === undefined ? 200 : statusFor(error)).send(response);
  });

  // Rewrite a caller-supplied list of titles
  app.post('/api/enhance-titles', async (req, reply) => {
    const parsed = enhanceSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const results = await handler.enhanceTitles(parsed.data);
    const failed = results.filter((entry) => entry.ai_error !== undefined).length;
    return reply.send({
      status: 'completed',
      message: `Rewrote ${results.length - failed} of ${results.length} titles`,
      results,
    });
  });
}
