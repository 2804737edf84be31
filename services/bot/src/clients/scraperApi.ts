import { z } from 'zod';

type FetchLike = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

const DEFAULT_BASE_URL = 'http://localhost:8080';

export const scrapedPostSchema = z
  .object({
    id: z.string(),
    title: z.string(),
    score: z.number(),
    url: z.string(),
    permalink: z.string(),
    subreddit: z.string(),
  })
  .passthrough();

export type ScrapedPost = z.infer<typeof scrapedPostSchema>;

const scrapeEnvelopeSchema = z.object({
  task_id: z.string(),
  status: z.enum(['completed', 'failed']),
  message: z.string(),
  results: z.array(scrapedPostSchema).nullable(),
});

const rewrittenPostSchema = scrapedPostSchema.extend({
  original_title: z.string(),
  ai_title: z.string(),
  ai_error: z.string().optional(),
});

export type RewrittenPost = z.infer<typeof rewrittenPostSchema>;

const enhanceResponseSchema = z.object({
  results: z.array(rewrittenPostSchema),
});

export interface ScrapeParams {
  subreddit: string;
  limit: number;
  sort: string;
  timeFilter: string;
  telegramId: number;
  username?: string;
  firstName?: string;
}

export interface ScraperApiClientOptions {
  /**
   * Location of the scraper API.
   */
  baseUrl?: string;
  /**
   * Sent as `x-api-key`; omitted when empty.
   */
  apiKey?: string;
  /**
   * Allows dependency injection for testing.
   */
  fetch?: FetchLike;
}

/** Raised for non-2xx replies; carries the HTTP status and the API's message. */
export class ScraperApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'ScraperApiError';
  }
}

/** Thin HTTP client for the scraper API's scrape and enhance endpoints. */
export class ScraperApiClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: ScraperApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.apiKey = options.apiKey ?? '';
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
  }

  /** Fetches posts without AI rewriting. */
  async scrape(params: ScrapeParams): Promise<ScrapedPost[]> {
    const payload = await this.post('/api/scrape', {
      subreddit: params.subreddit,
      limit: params.limit,
      sort: params.sort,
      time_filter: params.timeFilter,
      telegram_id: params.telegramId,
      use_ai: false,
      ...(params.username ? { username: params.username } : {}),
      ...(params.firstName ? { first_name: params.firstName } : {}),
    });

    const envelope = scrapeEnvelopeSchema.parse(payload);
    if (envelope.status === 'failed') {
      throw new ScraperApiError(envelope.message, 200);
    }
    return envelope.results ?? [];
  }

  /** Rewrites the given posts' titles following free-text instructions. */
  async enhanceTitles(posts: ScrapedPost[], instructions: string): Promise<RewrittenPost[]> {
    const payload = await this.post('/api/enhance-titles', { titles: posts, prompt: instructions });
    return enhanceResponseSchema.parse(payload).results;
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        ...(this.apiKey ? { 'x-api-key': this.apiKey } : {}),
      },
      body: JSON.stringify(body),
    });

    if (!res.ok) {
      const detail = await readErrorMessage(res);
      throw new ScraperApiError(`${path} failed: ${res.status} ${res.statusText}${detail}`, res.status);
    }
    return res.json();
  }
}

async function readErrorMessage(res: Response): Promise<string> {
  let text: string;
  try {
    text = await res.text();
  } catch {
    return '';
  }
  if (!text) return '';
  const parsed = z.object({ message: z.string() }).safeParse(parseJson(text));
  return ` - ${parsed.success ? parsed.data.message : text}`;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
