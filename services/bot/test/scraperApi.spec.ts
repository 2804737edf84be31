import { describe, expect, it, vi } from 'vitest';
import { ScraperApiClient, ScraperApiError } from '../src/clients/scraperApi';
import { post } from './helpers/fakes';

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' }, ...init });
}

const params = { subreddit: 'python', limit: 5, sort: 'top', timeFilter: 'week', telegramId: 7 };

describe('ScraperApiClient.scrape', () => {
  it('posts the scrape request with the api key', async () => {
    const fetchMock = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) =>
      jsonResponse({ task_id: 't1', status: 'completed', message: 'ok', telegram_id: 7, results: [post()] }),
    );
    const client = new ScraperApiClient({ baseUrl: 'http://scraper:8080/', apiKey: 'test-secret', fetch: fetchMock });

    const posts = await client.scrape({ ...params, username: 'alice' });

    expect(posts).toEqual([post()]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://scraper:8080/api/scrape');
    expect(init?.headers).toEqual({ 'content-type': 'application/json', 'x-api-key': 'test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual({
      subreddit: 'python',
      limit: 5,
      sort: 'top',
      time_filter: 'week',
      telegram_id: 7,
      use_ai: false,
      username: 'alice',
    });
  });

  it('omits the api key header when none is configured', async () => {
    const fetchMock = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) =>
      jsonResponse({ task_id: 't1', status: 'completed', message: 'ok', results: [] }),
    );

    await new ScraperApiClient({ fetch: fetchMock }).scrape(params);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:8080/api/scrape');
    expect(init?.headers).toEqual({ 'content-type': 'application/json' });
  });

  it('surfaces the API message and status on an HTTP error', async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse(
        { task_id: 't1', status: 'failed', message: 'Subreddit r/nope not found', results: null },
        { status: 404, statusText: 'Not Found' },
      ),
    );
    const client = new ScraperApiClient({ fetch: fetchMock });

    const err = await client.scrape(params).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ScraperApiError);
    expect(err).toMatchObject({
      status: 404,
      message: '/api/scrape failed: 404 Not Found - Subreddit r/nope not found',
    });
  });

  it('keeps a plain-text error body', async () => {
    const fetchMock = vi.fn(async () => new Response('bad gateway', { status: 502, statusText: 'Bad Gateway' }));

    await expect(new ScraperApiClient({ fetch: fetchMock }).scrape(params)).rejects.toThrow(
      '/api/scrape failed: 502 Bad Gateway - bad gateway',
    );
  });

  it('throws for a failed envelope', async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({ task_id: 't1', status: 'failed', message: 'Reddit is down', results: null }),
    );

    await expect(new ScraperApiClient({ fetch: fetchMock }).scrape(params)).rejects.toThrow('Reddit is down');
  });
});

describe('ScraperApiClient.enhanceTitles', () => {
  it('sends the posts with the instructions and returns the rewrites', async () => {
    const rewritten = { ...post(), original_title: post().title, ai_title: 'Loud title' };
    const fetchMock = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) =>
      jsonResponse({ status: 'completed', message: 'Rewrote 1 of 1 titles', results: [rewritten] }),
    );

    const results = await new ScraperApiClient({ fetch: fetchMock }).enhanceTitles([post()], 'be loud');

    expect(results).toEqual([rewritten]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:8080/api/enhance-titles');
    expect(JSON.parse(String(init?.body))).toEqual({ titles: [post()], prompt: 'be loud' });
  });
});
