import { beforeEach, describe, expect, it } from 'vitest';
import { ScrapeHandler, instructionTemplate } from '../src/handler/scrapeHandler';
import type { ScrapeRequest } from '../src/handler/scrapeHandler';
import { RewriteEngine } from '../src/rewrite/engine';
import { MemoryPersonalityStore } from '../src/store/memoryPersonalityStore';
import { fakeProvider, fakeReddit, submission } from './helpers/fakes';

const USER = 555;

function request(overrides: Partial<ScrapeRequest> = {}): ScrapeRequest {
  return {
    subreddit: 'typescript',
    limit: 10,
    sort: 'hot',
    time_filter: 'week',
    telegram_id: USER,
    personality_name: 'default',
    use_ai: true,
    ...overrides,
  };
}

describe('ScrapeHandler.scrape', () => {
  let store: MemoryPersonalityStore;

  beforeEach(() => {
    store = new MemoryPersonalityStore(() => 1_700_000_000_000);
  });

  it('fetches and rewrites every post with the default personality', async () => {
    const reddit = fakeReddit([submission({ id: 'a', title: 'First' }), submission({ id: 'b', title: 'Second' })]);
    const { provider, complete } = fakeProvider(async ({ prompt }) => `"${prompt.includes('First') ? 'One' : 'Two'}"`);
    const handler = new ScrapeHandler({ reddit: reddit.client, store, rewriter: new RewriteEngine({ provider }) });

    const { response, error } = await handler.scrape(request());

    expect(error).toBeUndefined();
    expect(response.status).toBe('completed');
    expect(response.message).toBe('Successfully scraped 2 posts from r/typescript');
    expect(response.telegram_id).toBe(USER);
    expect(response.results).toEqual([
      expect.objectContaining({ id: 'a', original_title: 'First', ai_title: 'One', personality_used: 'default' }),
      expect.objectContaining({ id: 'b', original_title: 'Second', ai_title: 'Two', personality_used: 'default' }),
    ]);
    expect(complete).toHaveBeenCalledTimes(2);
    expect(complete.mock.calls[0][0]).toMatchObject({ temperature: 0.7, maxTokens: 100 });
    expect(await store.getUser(USER)).not.toBeNull();
  });

  it('uses the named personality settings', async () => {
    await store.getOrCreateUser(USER);
    await store.createPersonality(USER, {
      name: 'pirate',
      prompt_template: 'Pirate it: {original_title}',
      temperature: 1.1,
      max_tokens: 40,
    });
    const reddit = fakeReddit([submission({ title: 'Hello' })]);
    const { provider, complete } = fakeProvider(async () => 'Ahoy');
    const handler = new ScrapeHandler({ reddit: reddit.client, store, rewriter: new RewriteEngine({ provider }) });

    const { response } = await handler.scrape(request({ personality_name: 'pirate' }));

    expect(complete).toHaveBeenCalledWith({ prompt: 'Pirate it: Hello', temperature: 1.1, maxTokens: 40 });
    expect(response.results).toEqual([expect.objectContaining({ ai_title: 'Ahoy', personality_used: 'pirate' })]);
  });

  it('keeps the original title when the provider fails', async () => {
    const reddit = fakeReddit([submission({ title: 'Hello' })]);
    const { provider } = fakeProvider(async () => {
      throw new Error('rate limited');
    });
    const handler = new ScrapeHandler({ reddit: reddit.client, store, rewriter: new RewriteEngine({ provider }) });

    const { response } = await handler.scrape(request());

    expect(response.status).toBe('completed');
    expect(response.results).toEqual([
      expect.objectContaining({ original_title: 'Hello', ai_title: 'Hello', ai_error: 'rate limited' }),
    ]);
  });

  it('returns raw posts without touching the store when AI is off', async () => {
    const reddit = fakeReddit([submission({ id: 'a' })]);
    const { provider, complete } = fakeProvider(async () => 'unused');
    const handler = new ScrapeHandler({ reddit: reddit.client, store, rewriter: new RewriteEngine({ provider }) });

    const { response } = await handler.scrape(request({ use_ai: false, telegram_id: null }));

    expect(response.status).toBe('completed');
    expect(response.results).toHaveLength(1);
    expect(response.results?.[0]).not.toHaveProperty('ai_title');
    expect(complete).not.toHaveBeenCalled();
    expect(await store.getUser(USER)).toBeNull();
  });

  it('fails with a not-found message for a missing subreddit', async () => {
    const reddit = fakeReddit([], false);
    const { provider } = fakeProvider(async () => 'unused');
    const handler = new ScrapeHandler({ reddit: reddit.client, store, rewriter: new RewriteEngine({ provider }) });

    const { response, error } = await handler.scrape(request({ subreddit: 'nope' }));

    expect(response).toMatchObject({
      status: 'failed',
      message: 'Subreddit r/nope not found',
      telegram_id: USER,
      results: null,
    });
    expect(error).toBeInstanceOf(Error);
    expect(reddit.listing).not.toHaveBeenCalled();
  });

  it('fails before fetching when the personality is unknown', async () => {
    const reddit = fakeReddit([submission()]);
    const { provider } = fakeProvider(async () => 'unused');
    const handler = new ScrapeHandler({ reddit: reddit.client, store, rewriter: new RewriteEngine({ provider }) });

    const { response } = await handler.scrape(request({ personality_name: 'ghost' }));

    expect(response).toMatchObject({ status: 'failed', message: "Personality 'ghost' not found", results: null });
    expect(reddit.subredditExists).not.toHaveBeenCalled();
  });

  it('requires a telegram id when AI is on', async () => {
    const reddit = fakeReddit([submission()]);
    const { provider } = fakeProvider(async () => 'unused');
    const handler = new ScrapeHandler({ reddit: reddit.client, store, rewriter: new RewriteEngine({ provider }) });

    const { response } = await handler.scrape(request({ telegram_id: null }));

    expect(response).toMatchObject({
      status: 'failed',
      message: 'telegram_id is required when use_ai is enabled',
      telegram_id: null,
    });
  });

  it('issues a fresh task id per request', async () => {
    const reddit = fakeReddit([]);
    const { provider } = fakeProvider(async () => 'unused');
    const handler = new ScrapeHandler({ reddit: reddit.client, store, rewriter: new RewriteEngine({ provider }) });

    const first = await handler.scrape(request({ use_ai: false }));
    const second = await handler.scrape(request({ use_ai: false }));

    expect(first.response.task_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(first.response.task_id).not.toBe(second.response.task_id);
    expect(first.response.message).toBe('Successfully scraped 0 posts from r/typescript');
  });
});

describe('ScrapeHandler.enhanceTitles', () => {
  it('rewrites titles with free-text instructions and keeps extra fields', async () => {
    const { provider, complete } = fakeProvider(async () => 'LOUD');
    const handler = new ScrapeHandler({
      reddit: fakeReddit([]).client,
      store: new MemoryPersonalityStore(),
      rewriter: new RewriteEngine({ provider }),
    });

    const results = await handler.enhanceTitles({
      titles: [{ title: 'quiet news', id: 'x1', permalink: 'https://reddit.com/r/a/x1' }],
      prompt: 'Make it loud',
    });

    expect(results).toEqual([
      { title: 'quiet news', id: 'x1', permalink: 'https://reddit.com/r/a/x1', original_title: 'quiet news', ai_title: 'LOUD' },
    ]);
    expect(complete).toHaveBeenCalledWith({
      prompt:
        'Make it loud\n\nRewrite this Reddit post title accordingly and reply with the new title only:\n\nquiet news',
      temperature: 0.7,
      maxTokens: 100,
    });
  });

  it('passes through custom sampling settings', async () => {
    const { provider, complete } = fakeProvider(async () => 'ok');
    const handler = new ScrapeHandler({
      reddit: fakeReddit([]).client,
      store: new MemoryPersonalityStore(),
      rewriter: new RewriteEngine({ provider }),
    });

    await handler.enhanceTitles({ titles: [{ title: 'a' }], prompt: 'Shout {original_title}', temperature: 0, max_tokens: 20 });

    expect(complete).toHaveBeenCalledWith({ prompt: 'Shout a', temperature: 0, maxTokens: 20 });
  });
});

describe('instructionTemplate', () => {
  it('keeps a prompt that already has the placeholder', () => {
    expect(instructionTemplate('Rewrite {original_title}')).toBe('Rewrite {original_title}');
  });

  it('wraps bare instructions around the title placeholder', () => {
    expect(instructionTemplate('  be brief ')).toBe(
      'be brief\n\nRewrite this Reddit post title accordingly and reply with the new title only:\n\n{original_title}',
    );
  });
});
