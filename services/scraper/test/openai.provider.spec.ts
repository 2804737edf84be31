import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { OpenAIChatProvider } from '../src/rewrite/openai';

const ORIGINAL_ENV = { ...process.env };

function restoreEnv() {
  process.env = { ...ORIGINAL_ENV };
}

function jsonResponse(body: unknown, init: ResponseInit = { status: 200 }): Response {
  return new Response(JSON.stringify(body), {
    ...init,
    headers: { 'content-type': 'application/json' },
  });
}

describe('OpenAIChatProvider', () => {
  it('calls the chat completions API and returns the message content', async () => {
    const fetchMock = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) =>
      jsonResponse({
        id: 'chat-1',
        choices: [{ index: 0, message: { role: 'assistant', content: '"Spicier title"' } }],
      }),
    );

    const provider = new OpenAIChatProvider({ apiKey: 'test-key', model: 'gpt-4o-mini', fetch: fetchMock });
    const content = await provider.complete({ prompt: 'Rewrite: hello', temperature: 0.7, maxTokens: 100 });

    expect(content).toBe('"Spicier title"');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, options] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(options).toMatchObject({
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-key',
      },
    });

    const body = JSON.parse(String(options?.body));
    expect(body).toEqual({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'Rewrite: hello' }],
      temperature: 0.7,
      max_tokens: 100,
    });
  });

  it('throws when API key is missing', async () => {
    const fetchMock = vi.fn();
    const provider = new OpenAIChatProvider({ apiKey: '', fetch: fetchMock });

    await expect(provider.complete({ prompt: 'x', temperature: 0.7, maxTokens: 10 })).rejects.toThrow(
      'OPENAI_API_KEY is not configured',
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('propagates API errors with response details', async () => {
    const fetchMock = vi.fn(async () => new Response('Rate limit exceeded', { status: 429, statusText: 'Too Many Requests' }));
    const provider = new OpenAIChatProvider({ apiKey: 'test-key', fetch: fetchMock });

    await expect(provider.complete({ prompt: 'x', temperature: 0.7, maxTokens: 10 })).rejects.toThrow(
      /429.*Rate limit exceeded/,
    );
  });

  it('throws on a response without content', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ id: 'chat-2', choices: [] }));
    const provider = new OpenAIChatProvider({ apiKey: 'test-key', fetch: fetchMock });

    await expect(provider.complete({ prompt: 'x', temperature: 0.7, maxTokens: 10 })).rejects.toThrow(
      'OpenAI chat response missing content',
    );
  });
});

describe('getCompletionProvider', () => {
  beforeEach(() => {
    vi.resetModules();
    restoreEnv();
  });

  afterEach(() => {
    vi.resetModules();
    restoreEnv();
  });

  it('returns a cached OpenAI provider configured from the environment', async () => {
    process.env.OPENAI_API_KEY = 'test-key';
    process.env.OPENAI_MODEL = 'gpt-4o-mini';

    const { getCompletionProvider } = await import('../src/rewrite/index');
    const first = getCompletionProvider();
    const second = getCompletionProvider();

    expect(first).toBe(second);
    expect(first.name).toBe('openai');
  });
});
