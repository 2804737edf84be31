import type { CompletionProvider, CompletionRequest } from './provider';

type FetchLike = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

const OPENAI_CHAT_ENDPOINT = 'https://api.openai.com/v1/chat/completions';
const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_TIMEOUT_MS = 30_000;

export interface OpenAIChatProviderOptions {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  organization?: string;
  /**
   * Allows dependency injection for testing.
   */
  fetch?: FetchLike;
}

interface OpenAIChatResponse {
  id?: string;
  choices?: Array<{
    index: number;
    message?: {
      role: string;
      content?: string | null;
    };
    finish_reason?: string;
  }>;
}

export class OpenAIChatProvider implements CompletionProvider {
  readonly name = 'openai';
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly organization?: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAIChatProviderOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.organization = options.organization || undefined;
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
  }

  async complete(request: CompletionRequest): Promise<string> {
    if (!this.apiKey) {
      throw new Error('OPENAI_API_KEY is not configured');
    }

    const res = await this.fetchImpl(OPENAI_CHAT_ENDPOINT, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
        ...(this.organization ? { 'OpenAI-Organization': this.organization } : {}),
      },
      body: JSON.stringify({
        model: this.model,
        messages: [{ role: 'user', content: request.prompt }],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      const detail = await safeErrorBody(res);
      throw new Error(`OpenAI chat error: ${res.status} ${res.statusText}${detail}`);
    }

    const payload = (await res.json()) as OpenAIChatResponse;
    const content = payload.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new Error('OpenAI chat response missing content');
    }
    return content;
  }
}

async function safeErrorBody(res: Response): Promise<string> {
  try {
    const text = await res.text();
    return text ? ` - ${text}` : '';
  } catch {
    return '';
  }
}
