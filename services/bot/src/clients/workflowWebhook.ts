import { z } from 'zod';

type FetchLike = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

const DEFAULT_TIMEOUT_MS = 180_000;

const webhookResponseSchema = z
  .object({
    message: z.string().optional(),
  })
  .passthrough();

export type WebhookResponse = z.infer<typeof webhookResponseSchema>;

export interface WorkflowWebhookOptions {
  url: string;
  timeoutMs?: number;
  /**
   * Allows dependency injection for testing.
   */
  fetch?: FetchLike;
}

/** Posts a pending batch to an external workflow (e.g. an n8n webhook). */
export class WorkflowWebhookClient {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: WorkflowWebhookOptions) {
    if (!options.url.trim()) throw new Error('webhook url is required');
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
  }

  async send(payload: unknown): Promise<WebhookResponse> {
    const res = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      const detail = await safeReadBody(res);
      throw new Error(`Workflow webhook failed: ${res.status} ${res.statusText}${detail}`);
    }

    // workflows may answer with an empty body
    const text = await res.text();
    if (!text.trim()) return {};
    // a plain-text acknowledgement counts as success without a message
    const parsed = webhookResponseSchema.safeParse(parseJson(text));
    return parsed.success ? parsed.data : {};
  }
}

async function safeReadBody(res: Response): Promise<string> {
  try {
    const text = await res.text();
    return text ? ` - ${text}` : '';
  } catch {
    return '';
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
