import { RewriteFailure, errorMessage } from '../errors';
import type { CompletionProvider } from './provider';

export const TITLE_PLACEHOLDER = '{original_title}';
export const FALLBACK_MARKER = ' [original]';

/** What a failed rewrite returns in place of model output. */
export type FallbackPolicy = 'original' | 'original+marker';

export interface RewriteOptions {
  template: string;
  temperature: number;
  maxTokens: number;
  /** Name reported back in the result. */
  personality: string;
}

export interface RewriteResult {
  original: string;
  rewritten: string;
  personality: string;
  error?: string;
}

export interface RewriteEngineOptions {
  provider: CompletionProvider;
  fallback?: FallbackPolicy;
  concurrency?: number;
  onFailure?: (original: string, err: RewriteFailure) => void;
}

export function buildPrompt(template: string, original: string): string {
  if (!template.includes(TITLE_PLACEHOLDER)) return template;
  return template.split(TITLE_PLACEHOLDER).join(original);
}

const QUOTE_PAIRS: Array<[string, string]> = [
  ['"', '"'],
  ["'", "'"],
  ['“', '”'],
];

export function cleanCompletion(text: string): string {
  let out = text.trim();
  for (const [open, close] of QUOTE_PAIRS) {
    if (out.length >= 2 && out.startsWith(open) && out.endsWith(close)) {
      out = out.slice(open.length, out.length - close.length).trim();
      break;
    }
  }
  return out;
}

export function applyFallback(original: string, policy: FallbackPolicy): string {
  return policy === 'original+marker' ? `${original}${FALLBACK_MARKER}` : original;
}

/**
 * Rewrites titles through a completion provider. A failed call never throws:
 * the result carries the fallback title and an `error` marker instead, so a
 * batch of N titles always yields N results.
 */
export class RewriteEngine {
  private readonly provider: CompletionProvider;
  readonly fallback: FallbackPolicy;
  private readonly concurrency: number;
  private readonly onFailure?: (original: string, err: RewriteFailure) => void;

  constructor(options: RewriteEngineOptions) {
    this.provider = options.provider;
    this.fallback = options.fallback ?? 'original';
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.onFailure = options.onFailure;
  }

  async rewrite(original: string, options: RewriteOptions): Promise<RewriteResult> {
    try {
      const raw = await this.provider.complete({
        prompt: buildPrompt(options.template, original),
        temperature: options.temperature,
        maxTokens: options.maxTokens,
      });
      const rewritten = cleanCompletion(raw);
      if (!rewritten) throw new RewriteFailure(`${this.provider.name} returned an empty completion`);
      return { original, rewritten, personality: options.personality };
    } catch (err) {
      const failure = err instanceof RewriteFailure ? err : new RewriteFailure(errorMessage(err), { cause: err });
      this.onFailure?.(original, failure);
      return {
        original,
        rewritten: applyFallback(original, this.fallback),
        personality: options.personality,
        error: failure.message,
      };
    }
  }

  /** Output order matches input order. */
  async rewriteAll(originals: string[], options: RewriteOptions): Promise<RewriteResult[]> {
    const results: RewriteResult[] = new Array(originals.length);
    let next = 0;

    const worker = async () => {
      while (next < originals.length) {
        const index = next;
        next += 1;
        results[index] = await this.rewrite(originals[index], options);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, originals.length) }, () => worker());
    await Promise.all(workers);
    return results;
  }
}
