import { randomUUID } from 'crypto';
import type { FastifyBaseLogger } from 'fastify';
import { ValidationError, errorMessage } from '../errors';
import { fetchPosts } from '../reddit/fetcher';
import type { RedditClient } from '../reddit/client';
import { TITLE_PLACEHOLDER } from '../rewrite/engine';
import type { RewriteEngine, RewriteResult } from '../rewrite/engine';
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE } from '../store/personalityStore';
import type { PersonalityStore } from '../store/personalityStore';
import type {
  AIEnhancedPost,
  Personality,
  RedditPost,
  ScrapeResponse,
  TelegramId,
  UserProfile,
} from '../types';

export interface ScrapeRequest extends UserProfile {
  subreddit: string;
  limit: number;
  sort: string;
  time_filter: string;
  telegram_id: TelegramId | null;
  personality_name: string;
  use_ai: boolean;
}

export interface TitleInput {
  title: string;
  [key: string]: unknown;
}

export interface EnhanceTitlesRequest {
  titles: TitleInput[];
  prompt: string;
  temperature?: number;
  max_tokens?: number;
}

export type EnhancedTitle = TitleInput & {
  original_title: string;
  ai_title: string;
  ai_error?: string;
};

export interface ScrapeHandlerDeps {
  reddit: RedditClient;
  store: PersonalityStore;
  rewriter: RewriteEngine;
  log?: FastifyBaseLogger;
}

/** Phase reached before a request failed; logged with the failure. */
export type ScrapePhase = 'start' | 'user_resolved' | 'personality_resolved' | 'items_fetched';

/**
 * Orchestrates one scrape: user → personality → fetch → per-item rewrite.
 * Any failure before the fetch completes yields a `failed` envelope; rewrite
 * failures are absorbed per item.
 */
export class ScrapeHandler {
  constructor(private readonly deps: ScrapeHandlerDeps) {}

  async scrape(request: ScrapeRequest): Promise<{ response: ScrapeResponse; error?: unknown }> {
    const task_id = randomUUID();
    let phase: ScrapePhase = 'start';

    try {
      let personality: Personality | null = null;
      if (request.use_ai) {
        if (request.telegram_id === null) throw new ValidationError('telegram_id is required when use_ai is enabled');
        await this.deps.store.getOrCreateUser(request.telegram_id, {
          username: request.username,
          first_name: request.first_name,
        });
        phase = 'user_resolved';
        personality = await this.deps.store.resolvePersonality(request.telegram_id, request.personality_name);
        phase = 'personality_resolved';
      }

      const posts = await fetchPosts(this.deps.reddit, {
        subreddit: request.subreddit,
        sort: request.sort,
        time_filter: request.time_filter,
        limit: request.limit,
      });
      phase = 'items_fetched';

      const results = personality ? await this.enhancePosts(posts, personality) : posts;

      return {
        response: {
          task_id,
          status: 'completed',
          message: `Successfully scraped ${results.length} posts from r/${request.subreddit}`,
          telegram_id: request.telegram_id,
          results,
        },
      };
    } catch (err) {
      this.deps.log?.warn({ err, task_id, phase, subreddit: request.subreddit }, 'Scrape request failed');
      return {
        response: {
          task_id,
          status: 'failed',
          message: errorMessage(err),
          telegram_id: request.telegram_id,
          results: null,
        },
        error: err,
      };
    }
  }

  async enhanceTitles(request: EnhanceTitlesRequest): Promise<EnhancedTitle[]> {
    const rewrites = await this.deps.rewriter.rewriteAll(
      request.titles.map((entry) => entry.title),
      {
        template: instructionTemplate(request.prompt),
        temperature: request.temperature ?? DEFAULT_TEMPERATURE,
        maxTokens: request.max_tokens ?? DEFAULT_MAX_TOKENS,
        personality: 'custom',
      },
    );

    return request.titles.map((entry, idx) => ({
      ...entry,
      ...rewriteFields(rewrites[idx]),
    }));
  }

  private async enhancePosts(posts: RedditPost[], personality: Personality): Promise<AIEnhancedPost[]> {
    const rewrites = await this.deps.rewriter.rewriteAll(
      posts.map((post) => post.title),
      {
        template: personality.prompt_template,
        temperature: personality.temperature,
        maxTokens: personality.max_tokens,
        personality: personality.name,
      },
    );

    return posts.map((post, idx) => ({
      ...post,
      ...rewriteFields(rewrites[idx]),
      personality_used: rewrites[idx].personality,
    }));
  }
}

function rewriteFields(result: RewriteResult): { original_title: string; ai_title: string; ai_error?: string } {
  return {
    original_title: result.original,
    ai_title: result.rewritten,
    ...(result.error ? { ai_error: result.error } : {}),
  };
}

/**
 * Free-text instructions (e.g. "make them more clickbait") carry no
 * placeholder; wrap them so the title still reaches the model.
 */
export function instructionTemplate(prompt: string): string {
  if (prompt.includes(TITLE_PLACEHOLDER)) return prompt;
  return `${prompt.trim()}\n\nRewrite this Reddit post title accordingly and reply with the new title only:\n\n${TITLE_PLACEHOLDER}`;
}
