import { ScraperApiError } from './clients/scraperApi';
import type { ScrapedPost, ScraperApiClient } from './clients/scraperApi';
import type { WorkflowWebhookClient } from './clients/workflowWebhook';
import type { Logger } from './logger';
import * as messages from './messages';
import type { RateLimiter } from './ratelimit';
import { sessionKey } from './session/sessionStore';
import type { PendingScrape, SessionStore } from './session/sessionStore';

export const MAX_LIMIT = 50;
export const SKIP_TOKEN = 'skip';

/** Who sent an update, independent of the chat transport. */
export interface ChatRequest {
  userId: number;
  chatId: number;
  username?: string;
  firstName?: string;
}

export type Reply = (text: string) => Promise<void>;

export interface ChatControllerDeps {
  api: Pick<ScraperApiClient, 'scrape' | 'enhanceTitles'>;
  webhook?: Pick<WorkflowWebhookClient, 'send'>;
  sessions: SessionStore;
  limiter: RateLimiter;
  log: Logger;
  allowedUsers: string[];
  accessContact: string;
  scrapesPerMinute: number;
  now?: () => Date;
}

/**
 * Command and follow-up handling for the chat front end. A `/scrape` parks
 * the fetched batch in the session; the next plain-text message from the
 * same user in the same chat decides what happens to it.
 */
export class ChatController {
  private readonly allowed: Set<string>;
  private readonly now: () => Date;

  constructor(private readonly deps: ChatControllerDeps) {
    this.allowed = new Set(deps.allowedUsers);
    this.now = deps.now ?? (() => new Date());
  }

  hasAccess(userId: number): boolean {
    return this.allowed.size === 0 || this.allowed.has(String(userId));
  }

  async start(_req: ChatRequest, reply: Reply): Promise<void> {
    await reply(messages.welcome());
  }

  async help(_req: ChatRequest, reply: Reply): Promise<void> {
    await reply(messages.help());
  }

  async scrape(req: ChatRequest, args: string[], reply: Reply): Promise<void> {
    if (!this.hasAccess(req.userId)) {
      await reply(messages.accessDenied(this.deps.accessContact));
      return;
    }
    if (args.length < 4) {
      await reply(messages.usage());
      return;
    }

    const [subreddit, limitArg, sortArg, timeArg] = args;
    if (!/^\d+$/.test(limitArg) || Number(limitArg) < 1) {
      await reply(messages.invalidLimit());
      return;
    }
    const limit = Math.min(Number(limitArg), MAX_LIMIT);
    const sort = sortArg.toLowerCase();
    const timeFilter = timeArg.toLowerCase();

    const allowed = await this.deps.limiter.consume(`scrape:${req.userId}`, {
      windowSeconds: 60,
      max: this.deps.scrapesPerMinute,
    });
    if (!allowed.ok) {
      await reply(messages.rateLimited(allowed.retryAfterSeconds));
      return;
    }

    await reply(messages.scraping(subreddit, limit, sort));

    let posts: ScrapedPost[];
    try {
      posts = await this.deps.api.scrape({
        subreddit,
        limit,
        sort,
        timeFilter,
        telegramId: req.userId,
        username: req.username,
        firstName: req.firstName,
      });
    } catch (err) {
      this.deps.log.error({ err, subreddit, userId: req.userId }, 'Scrape error');
      const notFound = err instanceof ScraperApiError && err.status === 404;
      await reply(notFound ? messages.subredditNotFound(subreddit) : messages.scrapeError(subreddit));
      return;
    }

    if (posts.length === 0) {
      await reply(messages.noPosts(subreddit));
      return;
    }

    const pending: PendingScrape = {
      telegram_id: req.userId,
      chat_id: req.chatId,
      subreddit,
      posts,
      metadata: {
        sort_type: sort,
        time_filter: timeFilter,
        count: posts.length,
        timestamp: this.now().toISOString(),
      },
    };
    await this.deps.sessions.awaitInstruction(sessionKey(req.chatId, req.userId), pending);

    await reply(messages.preview(posts));
    await reply(messages.askInstructions());
  }

  /** Plain text outside a pending scrape is ignored. */
  async followUp(req: ChatRequest, text: string, reply: Reply): Promise<void> {
    const key = sessionKey(req.chatId, req.userId);
    const session = await this.deps.sessions.get(key);
    if (session.state !== 'awaiting_instruction') return;

    await this.deps.sessions.reset(key);

    const instruction = text.trim();
    const skip = instruction.toLowerCase() === SKIP_TOKEN;
    const { pending } = session;

    if (this.deps.webhook) {
      await this.forwardToWorkflow(this.deps.webhook, pending, skip ? null : instruction, reply);
      return;
    }

    if (skip) {
      for (const chunk of messages.originalTitles(pending.posts)) await reply(chunk);
      return;
    }

    await reply(messages.rewriting(pending.posts.length));
    try {
      const rewritten = await this.deps.api.enhanceTitles(pending.posts, instruction);
      for (const chunk of messages.rewrittenTitles(rewritten)) await reply(chunk);
    } catch (err) {
      this.deps.log.error({ err, userId: req.userId }, 'Title rewrite request failed');
      await reply(messages.rewriteError());
    }
  }

  private async forwardToWorkflow(
    webhook: Pick<WorkflowWebhookClient, 'send'>,
    pending: PendingScrape,
    instruction: string | null,
    reply: Reply,
  ): Promise<void> {
    const payload =
      instruction === null
        ? { ...pending, ai_processing: false }
        : { ...pending, ai_processing: true, ai_prompt: instruction };

    await reply(messages.sendingToWorkflow());
    try {
      const response = await webhook.send(payload);
      await reply(messages.workflowDone(response.message));
    } catch (err) {
      this.deps.log.error({ err, userId: pending.telegram_id }, 'Workflow webhook error');
      await reply(messages.workflowError());
    }
  }
}
