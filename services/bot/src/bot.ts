import { Bot } from 'grammy';
import type { Context } from 'grammy';
import type { ChatController, ChatRequest, Reply } from './controller';
import type { Logger } from './logger';
import type { RateLimiter } from './ratelimit';

export interface BotDeps {
  token: string;
  controller: ChatController;
  limiter: RateLimiter;
  log: Logger;
  sendsPerSecond: number;
}

/** The parts of a grammy context the handlers read. */
export type ChatContext = Pick<Context, 'from' | 'chat' | 'reply'>;

export function toChatRequest(ctx: Pick<Context, 'from' | 'chat'>): ChatRequest | null {
  if (!ctx.from || !ctx.chat) return null;
  return {
    userId: ctx.from.id,
    chatId: ctx.chat.id,
    username: ctx.from.username,
    firstName: ctx.from.first_name,
  };
}

export function parseArgs(match: string): string[] {
  return match.split(/\s+/).filter(Boolean);
}

/**
 * Replies go through a global per-second counter. Sends over the limit are
 * dropped and logged, not queued.
 */
export function replier(ctx: Pick<Context, 'chat' | 'reply'>, deps: BotDeps): Reply {
  return async (text) => {
    const allowed = await deps.limiter.consume('send:global', { windowSeconds: 1, max: deps.sendsPerSecond });
    if (!allowed.ok) {
      deps.log.warn({ chatId: ctx.chat?.id }, 'Global send limit reached; dropping reply');
      return;
    }
    await ctx.reply(text, { parse_mode: 'HTML', link_preview_options: { is_disabled: true } });
  };
}

export async function handleText(ctx: ChatContext, text: string, deps: BotDeps): Promise<void> {
  // unknown commands are not instructions
  if (text.startsWith('/')) return;
  const req = toChatRequest(ctx);
  if (req) await deps.controller.followUp(req, text, replier(ctx, deps));
}

export function createBot(deps: BotDeps): Bot {
  const bot = new Bot(deps.token);
  const { controller } = deps;

  bot.command('start', async (ctx) => {
    const req = toChatRequest(ctx);
    if (req) await controller.start(req, replier(ctx, deps));
  });

  bot.command('help', async (ctx) => {
    const req = toChatRequest(ctx);
    if (req) await controller.help(req, replier(ctx, deps));
  });

  bot.command('scrape', async (ctx) => {
    const req = toChatRequest(ctx);
    if (req) await controller.scrape(req, parseArgs(ctx.match), replier(ctx, deps));
  });

  bot.on('message:text', (ctx) => handleText(ctx, ctx.message.text, deps));

  bot.catch((err) => {
    deps.log.error({ err: err.error, updateId: err.ctx.update.update_id }, 'Unhandled bot error');
  });

  return bot;
}
