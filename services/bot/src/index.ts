import { createBot } from './bot';
import { ScraperApiClient } from './clients/scraperApi';
import { WorkflowWebhookClient } from './clients/workflowWebhook';
import { config } from './config';
import { ChatController } from './controller';
import { logger } from './logger';
import { RedisRateLimiter } from './ratelimit';
import { closeRedis, getRedis } from './redis/client';
import { RedisSessionStore } from './session/redisSessionStore';

/**
 * Main entrypoint for the Telegram front end.
 * Wires the scraper API client, optional workflow webhook and Redis-backed state, then long-polls Telegram.
 */
async function main() {
  if (!config.telegramToken) {
    logger.error('TELEGRAM_BOT_TOKEN not set!');
    process.exit(1);
  }

  const redis = getRedis();
  const limiter = new RedisRateLimiter(redis);

  const controller = new ChatController({
    api: new ScraperApiClient({ baseUrl: config.scraper.baseUrl, apiKey: config.scraper.apiKey }),
    webhook: config.webhook.url
      ? new WorkflowWebhookClient({ url: config.webhook.url, timeoutMs: config.webhook.timeoutMs })
      : undefined,
    sessions: new RedisSessionStore(redis, config.sessionTtlSeconds),
    limiter,
    log: logger,
    allowedUsers: config.access.allowedUsers,
    accessContact: config.access.contact,
    scrapesPerMinute: config.rateLimits.scrapesPerMinute,
  });

  const bot = createBot({
    token: config.telegramToken,
    controller,
    limiter,
    log: logger,
    sendsPerSecond: config.rateLimits.sendsPerSecond,
  });

  if (!config.webhook.url) {
    logger.info('N8N_WEBHOOK_URL not set; rewrites go straight to the scraper API');
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info({ signal }, 'Stopping bot');
      bot.stop().then(
        () => closeRedis(),
        (err: unknown) => logger.error({ err }, 'Bot stop failed'),
      ).catch((err: unknown) => logger.error({ err }, 'Redis close failed'));
    });
  }

  logger.info('Starting bot...');
  await bot.start({
    onStart: (info) => logger.info({ username: info.username }, 'Bot is polling for updates'),
  });
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  logger.fatal({ err }, 'Fatal error starting bot');
  process.exit(1);
});
