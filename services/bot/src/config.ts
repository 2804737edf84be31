import 'dotenv/config';

function parseList(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export const config = {
  telegramToken: process.env.TELEGRAM_BOT_TOKEN || '',
  logLevel: process.env.LOG_LEVEL || 'info',
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  // commands fail after this many reconnect attempts instead of queueing forever
  redisMaxRetriesPerRequest: parseInt(process.env.REDIS_MAX_RETRIES || '2', 10),
  scraper: {
    baseUrl: process.env.SCRAPER_API_URL || 'http://localhost:8080',
    apiKey: process.env.SCRAPER_API_KEY || '',
  },
  webhook: {
    // unset means rewrites go straight to the scraper API
    url: process.env.N8N_WEBHOOK_URL || '',
    timeoutMs: parseInt(process.env.WEBHOOK_TIMEOUT_MS || '180000', 10),
  },
  access: {
    // empty allows everyone
    allowedUsers: parseList(process.env.ALLOWED_USERS),
    contact: process.env.ACCESS_CONTACT || 'the bot owner',
  },
  sessionTtlSeconds: parseInt(process.env.SESSION_TTL_SECONDS || '900', 10),
  rateLimits: {
    scrapesPerMinute: parseInt(process.env.SCRAPE_LIMIT_PER_MINUTE || '5', 10),
    sendsPerSecond: parseInt(process.env.SEND_LIMIT_PER_SECOND || '25', 10),
  },
};
