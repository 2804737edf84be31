import 'dotenv/config';
import type { FallbackPolicy } from './rewrite/engine';

const DEFAULT_CHAT_MODEL = 'gpt-4o-mini';

export type StoreBackend = 'redis' | 'memory';

function parseStoreBackend(value: string | undefined): StoreBackend {
  return value === 'memory' ? 'memory' : 'redis';
}

function parseFallbackPolicy(value: string | undefined): FallbackPolicy {
  return value === 'original+marker' ? 'original+marker' : 'original';
}

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '0.0.0.0',
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  // commands fail after this many reconnect attempts instead of queueing forever
  redisMaxRetriesPerRequest: parseInt(process.env.REDIS_MAX_RETRIES || '2', 10),
  // empty disables the x-api-key check
  apiKey: process.env.API_KEY || '',
  storeBackend: parseStoreBackend(process.env.STORE_BACKEND),
  reddit: {
    clientId: process.env.REDDIT_CLIENT_ID || '',
    clientSecret: process.env.REDDIT_CLIENT_SECRET || '',
    userAgent: process.env.REDDIT_USER_AGENT || 'RedditScraper/1.0',
  },
  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    model: process.env.OPENAI_MODEL || DEFAULT_CHAT_MODEL,
    timeoutMs: parseInt(process.env.OPENAI_TIMEOUT_MS || '30000', 10),
  },
  rewrite: {
    fallback: parseFallbackPolicy(process.env.REWRITE_FALLBACK),
    concurrency: Math.max(1, parseInt(process.env.REWRITE_CONCURRENCY || '4', 10) || 1),
  },
};
