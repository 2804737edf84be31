import Fastify from 'fastify';
import type { FastifyServerOptions } from 'fastify';
import { requireApiKey } from './auth';
import { config } from './config';
import { ScrapeHandler } from './handler/scrapeHandler';
import { RedditApiClient } from './reddit/client';
import type { RedditClient } from './reddit/client';
import { getRedis } from './redis/client';
import { RewriteEngine } from './rewrite/engine';
import type { FallbackPolicy } from './rewrite/engine';
import { getCompletionProvider } from './rewrite';
import type { CompletionProvider } from './rewrite/provider';
import { registerPersonalityRoutes } from './routes/personalities';
import { registerScrapeRoutes } from './routes/scrape';
import { getPersonalityStore } from './store';
import type { PersonalityStore } from './store/personalityStore';

export const SERVICE_NAME = 'reddit-scraper-api';
export const SERVICE_VERSION = '1.0.0';
export const HEALTH_TIMEOUT_MS = 2000;

export interface AppDeps {
  reddit: RedditClient;
  store: PersonalityStore;
  completion: CompletionProvider;
  apiKey: string;
  fallback: FallbackPolicy;
  concurrency: number;
  /** Backing-store liveness probe for /api/health; omitted means always healthy. */
  ping?: () => Promise<unknown>;
  /** A ping slower than this reports `degraded`. */
  healthTimeoutMs: number;
}

export interface BuildAppOptions {
  deps?: Partial<AppDeps>;
  logger?: FastifyServerOptions['logger'];
}

function resolveDeps(overrides: Partial<AppDeps> = {}): AppDeps {
  const usesRedis = config.storeBackend === 'redis';
  return {
    reddit: overrides.reddit ?? new RedditApiClient(config.reddit),
    store: overrides.store ?? getPersonalityStore(),
    completion: overrides.completion ?? getCompletionProvider(),
    apiKey: overrides.apiKey ?? config.apiKey,
    fallback: overrides.fallback ?? config.rewrite.fallback,
    concurrency: overrides.concurrency ?? config.rewrite.concurrency,
    healthTimeoutMs: overrides.healthTimeoutMs ?? HEALTH_TIMEOUT_MS,
    ping: 'ping' in overrides ? overrides.ping : usesRedis ? () => getRedis().ping() : undefined,
  };
}

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(label)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export async function buildApp(options: BuildAppOptions = {}) {
  const deps = resolveDeps(options.deps);
  const app = Fastify({ logger: options.logger ?? false });

  const rewriter = new RewriteEngine({
    provider: deps.completion,
    fallback: deps.fallback,
    concurrency: deps.concurrency,
    onFailure: (original, err) => app.log.warn({ err, original }, 'Title rewrite failed; using fallback'),
  });
  const handler = new ScrapeHandler({ reddit: deps.reddit, store: deps.store, rewriter, log: app.log });

  app.get('/', async () => ({
    message: 'Reddit Scraper API',
    description: 'Scrapes Reddit posts and rewrites their titles with per-user AI personalities',
    endpoints: {
      health: '/api/health',
      scrape: '/api/scrape',
      scrape_simple: '/api/scrape-simple',
      enhance_titles: '/api/enhance-titles',
      personalities: '/api/personalities',
      personality: '/api/personality',
      personality_delete: '/api/personality/delete',
    },
  }));

  app.get('/api/health', async () => {
    try {
      if (deps.ping) await withTimeout(deps.ping(), deps.healthTimeoutMs, 'redis_ping_timeout');
      return { status: 'healthy', service: SERVICE_NAME, version: SERVICE_VERSION };
    } catch (err) {
      app.log.error({ err }, 'Redis health check failed');
      return { status: 'degraded', service: SERVICE_NAME, version: SERVICE_VERSION };
    }
  });

  // everything else under /api needs the service key
  await app.register(async (api) => {
    api.addHook('preHandler', requireApiKey(deps.apiKey));
    await registerScrapeRoutes(api, handler);
    await registerPersonalityRoutes(api, deps.store);
  });

  return app;
}
