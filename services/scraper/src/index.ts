import { config } from './config';
import { closeRedis } from './redis/client';
import { buildApp } from './server';

/**
 * Main entrypoint for the scraper API.
 * Builds the Fastify app with real Reddit/OpenAI/Redis dependencies and listens on configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: true });

  if (!config.apiKey) {
    app.log.warn('API_KEY is not set; /api routes accept unauthenticated requests');
  }
  if (!config.openai.apiKey) {
    app.log.warn('OPENAI_API_KEY is not set; every rewrite will fall back to the original title');
  }

  app.addHook('onClose', async () => {
    await closeRedis();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Scraper API listening on http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting scraper API:', err);
  process.exit(1);
});
