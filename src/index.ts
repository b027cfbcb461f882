import { loadConfig } from './config/index.js';
import { initSentry } from './instrument.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  // Load and validate config (fails fast if invalid)
  const config = loadConfig();

  initSentry(config.sentry?.dsn, config.sentry?.environment ?? config.env, config.sentry?.tracesSampleRate);

  const server = await createServer({ config });

  try {
    const address = await server.listen({
      host: config.server.host,
      port: config.server.port,
    });
    server.log.info({ backend: server.chainProvider.backend }, `Server listening at ${address}`);
  } catch (err) {
    server.log.error(err, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown: closes the backend connections through onClose
  const shutdown = (signal: string): void => {
    server.log.info(`Received ${signal}, shutting down...`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        server.log.error(err, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
