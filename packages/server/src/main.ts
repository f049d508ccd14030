import { JsonLogger } from '@callgate/core';
import { createSQLiteStores } from '@callgate/store-sqlite';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { startServer } from './server/standalone.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new JsonLogger({
    level: config.logLevel,
    fields: { service: config.appName, version: config.appVersion },
  });

  const stores = createSQLiteStores({ database: config.databasePath });
  logger.info('database ready', { path: config.databasePath });

  const app = createApp(config, { users: stores.users, logger });
  logger.info('rate limiting configured', {
    enabled: config.rateLimitEnabled,
    requests_per_second: config.rateLimitRequestsPerSec,
    burst_size: config.rateLimitBurstSize,
    strategy: config.rateLimitStrategy,
  });

  const running = await startServer({
    handler: app.gateway,
    host: config.httpHost,
    port: config.httpPort,
    logger,
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info('shutting down', { signal });
    running
      .close()
      .then(() => stores.close())
      .then(
        () => {
          logger.info('server stopped');
          process.exit(0);
        },
        (err: unknown) => {
          logger.error('shutdown failed', { error: err });
          process.exit(1);
        },
      );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  new JsonLogger().error('failed to start server', { error: err });
  process.exit(1);
});
