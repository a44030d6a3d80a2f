import { config as loadDotenv } from 'dotenv';
import { serve } from '@hono/node-server';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { createApp } from './app.js';
import { runMigrations } from './db/migrate.js';
import { createPostgresStore, createSqlClient } from './services/postgres-store.js';
import { Logger } from '../lib/logger.js';

// =================================================================================
// Server Entry Point
// =================================================================================

loadDotenv();

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const logger = new Logger(config, { type: 'startup' });

  const sql = createSqlClient(config);

  if (config.RUN_MIGRATIONS) {
    const applied = await runMigrations(sql, config.MIGRATIONS_DIR, logger);
    if (applied.length > 0) {
      logger.info('Migrations complete', { applied });
    }
  }

  const store = createPostgresStore(sql);
  const app = createApp({ config, store });

  const server = serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST }, (info) => {
    logger.info('Book Catalog API listening', { address: info.address, port: info.port });
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Failed to close document store', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('Startup failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
