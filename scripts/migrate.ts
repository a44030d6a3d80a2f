#!/usr/bin/env tsx

import { config } from 'dotenv';
import { loadConfig } from '../src/config.js';
import { runMigrations } from '../src/db/migrate.js';
import { createSqlClient } from '../src/services/postgres-store.js';
import { Logger } from '../lib/logger.js';

// Load environment variables
config();

async function migrate(): Promise<void> {
  const appConfig = loadConfig();
  const logger = Logger.forScript(appConfig, 'migrate');
  const sql = createSqlClient(appConfig);

  try {
    const applied = await runMigrations(sql, appConfig.MIGRATIONS_DIR, logger);
    logger.info('Migrations complete', { applied: applied.length });
  } finally {
    await sql.end({ timeout: 5 });
  }
}

migrate().catch((error: unknown) => {
  console.error('❌ Migration failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
