// =================================================================================
// SQL Migrations - applies migrations/*.sql once each, in file name order
// =================================================================================

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Sql } from 'postgres';
import type { Logger } from '../env.js';

export interface MigrationFile {
  name: string;
  sql: string;
}

interface AppliedRow {
  name: string;
}

/**
 * Load every .sql file in the directory, sorted by name
 */
export async function readMigrations(dir: string): Promise<MigrationFile[]> {
  const entries = await readdir(dir);
  const names = entries.filter((name) => name.endsWith('.sql')).sort();

  return Promise.all(
    names.map(async (name) => ({
      name,
      sql: await readFile(path.join(dir, name), 'utf8'),
    }))
  );
}

/**
 * Apply pending migrations, each inside its own transaction.
 *
 * @returns Names of the migrations applied by this call
 */
export async function runMigrations(sql: Sql, dir: string, logger: Logger): Promise<string[]> {
  const migrations = await readMigrations(path.resolve(dir));

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name       text PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `);

  const applied = await sql<AppliedRow[]>`SELECT name FROM schema_migrations`;
  const done = new Set(applied.map((row) => row.name));
  const pending = migrations.filter((migration) => !done.has(migration.name));

  if (pending.length === 0) {
    logger.debug('No pending migrations', { total: migrations.length });
    return [];
  }

  for (const migration of pending) {
    const start = Date.now();
    await sql.begin(async (tx) => {
      await tx.unsafe(migration.sql);
      await tx.unsafe('INSERT INTO schema_migrations (name) VALUES ($1)', [migration.name]);
    });
    logger.info('Migration applied', { migration: migration.name, duration_ms: Date.now() - start });
  }

  return pending.map((migration) => migration.name);
}
