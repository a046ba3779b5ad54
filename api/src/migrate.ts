import fs from 'fs';
import path from 'path';
import { config } from './config.js';
import { pool, withTransaction } from './db.js';
import { logger } from './logger.js';

const log = logger.child({ component: 'migrate' });

async function ensureMigrationsTable() {
  await pool.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );`
  );
}

async function appliedVersions(): Promise<Set<string>> {
  const res = await pool.query<{ version: string }>('SELECT version FROM schema_migrations');
  return new Set(res.rows.map((r) => r.version));
}

async function applyMigration(version: string, sql: string) {
  await withTransaction(pool, async (client) => {
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations(version) VALUES ($1)', [version]);
  });
  log.info({ version }, 'Applied migration');
}

async function run() {
  await ensureMigrationsTable();
  const done = await appliedVersions();
  const files = fs
    .readdirSync(config.migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  for (const file of files) {
    if (done.has(file)) {
      continue;
    }
    const sql = fs.readFileSync(path.join(config.migrationsDir, file), 'utf8');
    await applyMigration(file, sql);
  }
  await pool.end();
}

run().catch((err: unknown) => {
  log.error({ err }, 'Migration failed');
  process.exit(1);
});
