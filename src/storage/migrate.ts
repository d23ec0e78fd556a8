/**
 * Database Migration Runner for Vocab Reminder
 *
 * Applies pending schema migrations to the configured SQLite database and
 * lists the resulting tables.
 *
 * Usage:
 *   npm run db:migrate                           # Uses DATABASE_PATH or the default
 *   DATABASE_PATH=/path/to/db npm run db:migrate
 *
 * Migrations are tracked in the `migrations` table, so running this
 * script multiple times is safe.
 */

import 'dotenv/config';
import Database from 'better-sqlite3';
import { loadConfig } from '../config';
import { runMigrations } from './migrations';

const config = loadConfig(process.env);
const dbPath = config.database.path;

console.log(`[migrate] Database path: ${dbPath}`);

const sqlite = new Database(dbPath);
sqlite.pragma('foreign_keys = ON');

try {
  const applied = runMigrations(sqlite);
  console.log(
    applied.length > 0
      ? `[migrate] Applied migrations: ${applied.join(', ')}`
      : '[migrate] Schema already up to date.'
  );

  const tables = sqlite
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all();

  console.log('[migrate] Tables in database:');
  for (const table of tables) {
    console.log(`  - ${table.name}`);
  }
} catch (error) {
  console.error('[migrate] Migration failed:', error);
  process.exitCode = 1;
} finally {
  sqlite.close();
}
