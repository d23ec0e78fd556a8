/**
 * Database Connection Factory for Vocab Reminder
 *
 * Opens an SQLite database through better-sqlite3, enables foreign key
 * enforcement, applies pending migrations and wraps the connection with
 * Drizzle ORM.
 *
 * No default instance is exported. The application context creates the
 * database once at startup and hands it to every repository.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *   const { db, sqlite } = createDatabase('/var/data/vocab.db');
 *   const testDb = createDatabase(':memory:'); // in-memory for tests
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import { runMigrations } from './migrations';

/**
 * Creates the Drizzle ORM instance for a raw connection.
 * Split out so the inferred type can be named below.
 */
function wrap(sqlite: Database.Database) {
  return drizzle(sqlite, { schema });
}

/**
 * Type alias for the Drizzle database instance.
 *
 * @example
 * function countCards(database: AppDatabase) {
 *   return database.select().from(cards).all().length;
 * }
 */
export type AppDatabase = ReturnType<typeof wrap>;

/**
 * A Drizzle instance together with the raw connection it wraps.
 * The raw handle is needed to close the database on shutdown.
 */
export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database.Database;
}

/**
 * Opens (or creates) the database at `dbPath` and brings its schema up to date.
 *
 * This factory function:
 * 1. Creates the parent directory of a file database if it is missing
 * 2. Opens the SQLite database with WAL journaling for file databases
 * 3. Enables foreign key constraint enforcement (disabled by default in SQLite)
 * 4. Applies pending migrations
 * 5. Wraps the connection with Drizzle ORM for type-safe queries
 *
 * @param dbPath - Path to the SQLite file, or ':memory:' for an in-memory database
 */
export function createDatabase(dbPath: string = 'vocab-reminder.db'): DatabaseHandle {
  const inMemory = dbPath === ':memory:';
  if (!inMemory) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  if (!inMemory) {
    sqlite.pragma('journal_mode = WAL');
  }

  // Needed for quiz_sessions -> cards ON DELETE CASCADE
  sqlite.pragma('foreign_keys = ON');

  runMigrations(sqlite);

  return { db: wrap(sqlite), sqlite };
}
