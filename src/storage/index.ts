/**
 * Storage Module - Barrel Export
 *
 * Public API of the storage layer: the connection factory, the table
 * definitions and the repositories.
 *
 * Usage:
 *   import { createDatabase, CardRepository } from '@/storage';
 *   const { db } = createDatabase(':memory:');
 *   const cards = new CardRepository(db);
 */

export { createDatabase } from './db';
export type { AppDatabase, DatabaseHandle } from './db';
export { runMigrations, MIGRATIONS } from './migrations';
export type { Migration } from './migrations';

export { cards, reviewSessions, quizSessions, userPreferences, feedback } from './schema';

export * from './repositories';
