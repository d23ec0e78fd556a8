/**
 * Schema Migrations
 *
 * Versioned DDL applied in order on startup. Applied versions are recorded
 * in a `migrations` table, so running the migrator repeatedly only applies
 * what is new. Each migration runs inside a transaction.
 *
 * The tables here must match the Drizzle definitions in `schema.ts`.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up: string[];
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: [
      `CREATE TABLE IF NOT EXISTS cards (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        owner TEXT NOT NULL,
        front TEXT NOT NULL,
        back TEXT NOT NULL,
        ease_factor REAL NOT NULL DEFAULT 2.5 CHECK (ease_factor >= 1.3),
        interval_days INTEGER NOT NULL DEFAULT 0 CHECK (interval_days >= 0),
        repetitions INTEGER NOT NULL DEFAULT 0 CHECK (repetitions >= 0),
        due_at INTEGER NOT NULL,
        last_reviewed_at INTEGER,
        created_at INTEGER NOT NULL
      )`,
      `CREATE UNIQUE INDEX IF NOT EXISTS cards_owner_front_idx ON cards (owner, front)`,
      `CREATE INDEX IF NOT EXISTS cards_owner_due_idx ON cards (owner, due_at)`,

      `CREATE TABLE IF NOT EXISTS review_sessions (
        owner TEXT PRIMARY KEY,
        queue TEXT NOT NULL,
        position INTEGER NOT NULL DEFAULT 0,
        state TEXT NOT NULL DEFAULT 'in_progress' CHECK (state IN ('in_progress', 'awaiting_answer')),
        started_at INTEGER NOT NULL,
        last_activity_at INTEGER NOT NULL,
        version INTEGER NOT NULL DEFAULT 0
      )`,

      `CREATE TABLE IF NOT EXISTS quiz_sessions (
        token TEXT PRIMARY KEY,
        owner TEXT NOT NULL,
        card_id INTEGER NOT NULL REFERENCES cards(id) ON DELETE CASCADE,
        prompt TEXT NOT NULL,
        correct_answer TEXT NOT NULL,
        direction TEXT NOT NULL CHECK (direction IN ('front_to_back', 'back_to_front')),
        created_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL,
        revealed INTEGER NOT NULL DEFAULT 0
      )`,
      `CREATE INDEX IF NOT EXISTS quiz_sessions_owner_idx ON quiz_sessions (owner)`,
      `CREATE INDEX IF NOT EXISTS quiz_sessions_expires_at_idx ON quiz_sessions (expires_at)`,

      `CREATE TABLE IF NOT EXISTS user_preferences (
        owner TEXT PRIMARY KEY,
        chat_id TEXT NOT NULL,
        reminders_per_day INTEGER NOT NULL CHECK (reminders_per_day >= 1),
        cards_per_session INTEGER NOT NULL CHECK (cards_per_session >= 1),
        last_reminder_at INTEGER,
        next_reminder_at INTEGER NOT NULL,
        created_at INTEGER NOT NULL
      )`,
      `CREATE INDEX IF NOT EXISTS user_preferences_next_reminder_idx ON user_preferences (next_reminder_at)`,

      `CREATE TABLE IF NOT EXISTS feedback (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        owner TEXT NOT NULL,
        text TEXT NOT NULL,
        created_at INTEGER NOT NULL
      )`,
    ],
  },
  {
    version: 2,
    name: 'reminder_pause_and_overdue_prompt',
    up: [
      `ALTER TABLE user_preferences ADD COLUMN missed_reminders INTEGER NOT NULL DEFAULT 0`,
      `ALTER TABLE user_preferences ADD COLUMN reminders_paused INTEGER NOT NULL DEFAULT 0`,
      `ALTER TABLE user_preferences ADD COLUMN last_active_at INTEGER`,
      `ALTER TABLE user_preferences ADD COLUMN overdue_token TEXT`,
      `ALTER TABLE user_preferences ADD COLUMN overdue_prompt_at INTEGER`,
    ],
  },
];

/**
 * Applies every migration newer than the recorded schema version.
 *
 * @param sqlite - Raw better-sqlite3 connection
 * @returns Versions applied by this call (empty when already up to date)
 */
export function runMigrations(sqlite: Database.Database): number[] {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `);

  const row = sqlite
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM migrations')
    .get();
  const current = row?.version ?? 0;

  const applied: number[] = [];
  const record = sqlite.prepare<[number, string, number]>(
    'INSERT INTO migrations (version, name, applied_at) VALUES (?, ?, ?)'
  );

  for (const migration of MIGRATIONS) {
    if (migration.version <= current) {
      continue;
    }
    const apply = sqlite.transaction(() => {
      for (const statement of migration.up) {
        sqlite.exec(statement);
      }
      record.run(migration.version, migration.name, Date.now());
    });
    apply();
    applied.push(migration.version);
  }

  return applied;
}
