/**
 * Database Schema Definitions for Vocab Reminder
 *
 * Drizzle ORM schema definitions for SQLite. The tables mirror the domain
 * models in `src/core/models`:
 * - Cards: vocabulary pairs with SM-2 review state
 * - Review Sessions: at most one active review walk-through per owner
 * - Quiz Sessions: token-addressed single questions with an absolute expiry
 * - User Preferences: reminder frequency, batch size and reminder schedule
 * - Feedback: free-form messages forwarded to the admins
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 * The matching DDL lives in `migrations.ts`; keep both in sync.
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  uniqueIndex,
} from 'drizzle-orm/sqlite-core';

/**
 * Cards Table
 *
 * One row per vocabulary pair. `(owner, front)` is unique so re-importing
 * a file updates backs instead of duplicating cards.
 */
export const cards = sqliteTable(
  'cards',
  {
    // Auto-incremented id; ascending ids break due-date ties
    id: integer('id').primaryKey({ autoIncrement: true }),

    // User who owns the card
    owner: text('owner').notNull(),

    front: text('front').notNull(),
    back: text('back').notNull(),

    // SM-2 multiplier, never below 1.3
    easeFactor: real('ease_factor').notNull().default(2.5),

    // Days until the next review after the last one
    intervalDays: integer('interval_days').notNull().default(0),

    // Consecutive correct answers since the last lapse
    repetitions: integer('repetitions').notNull().default(0),

    dueAt: integer('due_at', { mode: 'timestamp_ms' }).notNull(),
    lastReviewedAt: integer('last_reviewed_at', { mode: 'timestamp_ms' }),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    uniqueIndex('cards_owner_front_idx').on(table.owner, table.front),
    index('cards_owner_due_idx').on(table.owner, table.dueAt),
  ]
);

/**
 * Review Sessions Table
 *
 * Keyed by owner, which enforces "at most one session per owner" at the
 * store level. `version` is bumped on every update and checked in the
 * WHERE clause (compare-and-set).
 */
export const reviewSessions = sqliteTable('review_sessions', {
  owner: text('owner').primaryKey(),

  // Ordered card ids to review; stored as a JSON array
  queue: text('queue', { mode: 'json' }).$type<number[]>().notNull(),

  position: integer('position').notNull().default(0),

  state: text('state', { enum: ['in_progress', 'awaiting_answer'] })
    .notNull()
    .default('in_progress'),

  startedAt: integer('started_at', { mode: 'timestamp_ms' }).notNull(),
  lastActivityAt: integer('last_activity_at', { mode: 'timestamp_ms' }).notNull(),

  version: integer('version').notNull().default(0),
});

/**
 * Quiz Sessions Table
 *
 * One row per issued quiz question. Rows are inert once `revealed` is set
 * or `expires_at` has passed, and are removed by the quiz sweeper.
 */
export const quizSessions = sqliteTable(
  'quiz_sessions',
  {
    token: text('token').primaryKey(),
    owner: text('owner').notNull(),

    // Deleting a card removes the questions built from it
    cardId: integer('card_id')
      .notNull()
      .references(() => cards.id, { onDelete: 'cascade' }),

    prompt: text('prompt').notNull(),
    correctAnswer: text('correct_answer').notNull(),

    direction: text('direction', { enum: ['front_to_back', 'back_to_front'] }).notNull(),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    expiresAt: integer('expires_at', { mode: 'timestamp_ms' }).notNull(),

    revealed: integer('revealed', { mode: 'boolean' }).notNull().default(false),
  },
  (table) => [
    index('quiz_sessions_owner_idx').on(table.owner),
    index('quiz_sessions_expires_at_idx').on(table.expiresAt),
  ]
);

/**
 * User Preferences Table
 *
 * Created by /start. The reminder dispatcher scans it for unpaused rows
 * whose `next_reminder_at` has passed. `overdue_token` is set while an
 * overdue-cards prompt with snooze buttons is open.
 */
export const userPreferences = sqliteTable(
  'user_preferences',
  {
    owner: text('owner').primaryKey(),
    chatId: text('chat_id').notNull(),
    remindersPerDay: integer('reminders_per_day').notNull(),
    cardsPerSession: integer('cards_per_session').notNull(),
    lastReminderAt: integer('last_reminder_at', { mode: 'timestamp_ms' }),
    nextReminderAt: integer('next_reminder_at', { mode: 'timestamp_ms' }).notNull(),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    missedReminders: integer('missed_reminders').notNull().default(0),
    remindersPaused: integer('reminders_paused', { mode: 'boolean' }).notNull().default(false),
    lastActiveAt: integer('last_active_at', { mode: 'timestamp_ms' }),
    overdueToken: text('overdue_token'),
    overduePromptAt: integer('overdue_prompt_at', { mode: 'timestamp_ms' }),
  },
  (table) => [index('user_preferences_next_reminder_idx').on(table.nextReminderAt)]
);

/**
 * Feedback Table
 *
 * Keeps a copy of every /feedback message forwarded to the admins.
 */
export const feedback = sqliteTable('feedback', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  owner: text('owner').notNull(),
  text: text('text').notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Type exports for use throughout the storage layer
 */
export type CardRow = typeof cards.$inferSelect;
export type NewCardRow = typeof cards.$inferInsert;

export type ReviewSessionRow = typeof reviewSessions.$inferSelect;
export type NewReviewSessionRow = typeof reviewSessions.$inferInsert;

export type QuizSessionRow = typeof quizSessions.$inferSelect;
export type NewQuizSessionRow = typeof quizSessions.$inferInsert;

export type UserPreferencesRow = typeof userPreferences.$inferSelect;
export type NewUserPreferencesRow = typeof userPreferences.$inferInsert;

export type FeedbackRow = typeof feedback.$inferSelect;
