/**
 * UserPreferences Domain Types
 *
 * Per-user settings controlling reminder frequency and batch size, plus the
 * reminder schedule the dispatcher maintains.
 */

/** Inclusive bounds accepted for reminders per day. */
export const REMINDERS_PER_DAY_RANGE = { min: 1, max: 12 } as const;

/** Inclusive bounds accepted for cards per session. */
export const CARDS_PER_SESSION_RANGE = { min: 1, max: 20 } as const;

/**
 * Settings and reminder schedule for one user.
 */
export interface UserPreferences {
  /** User identifier (same value cards and sessions use as `owner`) */
  owner: string;

  /** Chat the bot talks to this user in */
  chatId: string;

  /** How many reminders to send per 24 hours (>= 1) */
  remindersPerDay: number;

  /** How many cards a review session or reminder contains (>= 1) */
  cardsPerSession: number;

  /** When the last reminder was actually delivered, or null if never */
  lastReminderAt: Date | null;

  /** Earliest time the next reminder may be sent */
  nextReminderAt: Date;

  /** Reminders in a row sent without the user showing up in between */
  missedReminders: number;

  /** Set once `missedReminders` reaches the pause threshold; any activity clears it */
  remindersPaused: boolean;

  /** Last time the user sent a message or pressed a button */
  lastActiveAt: Date | null;

  /** When the user registered */
  createdAt: Date;
}

/**
 * Feedback a user sent with /feedback.
 */
export interface Feedback {
  id: number;
  owner: string;
  text: string;
  createdAt: Date;
}
