/**
 * UserPreferences Repository Implementation
 *
 * One row per registered user holding the reminder frequency, the batch
 * size and the reminder schedule the dispatcher scans, along with the
 * inactivity bookkeeping that pauses reminders and the token of an open
 * overdue-cards prompt.
 */

import { and, asc, eq, gte, lte } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { userPreferences } from '../schema';
import type { UserPreferences } from '@/core/models';
import { NotFoundError, withStore } from '@/core/errors';
import type { Repository } from './base';

/**
 * Input type for registering a user (or resetting a registered one).
 */
export interface CreateUserPreferencesInput {
  owner: string;
  chatId: string;
  remindersPerDay: number;
  cardsPerSession: number;
  nextReminderAt: Date;
  createdAt: Date;
}

/**
 * What the dispatcher stores after delivering a reminder.
 */
export interface RecordReminderInput {
  sentAt: Date;
  nextReminderAt: Date;
  missedReminders: number;
  /** Token of the overdue prompt the reminder carried, or null */
  overdueToken: string | null;
}

/**
 * Settings a user can change from the settings screen.
 */
export interface UpdateUserPreferencesInput {
  remindersPerDay?: number;
  cardsPerSession?: number;
  /** Rescheduled alongside a frequency change */
  nextReminderAt?: Date;
}

function mapToDomain(row: typeof userPreferences.$inferSelect): UserPreferences {
  return {
    owner: row.owner,
    chatId: row.chatId,
    remindersPerDay: row.remindersPerDay,
    cardsPerSession: row.cardsPerSession,
    lastReminderAt: row.lastReminderAt,
    nextReminderAt: row.nextReminderAt,
    missedReminders: row.missedReminders,
    remindersPaused: row.remindersPaused,
    lastActiveAt: row.lastActiveAt,
    createdAt: row.createdAt,
  };
}

/**
 * Repository for UserPreferences data access operations.
 *
 * @example
 * ```typescript
 * const repo = new UserPreferencesRepository(db);
 * const due = await repo.findDueForReminder(new Date());
 * ```
 */
export class UserPreferencesRepository
  implements Repository<UserPreferences, string, CreateUserPreferencesInput>
{
  constructor(private readonly db: AppDatabase) {}

  /**
   * @param owner - Preferences are keyed by their owner
   */
  async findById(owner: string): Promise<UserPreferences | null> {
    return withStore('load preferences', async () => {
      const result = await this.db
        .select()
        .from(userPreferences)
        .where(eq(userPreferences.owner, owner))
        .limit(1);
      return result.length === 0 ? null : mapToDomain(result[0]);
    });
  }

  /**
   * Every registered user, oldest registration first.
   */
  async findAll(): Promise<UserPreferences[]> {
    return withStore('list users', async () => {
      const results = await this.db
        .select()
        .from(userPreferences)
        .orderBy(asc(userPreferences.createdAt), asc(userPreferences.owner));
      return results.map(mapToDomain);
    });
  }

  /**
   * Unpaused users whose next reminder is at or before `now`, earliest first.
   */
  async findDueForReminder(now: Date): Promise<UserPreferences[]> {
    return withStore('load due reminders', async () => {
      const results = await this.db
        .select()
        .from(userPreferences)
        .where(
          and(lte(userPreferences.nextReminderAt, now), eq(userPreferences.remindersPaused, false))
        )
        .orderBy(asc(userPreferences.nextReminderAt), asc(userPreferences.owner));
      return results.map(mapToDomain);
    });
  }

  /**
   * Registers the user. A registered user is reset to the given values,
   * their reminder history is cleared and paused reminders resume.
   */
  async create(input: CreateUserPreferencesInput): Promise<UserPreferences> {
    return withStore('save preferences', async () => {
      const result = await this.db
        .insert(userPreferences)
        .values({ ...input, lastReminderAt: null, lastActiveAt: input.createdAt })
        .onConflictDoUpdate({
          target: userPreferences.owner,
          set: {
            chatId: input.chatId,
            remindersPerDay: input.remindersPerDay,
            cardsPerSession: input.cardsPerSession,
            nextReminderAt: input.nextReminderAt,
            lastReminderAt: null,
            missedReminders: 0,
            remindersPaused: false,
            lastActiveAt: input.createdAt,
            overdueToken: null,
            overduePromptAt: null,
          },
        })
        .returning();
      return mapToDomain(result[0]);
    });
  }

  /**
   * @throws {NotFoundError} If the user never ran /start
   */
  async update(owner: string, input: UpdateUserPreferencesInput): Promise<UserPreferences> {
    return withStore('update preferences', async () => {
      const result = await this.db
        .update(userPreferences)
        .set(input)
        .where(eq(userPreferences.owner, owner))
        .returning();
      if (result.length === 0) {
        throw new NotFoundError('Send /start first to set up your account');
      }
      return mapToDomain(result[0]);
    });
  }

  /**
   * Stores the outcome of a successful reminder send. The overdue token
   * of the reminder replaces any earlier one; null closes the old prompt.
   */
  async recordReminder(owner: string, reminder: RecordReminderInput): Promise<void> {
    await withStore('record reminder', () =>
      this.db
        .update(userPreferences)
        .set({
          lastReminderAt: reminder.sentAt,
          nextReminderAt: reminder.nextReminderAt,
          missedReminders: reminder.missedReminders,
          overdueToken: reminder.overdueToken,
          overduePromptAt: reminder.overdueToken === null ? null : reminder.sentAt,
        })
        .where(eq(userPreferences.owner, owner))
        .run()
    );
  }

  /**
   * Stops reminders until the user is active again.
   */
  async pauseReminders(owner: string, missedReminders: number): Promise<void> {
    await withStore('pause reminders', () =>
      this.db
        .update(userPreferences)
        .set({ remindersPaused: true, missedReminders, overdueToken: null, overduePromptAt: null })
        .where(eq(userPreferences.owner, owner))
        .run()
    );
  }

  /**
   * Notes that the user did something: resets the missed count and
   * resumes paused reminders.
   *
   * @returns true if reminders were paused until now
   */
  async recordActivity(owner: string, now: Date): Promise<boolean> {
    return withStore('record activity', () =>
      this.db.transaction((tx) => {
        const current = tx
          .select({ paused: userPreferences.remindersPaused })
          .from(userPreferences)
          .where(eq(userPreferences.owner, owner))
          .get();
        if (!current) {
          return false;
        }
        tx.update(userPreferences)
          .set({ lastActiveAt: now, missedReminders: 0, remindersPaused: false })
          .where(eq(userPreferences.owner, owner))
          .run();
        return current.paused;
      })
    );
  }

  /**
   * Closes the owner's overdue prompt if `token` is its token and it was
   * sent at or after `notBefore`. Only one caller can win.
   */
  async claimOverduePrompt(owner: string, token: string, notBefore: Date): Promise<boolean> {
    return withStore('claim overdue prompt', () => {
      const result = this.db
        .update(userPreferences)
        .set({ overdueToken: null, overduePromptAt: null })
        .where(
          and(
            eq(userPreferences.owner, owner),
            eq(userPreferences.overdueToken, token),
            gte(userPreferences.overduePromptAt, notBefore)
          )
        )
        .run();
      return result.changes > 0;
    });
  }

  async delete(owner: string): Promise<boolean> {
    return withStore('delete preferences', () => {
      const result = this.db
        .delete(userPreferences)
        .where(eq(userPreferences.owner, owner))
        .run();
      return result.changes > 0;
    });
  }
}
