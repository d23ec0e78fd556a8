/**
 * Reminder Dispatcher
 *
 * One `tick` sends a batch of cards to every user whose next reminder is
 * due, then schedules the following reminder `24h / remindersPerDay`
 * after the actual send. Because the next slot is computed from the send
 * time, a user who missed several slots (process down, slow tick) gets a
 * single message, not a burst of catch-up reminders.
 *
 * Users with an empty deck are skipped and keep their schedule. A failure
 * for one user (store or delivery) is logged and leaves that user's
 * schedule untouched so the next tick retries; the tick carries on with
 * the remaining users.
 *
 * Two things change what a due user receives:
 * - A reminder sent while the previous one went unanswered counts as
 *   missed. Once `pauseAfterMisses` are missed in a row, the user gets a
 *   pause notice instead and no reminders until `recordActivity`.
 * - When more cards are overdue than fit in one session, the reminder
 *   carries an overdue prompt whose buttons start a review or snooze the
 *   whole backlog. The prompt is valid for a day and for one press.
 */

import type { Logger } from '../logger';
import type { UserPreferences } from '../models';
import { NotFoundError } from '../errors';
import { generateQuizToken } from '../quiz';
import { DAY_MS, type SchedulingEngine } from '../scheduling';
import type { MessagingGateway } from '@/gateway';
import type { OverdueAction } from '@/bot/callback-data';
import { renderOverduePrompt, renderReminder, renderRemindersPaused } from '@/bot/messages';
import type { UserPreferencesRepository } from '@/storage/repositories/user-preferences.repository';

/** How long the buttons of an overdue prompt stay usable. */
export const OVERDUE_PROMPT_TTL_MS = DAY_MS;

const SNOOZE_DAYS: Record<Exclude<OverdueAction, 'catch'>, number> = {
  snooze1d: 1,
  snooze1w: 7,
};

export interface ReminderDispatcherOptions {
  preferences: UserPreferencesRepository;
  scheduling: SchedulingEngine;
  gateway: MessagingGateway;
  logger: Logger;
  /** Missed reminders in a row that pause reminders */
  pauseAfterMisses: number;
  /** Produces overdue prompt tokens */
  generateToken?: () => string;
}

/**
 * Counts from one tick.
 */
export interface ReminderTickSummary {
  /** Users whose reminder was due */
  due: number;
  sent: number;
  /** Due users without any cards */
  skipped: number;
  /** Users paused by this tick */
  paused: number;
  failed: number;
}

/**
 * What pressing an overdue prompt button amounts to.
 */
export type OverdueOutcome =
  | { action: 'catch' }
  | { action: 'snooze'; cards: number; days: number; until: Date };

/**
 * Next reminder instant for a user who was just reminded at `sentAt`.
 */
export function nextReminderAt(sentAt: Date, remindersPerDay: number): Date {
  return new Date(sentAt.getTime() + Math.round(DAY_MS / remindersPerDay));
}

/**
 * Missed reminders in a row, counting the one about to be sent. The
 * previous reminder counts as missed when the user has not been active
 * since it went out.
 */
export function missedReminders(user: UserPreferences): number {
  if (user.lastReminderAt === null) {
    return user.missedReminders;
  }
  if (user.lastActiveAt === null || user.lastActiveAt.getTime() < user.lastReminderAt.getTime()) {
    return user.missedReminders + 1;
  }
  return 0;
}

export class ReminderDispatcher {
  private readonly generateToken: () => string;

  constructor(private readonly options: ReminderDispatcherOptions) {
    this.generateToken = options.generateToken ?? generateQuizToken;
  }

  /**
   * Sends every due reminder. Never throws for a single user's failure.
   */
  async tick(now: Date): Promise<ReminderTickSummary> {
    const { preferences, logger } = this.options;
    const summary: ReminderTickSummary = { due: 0, sent: 0, skipped: 0, paused: 0, failed: 0 };

    const dueUsers = await preferences.findDueForReminder(now);
    summary.due = dueUsers.length;

    for (const user of dueUsers) {
      try {
        const outcome = await this.remind(user, now);
        summary[outcome]++;
      } catch (error) {
        summary.failed++;
        logger.error(`[reminders] Reminder for ${user.owner} failed:`, error);
      }
    }

    if (summary.due > 0) {
      logger.log(
        `[reminders] Tick: ${summary.sent} sent, ${summary.skipped} skipped, ` +
          `${summary.paused} paused, ${summary.failed} failed`
      );
    }
    return summary;
  }

  /**
   * Notes activity by `owner`. Resets the missed count and resumes paused
   * reminders; unregistered owners are ignored.
   *
   * @returns true if reminders had been paused
   */
  async recordActivity(owner: string, now: Date): Promise<boolean> {
    const resumed = await this.options.preferences.recordActivity(owner, now);
    if (resumed) {
      this.options.logger.log(`[reminders] Resumed reminders for ${owner}`);
    }
    return resumed;
  }

  /**
   * Handles a press on an overdue prompt button. The prompt closes on the
   * first valid press.
   *
   * @throws {NotFoundError} If the token is not the owner's open prompt,
   *   or the prompt is older than a day
   */
  async resolveOverdue(
    owner: string,
    token: string,
    action: OverdueAction,
    now: Date
  ): Promise<OverdueOutcome> {
    const { preferences, scheduling } = this.options;

    const notBefore = new Date(now.getTime() - OVERDUE_PROMPT_TTL_MS);
    if (!(await preferences.claimOverduePrompt(owner, token, notBefore))) {
      throw new NotFoundError('This prompt is no longer active.');
    }

    if (action === 'catch') {
      return { action: 'catch' };
    }

    const days = SNOOZE_DAYS[action];
    const until = new Date(now.getTime() + days * DAY_MS);
    const cards = await scheduling.postponeDue(owner, now, until);
    return { action: 'snooze', cards, days, until };
  }

  private async remind(user: UserPreferences, now: Date): Promise<'sent' | 'skipped' | 'paused'> {
    const { preferences, scheduling, gateway, logger, pauseAfterMisses } = this.options;

    const missed = missedReminders(user);
    if (missed >= pauseAfterMisses) {
      await preferences.pauseReminders(user.owner, missed);
      logger.log(`[reminders] Paused reminders for ${user.owner} after ${missed} missed`);
      const notice = renderRemindersPaused();
      await gateway.send(user.chatId, notice.text, notice.options);
      return 'paused';
    }

    const cards = await scheduling.dueSet(user.owner, now, user.cardsPerSession);
    if (cards.length === 0) {
      return 'skipped';
    }

    const overdue = await scheduling.countDue(user.owner, now);
    const overdueToken = overdue > user.cardsPerSession ? this.generateToken() : null;
    const message =
      overdueToken === null ? renderReminder(cards) : renderOverduePrompt(cards, overdue, overdueToken);

    await gateway.send(user.chatId, message.text, message.options);
    await preferences.recordReminder(user.owner, {
      sentAt: now,
      nextReminderAt: nextReminderAt(now, user.remindersPerDay),
      missedReminders: missed,
      overdueToken,
    });
    return 'sent';
  }
}
