/**
 * Settings Service
 *
 * Registration (/start) and the two user-adjustable settings:
 * reminders per day (1..12) and cards per session (1..20). Stepping past
 * a bound leaves the value at the bound; setting an out-of-range value is
 * a ValidationError.
 *
 * Changing the reminder frequency reschedules the next reminder one new
 * interval after the last reminder (or after now, for a user who has not
 * been reminded yet).
 */

import type { UserPreferences } from '../models';
import { CARDS_PER_SESSION_RANGE, REMINDERS_PER_DAY_RANGE } from '../models';
import { NotFoundError, ValidationError } from '../errors';
import { nextReminderAt } from '../reminders';
import type { UserPreferencesRepository } from '@/storage/repositories/user-preferences.repository';

export type SettingName = 'remindersPerDay' | 'cardsPerSession';

/** How a setting changes: a step of ±1 or an absolute value. */
export type SettingChange = { op: '+1' | '-1' } | { op: 'set'; value: number };

const RANGES: Record<SettingName, { min: number; max: number }> = {
  remindersPerDay: REMINDERS_PER_DAY_RANGE,
  cardsPerSession: CARDS_PER_SESSION_RANGE,
};

const LABELS: Record<SettingName, string> = {
  remindersPerDay: 'Reminders per day',
  cardsPerSession: 'Cards per session',
};

export interface SettingsServiceOptions {
  preferences: UserPreferencesRepository;
  defaults: { remindersPerDay: number; cardsPerSession: number };
}

export class SettingsService {
  constructor(private readonly options: SettingsServiceOptions) {}

  /**
   * Creates the user's preferences, or resets existing ones to the
   * defaults. The first reminder goes out one interval from now.
   */
  async register(owner: string, chatId: string, now: Date): Promise<UserPreferences> {
    const { remindersPerDay, cardsPerSession } = this.options.defaults;
    return this.options.preferences.create({
      owner,
      chatId,
      remindersPerDay,
      cardsPerSession,
      nextReminderAt: nextReminderAt(now, remindersPerDay),
      createdAt: now,
    });
  }

  /**
   * @throws {NotFoundError} If the user never ran /start
   */
  async get(owner: string): Promise<UserPreferences> {
    const preferences = await this.options.preferences.findById(owner);
    if (!preferences) {
      throw new NotFoundError('Send /start first to set up your account');
    }
    return preferences;
  }

  /**
   * Applies a change to one setting.
   *
   * @throws {ValidationError} If a set value is out of range
   * @throws {NotFoundError} If the user never ran /start
   */
  async change(
    owner: string,
    setting: SettingName,
    change: SettingChange,
    now: Date
  ): Promise<UserPreferences> {
    const current = await this.get(owner);
    const { min, max } = RANGES[setting];

    let value: number;
    if (change.op === 'set') {
      if (!Number.isInteger(change.value) || change.value < min || change.value > max) {
        throw new ValidationError(`${LABELS[setting]} must be between ${min} and ${max}`);
      }
      value = change.value;
    } else {
      const step = change.op === '+1' ? 1 : -1;
      value = Math.min(max, Math.max(min, current[setting] + step));
    }

    if (value === current[setting]) {
      return current;
    }

    if (setting === 'remindersPerDay') {
      return this.options.preferences.update(owner, {
        remindersPerDay: value,
        nextReminderAt: nextReminderAt(current.lastReminderAt ?? now, value),
      });
    }
    return this.options.preferences.update(owner, { cardsPerSession: value });
  }
}
