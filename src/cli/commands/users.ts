/**
 * CLI Users Command
 *
 * Lists every registered user with their settings, card count and the time
 * of the next reminder (or `paused`).
 */

import type { CardRepository, UserPreferencesRepository } from '@/storage';
import { formatTable, yellow } from '../utils/terminal';

export async function runUsersCommand(
  preferences: UserPreferencesRepository,
  cards: CardRepository
): Promise<void> {
  const users = await preferences.findAll();
  if (users.length === 0) {
    console.log(yellow('No users registered yet.'));
    return;
  }

  const rows: string[][] = [];
  for (const user of users) {
    rows.push([
      user.owner,
      String(await cards.countByOwner(user.owner)),
      String(user.remindersPerDay),
      String(user.cardsPerSession),
      user.remindersPaused ? 'paused' : user.nextReminderAt.toISOString(),
    ]);
  }

  console.log(formatTable(['owner', 'cards', 'reminders/day', 'cards/session', 'next reminder'], rows));
}
