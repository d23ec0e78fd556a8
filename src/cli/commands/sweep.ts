/**
 * CLI Sweep Command
 *
 * Runs each background task once: expired quiz tokens and idle review
 * sessions are removed, and due reminders are sent.
 */

import type { AppContext } from '@/context';
import { green } from '../utils/terminal';

export interface SweepCommandOptions {
  /** Also run the reminder tick */
  reminders: boolean;
}

export async function runSweepCommand(
  context: AppContext,
  options: SweepCommandOptions
): Promise<void> {
  const now = context.clock();

  const quizzes = await context.quizzes.sweep(now);
  console.log(green(`Removed ${quizzes} expired quiz question(s).`));

  const reviews = await context.reviews.sweepIdle(now);
  console.log(green(`Removed ${reviews} idle review session(s).`));

  if (options.reminders) {
    const summary = await context.reminders.tick(now);
    console.log(
      green(
        `Reminders: ${summary.sent} sent, ${summary.skipped} skipped, ` +
          `${summary.paused} paused, ${summary.failed} failed.`
      )
    );
  }
}
