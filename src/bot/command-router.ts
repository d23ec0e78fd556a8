/**
 * Command Router
 *
 * Turns incoming updates into calls on the core services and sends the
 * replies through the messaging gateway.
 *
 * Commands are matched exactly and case-sensitively (`/feedback` takes the
 * rest of the message as its text); a `@botname` suffix is ignored. Other
 * text gets the help message. Button presses are parsed once into a
 * CallbackAction and dispatched on its `kind`. Every update first counts
 * as activity for the reminder dispatcher, which resumes paused reminders.
 *
 * A /review while a session is running re-sends the card it waits on,
 * with an extra button that cancels the session.
 *
 * Errors become replies:
 * - NotFoundError / NoCardsError, ConflictError, ValidationError: their message
 * - ForbiddenError: its message, which for quiz reveals matches the
 *   NotFoundError text
 * - StoreError: a "try again" notice
 * - DeliveryError: logged only, since the chat cannot be reached
 * - anything else: logged, with a generic apology to the user
 */

import {
  AppError,
  ConflictError,
  DeliveryError,
  ForbiddenError,
  NotFoundError,
  StoreError,
  ValidationError,
} from '@/core/errors';
import type { Logger } from '@/core/logger';
import type { UserPreferences } from '@/core/models';
import type { Clock } from '@/core/tasks';
import type { QuizSessionManager } from '@/core/quiz';
import type { ReminderDispatcher } from '@/core/reminders';
import type { ReviewSessionManager } from '@/core/review';
import type { SettingsService } from '@/core/settings';
import type { FeedbackService } from '@/core/feedback';
import type { VocabularyService, RejectedRow } from '@/core/vocabulary';
import type { MessagingGateway } from '@/gateway';
import { parseCallbackData, type CallbackAction, type SettingsAction } from './callback-data';
import {
  renderHelp,
  renderPair,
  renderQuizQuestion,
  renderQuizReveal,
  renderReviewBlocked,
  renderReviewCancelled,
  renderReviewComplete,
  renderReviewPrompt,
  renderSettingsAdjust,
  renderSettingsClosed,
  renderSettingsHome,
  renderSnoozed,
  renderWelcome,
  type RenderedMessage,
} from './messages';
import type { CallbackUpdate, DocumentUpdate, IncomingUpdate, MessageUpdate } from './types';

export const COMMANDS = [
  '/start',
  '/review',
  '/game',
  '/getpair',
  '/settings',
  '/export',
  '/clear',
  '/feedback',
] as const;

export type Command = (typeof COMMANDS)[number];

/** Parsed command with the text following it. */
export interface ParsedCommand {
  command: Command;
  args: string;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Extracts a known command from message text, or null.
 *
 * @example
 * ```typescript
 * parseCommand('/feedback great bot'); // { command: '/feedback', args: 'great bot' }
 * parseCommand('/Start');              // null
 * ```
 */
export function parseCommand(text: string): ParsedCommand | null {
  const match = /^(\/[a-z]+)(?:@\w+)?(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match || !isCommand(match[1])) {
    return null;
  }
  const args = (match[2] ?? '').trim();
  // Only /feedback takes arguments
  if (args !== '' && match[1] !== '/feedback') {
    return null;
  }
  return { command: match[1], args };
}

const MAX_REJECTED_ECHO = 10;

function formatRejected(rows: RejectedRow[]): string {
  const lines = rows
    .slice(0, MAX_REJECTED_ECHO)
    .map((row) => `line ${row.line}: ${row.content} (${row.reason})`);
  if (rows.length > MAX_REJECTED_ECHO) {
    lines.push(`... and ${rows.length - MAX_REJECTED_ECHO} more`);
  }
  return lines.join('\n');
}

export interface CommandRouterOptions {
  reviews: ReviewSessionManager;
  quizzes: QuizSessionManager;
  vocabulary: VocabularyService;
  settings: SettingsService;
  feedback: FeedbackService;
  reminders: ReminderDispatcher;
  gateway: MessagingGateway;
  logger: Logger;
  clock?: Clock;
}

export class CommandRouter {
  private readonly clock: Clock;

  constructor(private readonly options: CommandRouterOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Handles one update and sends the replies.
   *
   * @returns true when the update was a known command, button or upload
   */
  async handle(update: IncomingUpdate): Promise<boolean> {
    try {
      await this.options.reminders.recordActivity(update.owner, this.clock());
      switch (update.type) {
        case 'message':
          return await this.handleMessage(update);
        case 'callback':
          return await this.handleCallback(update);
        case 'document':
          return await this.handleDocument(update);
      }
    } catch (error) {
      await this.reportError(update.chatId, error);
      return true;
    }
  }

  private async reply(chatId: string, message: RenderedMessage): Promise<void> {
    await this.options.gateway.send(chatId, message.text, message.options);
  }

  private async replyText(chatId: string, text: string): Promise<void> {
    await this.options.gateway.send(chatId, text, { format: 'plain' });
  }

  private async handleMessage(update: MessageUpdate): Promise<boolean> {
    const { owner, chatId } = update;
    const parsed = parseCommand(update.text);
    if (!parsed) {
      await this.reply(chatId, renderHelp());
      return false;
    }

    const now = this.clock();
    const { quizzes, vocabulary, settings, feedback } = this.options;

    switch (parsed.command) {
      case '/start': {
        const preferences = await settings.register(owner, chatId, now);
        await this.reply(chatId, renderWelcome(preferences));
        break;
      }
      case '/review': {
        await this.startReview(owner, chatId, now);
        break;
      }
      case '/game': {
        await this.reply(chatId, renderQuizQuestion(await quizzes.issue(owner, now)));
        break;
      }
      case '/getpair': {
        await this.reply(chatId, renderPair(await vocabulary.randomPair(owner)));
        break;
      }
      case '/settings': {
        await this.reply(chatId, renderSettingsHome(await settings.get(owner)));
        break;
      }
      case '/export': {
        const file = await vocabulary.exportCsv(owner, now);
        await this.options.gateway.send(chatId, `Your vocabulary: ${file.count} cards.`, {
          format: 'plain',
          file: { name: file.fileName, mimeType: 'text/csv', content: file.content },
        });
        break;
      }
      case '/clear': {
        const result = await vocabulary.clear(owner);
        await this.replyText(chatId, `Deleted ${result.cards} cards. Your deck is empty now.`);
        break;
      }
      case '/feedback': {
        await feedback.submit(owner, parsed.args, now);
        await this.replyText(chatId, 'Thanks for your feedback!');
        break;
      }
    }
    return true;
  }

  private async handleCallback(update: CallbackUpdate): Promise<boolean> {
    const action: CallbackAction = parseCallbackData(update.data);
    const { owner, chatId } = update;
    const now = this.clock();

    switch (action.kind) {
      case 'settings':
        await this.handleSettings(owner, chatId, action, now);
        break;

      case 'quiz-reveal': {
        const reveal = await this.options.quizzes.reveal(action.token, owner, now);
        await this.reply(chatId, renderQuizReveal(reveal));
        break;
      }

      case 'review-cancel': {
        if (!(await this.options.reviews.cancel(owner))) {
          throw new NotFoundError('No review session is running. Send /review to start one.');
        }
        await this.reply(chatId, renderReviewCancelled());
        break;
      }

      case 'overdue': {
        const outcome = await this.options.reminders.resolveOverdue(
          owner,
          action.token,
          action.action,
          now
        );
        if (outcome.action === 'catch') {
          await this.startReview(owner, chatId, now);
        } else {
          await this.reply(chatId, renderSnoozed(outcome.cards, outcome.days));
        }
        break;
      }

      case 'review-grade': {
        const { reviews } = this.options;
        const result = await reviews.submitAnswer(owner, action.quality, now);
        if (result.state === 'complete') {
          await this.reply(chatId, renderReviewComplete(result.total));
        } else {
          await this.reply(chatId, renderReviewPrompt(await reviews.nextPrompt(owner, now)));
        }
        break;
      }
    }
    return true;
  }

  private async startReview(owner: string, chatId: string, now: Date): Promise<void> {
    const { reviews } = this.options;
    try {
      await reviews.start(owner, now);
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }
      await this.resumeReview(owner, chatId, error, now);
      return;
    }
    await this.reply(chatId, renderReviewPrompt(await reviews.nextPrompt(owner, now)));
  }

  /**
   * Answers a refused /review with the running session's current card.
   */
  private async resumeReview(
    owner: string,
    chatId: string,
    conflict: ConflictError,
    now: Date
  ): Promise<void> {
    const { reviews } = this.options;

    const status = await reviews.status(owner, now);
    if (status?.state === 'in_progress') {
      const prompt = await reviews.nextPrompt(owner, now);
      await this.reply(chatId, renderReviewPrompt(prompt, { cancellable: true }));
      return;
    }

    const prompt = await reviews.currentPrompt(owner, now);
    await this.reply(
      chatId,
      prompt ? renderReviewPrompt(prompt, { cancellable: true }) : renderReviewBlocked(conflict.message)
    );
  }

  private async handleSettings(
    owner: string,
    chatId: string,
    action: SettingsAction,
    now: Date
  ): Promise<void> {
    const { settings } = this.options;

    if (action.screen === 'close') {
      await this.reply(chatId, renderSettingsClosed());
      return;
    }
    if (action.screen === 'home') {
      await this.reply(chatId, renderSettingsHome(await settings.get(owner)));
      return;
    }

    const setting = action.screen === 'cards' ? 'cardsPerSession' : 'remindersPerDay';
    let preferences: UserPreferences;
    if (action.op === undefined) {
      preferences = await settings.get(owner);
    } else if (action.op === 'set') {
      preferences = await settings.change(owner, setting, { op: 'set', value: action.value }, now);
    } else {
      preferences = await settings.change(owner, setting, { op: action.op }, now);
    }
    await this.reply(chatId, renderSettingsAdjust(action.screen, preferences));
  }

  private async handleDocument(update: DocumentUpdate): Promise<boolean> {
    if (!update.fileName.toLowerCase().endsWith('.csv')) {
      throw new ValidationError('The uploaded file is not a CSV. Please upload a .csv file.');
    }

    const result = await this.options.vocabulary.importCsv(
      update.owner,
      update.content,
      this.clock()
    );

    let text = `Imported ${result.created} new and ${result.updated} updated pairs.`;
    if (result.rejected.length > 0) {
      text += `\nSkipped ${result.rejected.length} rows:\n${formatRejected(result.rejected)}`;
    }
    await this.replyText(update.chatId, text);
    return true;
  }

  private async reportError(chatId: string, error: unknown): Promise<void> {
    const { logger } = this.options;

    if (error instanceof DeliveryError) {
      logger.error('[bot] Reply could not be delivered:', error);
      return;
    }

    let text: string;
    if (error instanceof StoreError) {
      logger.error('[bot] Store failure:', error);
      text = 'Something went wrong on our side. Please try again in a moment.';
    } else if (error instanceof ValidationError) {
      text = error.message;
      const rejected = rejectedRowsOf(error);
      if (rejected.length > 0) {
        text += `\n${formatRejected(rejected)}`;
      }
    } else if (
      error instanceof NotFoundError ||
      error instanceof ConflictError ||
      error instanceof ForbiddenError
    ) {
      text = error.message;
    } else {
      logger.error('[bot] Unexpected error:', error);
      text = 'Something went wrong. Please try again.';
    }

    try {
      await this.replyText(chatId, text);
    } catch (sendError) {
      logger.error('[bot] Error reply could not be delivered:', sendError);
    }
  }
}

function isRejectedRow(value: unknown): value is RejectedRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    'line' in value &&
    typeof value.line === 'number' &&
    'content' in value &&
    typeof value.content === 'string' &&
    'reason' in value &&
    typeof value.reason === 'string'
  );
}

function rejectedRowsOf(error: AppError): RejectedRow[] {
  const details = error.details;
  if (typeof details !== 'object' || details === null || !('rejected' in details)) {
    return [];
  }
  const rows = details.rejected;
  return Array.isArray(rows) ? rows.filter(isRejectedRow) : [];
}
