/**
 * Chat Message Rendering
 *
 * Builds the text and buttons of every message the bot sends. All card
 * text is escaped here; callers pass raw domain values.
 */

import type { Card, QuizSession, UserPreferences } from '@/core/models';
import type { QuizReveal } from '@/core/quiz';
import type { ReviewPrompt } from '@/core/review';
import { GRADE_ALIASES, GRADE_NAMES } from '@/core/scheduling';
import type { ButtonRows, SendOptions } from '@/gateway';
import { encodeCallbackData, type AdjustableScreen, type OverdueAction } from './callback-data';
import { bold, escapeMarkdown, italic, spoiler } from './markdown';

/** Text plus send options, ready for `MessagingGateway.send`. */
export interface RenderedMessage {
  text: string;
  options: SendOptions;
}

function markdown(text: string, buttons?: ButtonRows): RenderedMessage {
  return { text, options: buttons ? { format: 'markdown', buttons } : { format: 'markdown' } };
}

function plain(text: string, buttons?: ButtonRows): RenderedMessage {
  return { text, options: buttons ? { format: 'plain', buttons } : { format: 'plain' } };
}

/**
 * One `front  ||back||` line per card; the back stays hidden until tapped.
 */
export function renderReminder(cards: Card[]): RenderedMessage {
  return markdown(pairLines(cards));
}

function pairLines(cards: Card[]): string {
  return cards.map((card) => `${escapeMarkdown(card.front)}  ${spoiler(card.back)}`).join('\n');
}

function overdueButton(text: string, token: string, action: OverdueAction) {
  return { text, data: encodeCallbackData({ kind: 'overdue', token, action }) };
}

/**
 * A reminder for a user whose backlog is larger than one session, with
 * buttons to start catching up or to snooze the backlog.
 */
export function renderOverduePrompt(cards: Card[], overdue: number, token: string): RenderedMessage {
  const notice = escapeMarkdown(`${overdue} cards are overdue. Review them now or snooze them.`);

  return markdown(`${pairLines(cards)}\n\n${notice}`, [
    [overdueButton('Review now', token, 'catch')],
    [overdueButton('Snooze 1 day', token, 'snooze1d'), overdueButton('Snooze 1 week', token, 'snooze1w')],
  ]);
}

export function renderRemindersPaused(): RenderedMessage {
  return plain('Reminders are paused since you have not been around. Send me anything to resume them.');
}

export function renderSnoozed(cards: number, days: number): RenderedMessage {
  const span = days === 1 ? 'a day' : `${days} days`;
  return plain(`Snoozed ${cards} card${cards === 1 ? '' : 's'} for ${span}.`);
}

/**
 * A single random pair, as sent by /getpair.
 */
export function renderPair(card: Card): RenderedMessage {
  return markdown(`${escapeMarkdown(card.front)}  ${spoiler(card.back)}`);
}

const CANCEL_REVIEW_ROW = [{ text: 'Cancel review', data: encodeCallbackData({ kind: 'review-cancel' }) }];

/**
 * The current review card with the four grade buttons. A re-sent prompt
 * also gets a button to cancel the session.
 */
export function renderReviewPrompt(
  prompt: ReviewPrompt,
  options: { cancellable?: boolean } = {}
): RenderedMessage {
  const { card, position, total } = prompt;
  const text = [
    bold(`Card ${position + 1} of ${total}`),
    '',
    `${escapeMarkdown(card.front)} → ${spoiler(card.back)}`,
  ].join('\n');

  const row = GRADE_NAMES.map((name) => ({
    text: name.charAt(0).toUpperCase() + name.slice(1),
    data: encodeCallbackData({ kind: 'review-grade', quality: GRADE_ALIASES[name] }),
  }));

  return markdown(text, options.cancellable ? [row, CANCEL_REVIEW_ROW] : [row]);
}

/**
 * Refusal of a second /review when the running session has no card to
 * show again.
 */
export function renderReviewBlocked(reason: string): RenderedMessage {
  return plain(reason, [CANCEL_REVIEW_ROW]);
}

export function renderReviewCancelled(): RenderedMessage {
  return plain('Review cancelled. Send /review to start a new one.');
}

export function renderReviewComplete(total: number): RenderedMessage {
  return plain(`Review complete: ${total} card${total === 1 ? '' : 's'} done. See you at the next reminder!`);
}

/**
 * A quiz question with its reveal button.
 */
export function renderQuizQuestion(quiz: QuizSession): RenderedMessage {
  const hint = quiz.direction === 'front_to_back' ? 'Translate:' : 'Translate back:';
  return markdown(`${escapeMarkdown(hint)} ${bold(quiz.prompt)}`, [
    [{ text: 'Show answer', data: encodeCallbackData({ kind: 'quiz-reveal', token: quiz.token }) }],
  ]);
}

export function renderQuizReveal(reveal: QuizReveal): RenderedMessage {
  return markdown(`${escapeMarkdown(reveal.prompt)} → ${italic(reveal.answer)}`);
}

function settingsButton(text: string, screen: 'home' | 'cards' | 'freq' | 'close') {
  return { text, data: encodeCallbackData({ kind: 'settings', screen }) };
}

/**
 * The settings overview.
 */
export function renderSettingsHome(preferences: UserPreferences): RenderedMessage {
  const text = [
    'Settings',
    `- Cards per session: ${preferences.cardsPerSession}`,
    `- Reminders per day: ${preferences.remindersPerDay}`,
  ].join('\n');

  return plain(text, [
    [settingsButton('Cards', 'cards'), settingsButton('Reminders', 'freq')],
    [settingsButton('Close', 'close')],
  ]);
}

const ADJUST_LABELS: Record<AdjustableScreen, string> = {
  cards: 'Cards per session',
  freq: 'Reminders per day',
};

const PRESETS: Record<AdjustableScreen, number[]> = {
  cards: [1, 3, 5, 10],
  freq: [1, 2, 3, 6],
};

/**
 * The -1 / +1 / preset screen for one setting.
 */
export function renderSettingsAdjust(
  screen: AdjustableScreen,
  preferences: UserPreferences
): RenderedMessage {
  const current = screen === 'cards' ? preferences.cardsPerSession : preferences.remindersPerDay;
  const text = `${ADJUST_LABELS[screen]}\nCurrent value: ${current}`;

  return plain(text, [
    [
      { text: '-1', data: encodeCallbackData({ kind: 'settings', screen, op: '-1' }) },
      { text: '+1', data: encodeCallbackData({ kind: 'settings', screen, op: '+1' }) },
    ],
    PRESETS[screen].map((value) => ({
      text: String(value),
      data: encodeCallbackData({ kind: 'settings', screen, op: 'set', value }),
    })),
    [settingsButton('Back', 'home')],
  ]);
}

export function renderSettingsClosed(): RenderedMessage {
  return plain('Settings saved.');
}

export const HELP_TEXT = [
  'Commands:',
  '/start - set up your account',
  '/review - review your due cards',
  '/game - answer a quick quiz question',
  '/getpair - show a random pair',
  '/settings - reminder frequency and cards per session',
  '/export - download your vocabulary as CSV',
  '/clear - delete all your cards',
  '/feedback <text> - send a message to the maintainers',
  '',
  'Send a CSV file with two columns (word, translation) to add cards.',
].join('\n');

export function renderHelp(): RenderedMessage {
  return plain(HELP_TEXT);
}

export function renderWelcome(preferences: UserPreferences): RenderedMessage {
  return plain(
    [
      'Welcome! I will remind you of your vocabulary ' +
        `${preferences.remindersPerDay} time${preferences.remindersPerDay === 1 ? '' : 's'} a day, ` +
        `${preferences.cardsPerSession} card${preferences.cardsPerSession === 1 ? '' : 's'} at a time.`,
      '',
      HELP_TEXT,
    ].join('\n')
  );
}
