import { describe, it, expect } from 'vitest';
import type { Card, QuizSession, UserPreferences } from '@/core/models';
import {
  renderPair,
  renderQuizQuestion,
  renderQuizReveal,
  renderReminder,
  renderReviewComplete,
  renderReviewPrompt,
  renderSettingsAdjust,
  renderSnoozed,
  renderSettingsHome,
  renderWelcome,
} from './messages';

const T0 = new Date('2024-03-01T08:00:00.000Z');

function card(id: number, front: string, back: string): Card {
  return {
    id,
    owner: 'u1',
    front,
    back,
    easeFactor: 2.5,
    intervalDays: 0,
    repetitions: 0,
    dueAt: T0,
    lastReviewedAt: null,
  };
}

const preferences: UserPreferences = {
  owner: 'u1',
  chatId: 'c1',
  remindersPerDay: 3,
  cardsPerSession: 1,
  lastReminderAt: null,
  nextReminderAt: T0,
  missedReminders: 0,
  remindersPaused: false,
  lastActiveAt: T0,
  createdAt: T0,
};

describe('renderReminder', () => {
  it('puts one pair per line with the translation as a spoiler', () => {
    const message = renderReminder([card(1, 'der Apfel', 'the apple.'), card(2, 'Haus', 'house')]);
    expect(message.text).toBe('der Apfel  ||the apple\\.||\nHaus  ||house||');
    expect(message.options).toEqual({ format: 'markdown' });
  });
});

describe('renderPair', () => {
  it('escapes both sides', () => {
    expect(renderPair(card(1, 'a-b', 'c!')).text).toBe('a\\-b  ||c\\!||');
  });
});

describe('renderReviewPrompt', () => {
  it('shows the position, the card and four grade buttons', () => {
    const message = renderReviewPrompt({ card: card(4, 'Haus', 'house'), position: 0, total: 3 });

    expect(message.text).toBe('*Card 1 of 3*\n\nHaus → ||house||');
    expect(message.options.buttons).toEqual([
      [
        { text: 'Again', data: 'r:0' },
        { text: 'Hard', data: 'r:3' },
        { text: 'Good', data: 'r:4' },
        { text: 'Easy', data: 'r:5' },
      ],
    ]);
  });
});

describe('renderReviewComplete', () => {
  it('pluralizes', () => {
    expect(renderReviewComplete(1).text).toBe(
      'Review complete: 1 card done. See you at the next reminder!'
    );
    expect(renderReviewComplete(3).text).toBe(
      'Review complete: 3 cards done. See you at the next reminder!'
    );
  });
});

describe('quiz messages', () => {
  const quiz: QuizSession = {
    token: 'tok1',
    owner: 'u1',
    cardId: 1,
    prompt: 'Katze',
    correctAnswer: 'cat',
    direction: 'front_to_back',
    createdAt: T0,
    expiresAt: T0,
    revealed: false,
  };

  it('asks the question with a reveal button', () => {
    const message = renderQuizQuestion(quiz);
    expect(message.text).toBe('Translate: *Katze*');
    expect(message.options.buttons).toEqual([[{ text: 'Show answer', data: 'q:tok1' }]]);
  });

  it('words reverse questions differently', () => {
    expect(renderQuizQuestion({ ...quiz, direction: 'back_to_front', prompt: 'cat' }).text).toBe(
      'Translate back: *cat*'
    );
  });

  it('shows the answer', () => {
    const message = renderQuizReveal({
      prompt: 'Katze',
      answer: 'cat',
      direction: 'front_to_back',
      cardId: 1,
    });
    expect(message.text).toBe('Katze → _cat_');
  });
});

describe('settings screens', () => {
  it('renders the overview', () => {
    const message = renderSettingsHome(preferences);
    expect(message.text).toBe('Settings\n- Cards per session: 1\n- Reminders per day: 3');
    expect(message.options).toEqual({
      format: 'plain',
      buttons: [
        [
          { text: 'Cards', data: 's:cards' },
          { text: 'Reminders', data: 's:freq' },
        ],
        [{ text: 'Close', data: 's:close' }],
      ],
    });
  });

  it('renders the adjust screen with presets', () => {
    const message = renderSettingsAdjust('freq', preferences);
    expect(message.text).toBe('Reminders per day\nCurrent value: 3');
    expect(message.options.buttons).toEqual([
      [
        { text: '-1', data: 's:freq:-1' },
        { text: '+1', data: 's:freq:+1' },
      ],
      [
        { text: '1', data: 's:freq:set:1' },
        { text: '2', data: 's:freq:set:2' },
        { text: '3', data: 's:freq:set:3' },
        { text: '6', data: 's:freq:set:6' },
      ],
      [{ text: 'Back', data: 's:home' }],
    ]);
  });
});

describe('renderWelcome', () => {
  it('states the current settings', () => {
    const firstLine = renderWelcome(preferences).text.split('\n')[0];
    expect(firstLine).toBe(
      'Welcome! I will remind you of your vocabulary 3 times a day, 1 card at a time.'
    );
  });
});

describe('renderSnoozed', () => {
  it('names the span in days', () => {
    expect(renderSnoozed(1, 1).text).toBe('Snoozed 1 card for a day.');
    expect(renderSnoozed(4, 7).text).toBe('Snoozed 4 cards for 7 days.');
  });
});
