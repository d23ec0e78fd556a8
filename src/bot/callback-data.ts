/**
 * Inline Button Callback Data
 *
 * Button presses come back as short strings (at most 64 bytes). They are
 * parsed exactly once, here, into a tagged union; handlers only ever see
 * the union.
 *
 * | format                          | action                         |
 * |---------------------------------|--------------------------------|
 * | `s:<screen>`                    | open a settings screen         |
 * | `s:<screen>:+1` / `:-1`         | step a setting                 |
 * | `s:<screen>:set:<value>`        | set a setting to a preset      |
 * | `q:<token>`                     | reveal a quiz answer           |
 * | `r:<grade>`                     | grade the current review card  |
 * | `r:stop`                        | cancel the review session      |
 * | `o:<token>:<action>`            | answer an overdue-cards prompt |
 *
 * Screens are `home`, `cards` (cards per session), `freq` (reminders per
 * day) and `close`. Only `cards` and `freq` take an operation. Overdue
 * actions are `catch` (review now), `snooze1d` and `snooze1w`.
 */

import { ValidationError } from '@/core/errors';
import { parseGrade, type Quality } from '@/core/scheduling';

export const MAX_CALLBACK_DATA_BYTES = 64;

export type SettingsScreen = 'home' | 'cards' | 'freq' | 'close';
export type AdjustableScreen = 'cards' | 'freq';
export type SettingsOp = '+1' | '-1' | 'set';
export type OverdueAction = 'catch' | 'snooze1d' | 'snooze1w';

export type SettingsAction =
  | { kind: 'settings'; screen: SettingsScreen; op?: undefined; value?: undefined }
  | { kind: 'settings'; screen: AdjustableScreen; op: '+1' | '-1'; value?: undefined }
  | { kind: 'settings'; screen: AdjustableScreen; op: 'set'; value: number };

export type CallbackAction =
  | SettingsAction
  | { kind: 'quiz-reveal'; token: string }
  | { kind: 'review-grade'; quality: Quality }
  | { kind: 'review-cancel' }
  | { kind: 'overdue'; token: string; action: OverdueAction };

const TOKEN_PATTERN = /^[A-Za-z0-9_-]+$/;

function isScreen(value: string): value is SettingsScreen {
  return value === 'home' || value === 'cards' || value === 'freq' || value === 'close';
}

function isAdjustable(screen: SettingsScreen): screen is AdjustableScreen {
  return screen === 'cards' || screen === 'freq';
}

function isOverdueAction(value: string): value is OverdueAction {
  return value === 'catch' || value === 'snooze1d' || value === 'snooze1w';
}

function invalid(data: string): ValidationError {
  return new ValidationError('Unrecognized button', { data });
}

function parseSettings(data: string, parts: string[]): SettingsAction {
  const [, screen, op, value] = parts;
  if (screen === undefined || !isScreen(screen) || parts.length > 4) {
    throw invalid(data);
  }
  if (op === undefined) {
    return { kind: 'settings', screen };
  }
  if (!isAdjustable(screen)) {
    throw invalid(data);
  }
  if ((op === '+1' || op === '-1') && value === undefined) {
    return { kind: 'settings', screen, op };
  }
  if (op === 'set' && value !== undefined && /^\d{1,3}$/.test(value)) {
    return { kind: 'settings', screen, op, value: Number(value) };
  }
  throw invalid(data);
}

/**
 * Parses raw callback data.
 *
 * @throws {ValidationError} For anything that is not a known action
 *
 * @example
 * ```typescript
 * parseCallbackData('s:cards:set:5'); // { kind: 'settings', screen: 'cards', op: 'set', value: 5 }
 * parseCallbackData('r:good');        // { kind: 'review-grade', quality: 4 }
 * ```
 */
export function parseCallbackData(data: string): CallbackAction {
  if (data.length === 0 || Buffer.byteLength(data, 'utf8') > MAX_CALLBACK_DATA_BYTES) {
    throw invalid(data);
  }

  const parts = data.split(':');
  switch (parts[0]) {
    case 's':
      return parseSettings(data, parts);

    case 'q': {
      const token = parts[1];
      if (parts.length !== 2 || token === undefined || !TOKEN_PATTERN.test(token)) {
        throw invalid(data);
      }
      return { kind: 'quiz-reveal', token };
    }

    case 'r': {
      if (parts.length === 2 && parts[1] === 'stop') {
        return { kind: 'review-cancel' };
      }
      const quality = parts.length === 2 && parts[1] !== undefined ? parseGrade(parts[1]) : null;
      if (quality === null) {
        throw invalid(data);
      }
      return { kind: 'review-grade', quality };
    }

    case 'o': {
      const [, token, action] = parts;
      if (
        parts.length !== 3 ||
        token === undefined ||
        !TOKEN_PATTERN.test(token) ||
        action === undefined ||
        !isOverdueAction(action)
      ) {
        throw invalid(data);
      }
      return { kind: 'overdue', token, action };
    }

    default:
      throw invalid(data);
  }
}

/**
 * Encodes an action for a button.
 *
 * @throws {ValidationError} If the result would exceed 64 bytes
 */
export function encodeCallbackData(action: CallbackAction): string {
  let data: string;
  switch (action.kind) {
    case 'settings':
      data = ['s', action.screen, action.op, action.value]
        .filter((part) => part !== undefined)
        .join(':');
      break;
    case 'quiz-reveal':
      data = `q:${action.token}`;
      break;
    case 'review-grade':
      data = `r:${action.quality}`;
      break;
    case 'review-cancel':
      data = 'r:stop';
      break;
    case 'overdue':
      data = `o:${action.token}:${action.action}`;
      break;
  }

  if (Buffer.byteLength(data, 'utf8') > MAX_CALLBACK_DATA_BYTES) {
    throw new ValidationError('Callback data too long', { data });
  }
  return data;
}
