/**
 * Core Domain Models - Barrel Export
 *
 * These types form the contract between the scheduling engine, the session
 * managers, the reminder dispatcher and the storage layer.
 *
 * @example
 * ```typescript
 * import type { Card, ReviewSession, QuizSession } from '@/core/models';
 * ```
 */

// Cards - vocabulary pairs with SM-2 review state
export type { ReviewState, Card } from './card';
export { INITIAL_EASE_FACTOR, MIN_EASE_FACTOR } from './card';

// Review sessions - persisted per-user review walk-throughs
export type {
  ReviewSessionState,
  ReviewSessionOutcome,
  ReviewSession,
} from './review-session';

// Quiz sessions - token-addressed single questions
export type { QuizDirection, QuizSession } from './quiz-session';

// User preferences and feedback
export type { UserPreferences, Feedback } from './user-preferences';
export {
  REMINDERS_PER_DAY_RANGE,
  CARDS_PER_SESSION_RANGE,
} from './user-preferences';
