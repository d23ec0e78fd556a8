/**
 * Repository Layer - Barrel Export
 *
 * Re-exports all repository classes and their input types. Each repository
 * takes the Drizzle database in its constructor and returns domain models.
 *
 * @example
 * ```typescript
 * import { CardRepository, ReviewSessionRepository } from '@/storage/repositories';
 *
 * const cards = new CardRepository(db);
 * const reviews = new ReviewSessionRepository(db);
 * ```
 */

// Base repository interface
export type { Repository } from './base';
export { isConstraintViolation } from './base';

export {
  CardRepository,
  type CreateCardInput,
  type CardPair,
  type UpsertResult,
} from './card.repository';

export {
  ReviewSessionRepository,
  type CreateReviewSessionInput,
  type ReviewSessionPatch,
  type AnsweredCard,
} from './review-session.repository';

export {
  QuizSessionRepository,
  type CreateQuizSessionInput,
} from './quiz-session.repository';

export {
  UserPreferencesRepository,
  type CreateUserPreferencesInput,
  type UpdateUserPreferencesInput,
} from './user-preferences.repository';

export { FeedbackRepository, type CreateFeedbackInput } from './feedback.repository';
