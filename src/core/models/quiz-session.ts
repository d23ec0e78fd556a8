/**
 * QuizSession Domain Types
 *
 * A QuizSession is a short-lived, token-addressed question: the user sees
 * one side of a card and may press a button carrying the token to reveal
 * the other side. Tokens are single use and carry an absolute expiry.
 */

/**
 * Which side of the card the question shows.
 *
 * - 'front_to_back': shows the front, the answer is the back
 * - 'back_to_front': shows the back, the answer is the front
 */
export type QuizDirection = 'front_to_back' | 'back_to_front';

/**
 * A single issued quiz question.
 */
export interface QuizSession {
  /** Unguessable single-use identifier carried in the reveal button */
  token: string;

  /** User the question was issued to; only they may reveal it */
  owner: string;

  /** Card the question was built from */
  cardId: number;

  /** Side of the card shown to the user */
  prompt: string;

  /** Side of the card revealed on request */
  correctAnswer: string;

  direction: QuizDirection;

  createdAt: Date;

  /** Reveals after this instant fail even if the sweeper has not run yet */
  expiresAt: Date;

  /** Set once the answer has been revealed; the token is inert afterwards */
  revealed: boolean;
}
