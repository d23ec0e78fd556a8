/**
 * ReviewSession Domain Types
 *
 * A ReviewSession walks one user through an ordered queue of cards,
 * alternating between showing a prompt and accepting a graded answer.
 * Sessions are persisted so a restart does not lose progress.
 *
 * Lifecycle:
 * ```
 * idle -> in_progress -> awaiting_answer -> in_progress ... -> complete
 *              \
 *               -> abandoned
 * ```
 * `complete` and `abandoned` are terminal: the stored row is deleted and the
 * owner is back to idle.
 */

/**
 * States a persisted review session can be in.
 *
 * - 'in_progress': the next card has not been shown yet
 * - 'awaiting_answer': the card at `position` has been shown and awaits a grade
 */
export type ReviewSessionState = 'in_progress' | 'awaiting_answer';

/**
 * Outcome of a finished session. Never stored.
 */
export type ReviewSessionOutcome = 'complete' | 'abandoned';

/**
 * A user's active review session.
 */
export interface ReviewSession {
  /** Owner of the session; at most one session exists per owner */
  owner: string;

  /** Card ids in review order (weak references, looked up on each access) */
  queue: number[];

  /** Index into `queue` of the current card */
  position: number;

  /** Current lifecycle state */
  state: ReviewSessionState;

  /** When the session was started */
  startedAt: Date;

  /** Last time the owner interacted with the session; drives the idle timeout */
  lastActivityAt: Date;

  /** Incremented on every write; used for compare-and-set updates */
  version: number;
}
