/**
 * Quiz Session Manager
 *
 * Issues single quiz questions addressed by an unguessable token and
 * reveals their answers on request. A token reveals at most once, only
 * to the user it was issued to and only before it expires. Expired
 * tokens, revealed or not, are removed by `sweep`, which the quiz
 * sweeper runs on its own interval regardless of the TTL.
 */

import { randomBytes } from 'node:crypto';
import type { QuizDirection, QuizSession } from '../models';
import { ForbiddenError, NoCardsError, NotFoundError } from '../errors';
import type { RandomSource, SchedulingEngine } from '../scheduling';
import type { KeyedMutex } from '../tasks';
import type { QuizSessionRepository } from '@/storage/repositories/quiz-session.repository';

/**
 * Dependencies and settings of the manager.
 */
export interface QuizSessionManagerOptions {
  sessions: QuizSessionRepository;
  scheduling: SchedulingEngine;
  mutex: KeyedMutex;
  /** Lifetime of an issued question */
  ttlMs: number;
  /** Grade applied to the card on reveal; undefined leaves the card alone */
  revealGrade?: number;
  /** Picks the question direction */
  random?: RandomSource;
  /** Produces tokens; 128 random bits in hex by default */
  generateToken?: () => string;
}

/**
 * What a successful reveal hands back to the user.
 */
export interface QuizReveal {
  prompt: string;
  answer: string;
  direction: QuizDirection;
  cardId: number;
}

/**
 * Reply for every reveal that does not go through. Owners and strangers
 * read the same text, so a token's state stays private.
 */
export const QUIZ_UNAVAILABLE = 'This question is no longer available. Send /game for a new one.';

/** 128 random bits as 32 hex characters. */
export function generateQuizToken(): string {
  return randomBytes(16).toString('hex');
}

/**
 * @example
 * ```typescript
 * const quizzes = new QuizSessionManager({ sessions, scheduling, mutex, ttlMs: 15 * 60_000 });
 *
 * const quiz = await quizzes.issue(owner, now);
 * // ... the user presses the reveal button carrying quiz.token
 * const { answer } = await quizzes.reveal(quiz.token, owner, new Date());
 * ```
 */
export class QuizSessionManager {
  private readonly random: RandomSource;
  private readonly generateToken: () => string;

  constructor(private readonly options: QuizSessionManagerOptions) {
    this.random = options.random ?? Math.random;
    this.generateToken = options.generateToken ?? generateQuizToken;
  }

  /**
   * Builds a question from the owner's most due card (or a random one
   * when nothing is due) in a random direction.
   *
   * @param ttlMs - Overrides the configured lifetime
   * @throws {NoCardsError} If the owner has no cards
   */
  async issue(owner: string, now: Date, ttlMs?: number): Promise<QuizSession> {
    const { mutex, scheduling, sessions } = this.options;

    return mutex.run(owner, async () => {
      const [card] = await scheduling.dueSet(owner, now, 1);
      if (!card) {
        throw new NoCardsError('You have no cards to play with yet. Upload a CSV file first.');
      }

      const direction: QuizDirection = this.random() < 0.5 ? 'front_to_back' : 'back_to_front';
      const forward = direction === 'front_to_back';

      return sessions.create({
        token: this.generateToken(),
        owner,
        cardId: card.id,
        prompt: forward ? card.front : card.back,
        correctAnswer: forward ? card.back : card.front,
        direction,
        createdAt: now,
        expiresAt: new Date(now.getTime() + (ttlMs ?? this.options.ttlMs)),
      });
    });
  }

  /**
   * Reveals the answer behind `token` to `requester`.
   *
   * Ownership is checked before the token's state, so a stranger gets
   * ForbiddenError for a live token and a dead one alike.
   *
   * @throws {ForbiddenError} If the token exists and `requester` is not the owner
   * @throws {NotFoundError} If the token is unknown, already revealed,
   *   expired, or a concurrent reveal won
   */
  async reveal(token: string, requester: string, now: Date): Promise<QuizReveal> {
    const { sessions, scheduling, revealGrade } = this.options;

    const session = await sessions.findById(token);
    if (session && session.owner !== requester) {
      throw new ForbiddenError(QUIZ_UNAVAILABLE);
    }
    if (!session || session.revealed || now.getTime() > session.expiresAt.getTime()) {
      throw new NotFoundError(QUIZ_UNAVAILABLE);
    }

    if (!(await sessions.markRevealed(token, now))) {
      throw new NotFoundError(QUIZ_UNAVAILABLE);
    }

    if (revealGrade !== undefined) {
      await scheduling.recordAnswer(session.cardId, revealGrade, now);
    }

    return {
      prompt: session.prompt,
      answer: session.correctAnswer,
      direction: session.direction,
      cardId: session.cardId,
    };
  }

  /**
   * Removes every question with `expiresAt < now`.
   *
   * @returns Number of questions removed
   */
  async sweep(now: Date): Promise<number> {
    return this.options.sessions.deleteExpired(now);
  }
}
