/**
 * Review Session Manager
 *
 * Drives a user's review walk-through as a persisted state machine:
 *
 *   idle ──start──▶ in_progress ──nextPrompt──▶ awaiting_answer
 *                        ▲                            │
 *                        └────submitAnswer (more)─────┤
 *                                                     └─submitAnswer (last)─▶ complete
 *   in_progress ──cancel / idle timeout──▶ abandoned
 *
 * Terminal states are not stored: completing or abandoning a session
 * deletes its row. Operations for one owner are serialized through a
 * KeyedMutex, and every write after creation is a compare-and-set on the
 * session version, so a request that loses a race gets a ConflictError
 * and changes nothing.
 *
 * A session idle for longer than the configured timeout counts as absent:
 * `start` replaces it, other operations report no session, and the
 * review sweeper deletes it.
 */

import type { Card, ReviewSession, ReviewSessionState } from '../models';
import { ConflictError, InvariantError, NoCardsError, NotFoundError } from '../errors';
import { applyAnswer, isQuality, type SchedulingEngine } from '../scheduling';
import type { KeyedMutex } from '../tasks';
import type { CardRepository } from '@/storage/repositories/card.repository';
import type { ReviewSessionRepository } from '@/storage/repositories/review-session.repository';
import type { UserPreferencesRepository } from '@/storage/repositories/user-preferences.repository';

/**
 * Dependencies and settings of the manager.
 */
export interface ReviewSessionManagerOptions {
  sessions: ReviewSessionRepository;
  cards: CardRepository;
  preferences: UserPreferencesRepository;
  scheduling: SchedulingEngine;
  mutex: KeyedMutex;
  /** Sessions idle longer than this are treated as absent */
  idleTimeoutMs: number;
  /** Batch size for owners without stored preferences */
  defaultCardsPerSession: number;
}

/**
 * The card to show next, with its place in the session.
 */
export interface ReviewPrompt {
  card: Card;
  /** Zero-based index of the card in the queue */
  position: number;
  total: number;
}

/**
 * Result of recording an answer.
 */
export interface ReviewAnswerResult {
  /** Updated card, or null if it was deleted while being reviewed */
  card: Card | null;
  /** 'complete' once the last card has been answered */
  state: ReviewSessionState | 'complete';
  /** Number of cards answered so far */
  answered: number;
  total: number;
}

/**
 * Read-only view of a live session.
 */
export interface ReviewStatus {
  state: ReviewSessionState;
  position: number;
  total: number;
}

/**
 * @example
 * ```typescript
 * const reviews = new ReviewSessionManager({ sessions, cards, preferences, scheduling, mutex,
 *   idleTimeoutMs: 24 * 60 * 60 * 1000, defaultCardsPerSession: 5 });
 *
 * await reviews.start(owner, now);
 * const { card } = await reviews.nextPrompt(owner, now);
 * await reviews.submitAnswer(owner, 4, now);
 * ```
 */
export class ReviewSessionManager {
  constructor(private readonly options: ReviewSessionManagerOptions) {}

  /**
   * Starts a session over the owner's due set.
   *
   * @throws {ConflictError} If a live session exists (or a concurrent start won)
   * @throws {NoCardsError} If the owner has no cards
   */
  async start(owner: string, now: Date): Promise<ReviewSession> {
    const { mutex, sessions, preferences, scheduling, defaultCardsPerSession } = this.options;

    return mutex.run(owner, async () => {
      const existing = await sessions.findById(owner);
      if (existing) {
        if (!this.isIdle(existing, now)) {
          throw new ConflictError('A review session is already running');
        }
        if (!(await sessions.deleteIfVersion(owner, existing.version))) {
          throw new ConflictError('The review session changed, try again');
        }
      }

      const settings = await preferences.findById(owner);
      const limit = settings?.cardsPerSession ?? defaultCardsPerSession;
      const batch = await scheduling.dueSet(owner, now, limit);
      if (batch.length === 0) {
        throw new NoCardsError('You have no cards to review yet. Upload a CSV file first.');
      }

      return sessions.create({
        owner,
        queue: batch.map((card) => card.id),
        startedAt: now,
      });
    });
  }

  /**
   * Returns the next card and moves the session to `awaiting_answer`.
   * Queued cards deleted in the meantime are skipped; if none remain the
   * session completes.
   *
   * @throws {NotFoundError} If there is no session, it is waiting for an
   *   answer, or no queued card is left
   * @throws {ConflictError} If a concurrent request changed the session
   */
  async nextPrompt(owner: string, now: Date): Promise<ReviewPrompt> {
    const { mutex, sessions, cards } = this.options;

    return mutex.run(owner, async () => {
      const session = await this.findLive(owner, now);
      if (session.state !== 'in_progress') {
        throw new NotFoundError('Answer the current card first');
      }

      let position = session.position;
      let card: Card | null = null;
      while (position < session.queue.length) {
        const candidate = await cards.findById(session.queue[position]);
        if (candidate && candidate.owner === owner) {
          card = candidate;
          break;
        }
        position++;
      }

      if (!card) {
        await sessions.deleteIfVersion(owner, session.version);
        throw new NotFoundError('No cards left in this review session');
      }

      const moved = await sessions.updateIfVersion(owner, session.version, {
        position,
        state: 'awaiting_answer',
        lastActivityAt: now,
      });
      if (!moved) {
        throw new ConflictError('The review session changed, try again');
      }

      return { card, position, total: session.queue.length };
    });
  }

  /**
   * Grades the current card and advances the session. The card update
   * and the session advance are committed together.
   *
   * @throws {NotFoundError} If there is no session
   * @throws {ConflictError} If no card is waiting for an answer, or a
   *   concurrent request changed the session
   * @throws {InvariantError} If `quality` is not an integer in 0..5
   */
  async submitAnswer(owner: string, quality: number, now: Date): Promise<ReviewAnswerResult> {
    const { mutex, sessions, cards } = this.options;
    if (!isQuality(quality)) {
      throw new InvariantError(`Answer quality must be an integer from 0 to 5, got ${quality}`);
    }

    return mutex.run(owner, async () => {
      const session = await this.findLive(owner, now);
      if (session.state !== 'awaiting_answer') {
        throw new ConflictError('No card is waiting for an answer');
      }

      const current = await cards.findById(session.queue[session.position]);
      const updated = current ? applyAnswer(current, quality, now) : null;

      const answered = session.position + 1;
      const complete = answered >= session.queue.length;

      const committed = await sessions.commitAnswer(
        owner,
        session.version,
        updated ? { id: updated.id, state: updated } : null,
        complete ? null : { position: answered, state: 'in_progress', lastActivityAt: now }
      );
      if (!committed) {
        throw new ConflictError('The review session changed, try again');
      }

      return {
        card: updated,
        state: complete ? 'complete' : 'in_progress',
        answered,
        total: session.queue.length,
      };
    });
  }

  /**
   * Abandons the owner's session. No error when there is none.
   *
   * @returns true if a session was removed
   */
  async cancel(owner: string): Promise<boolean> {
    const { mutex, sessions } = this.options;
    return mutex.run(owner, () => sessions.delete(owner));
  }

  /**
   * Where the owner's live session stands, or null without one.
   */
  async status(owner: string, now: Date): Promise<ReviewStatus | null> {
    const session = await this.options.sessions.findById(owner);
    if (!session || this.isIdle(session, now)) {
      return null;
    }
    return { state: session.state, position: session.position, total: session.queue.length };
  }

  /**
   * The card the live session is waiting on, for re-sending a prompt the
   * user lost. Changes nothing. Null when there is no live session, it
   * is not waiting for an answer, or the waiting card was deleted.
   */
  async currentPrompt(owner: string, now: Date): Promise<ReviewPrompt | null> {
    const session = await this.options.sessions.findById(owner);
    if (!session || this.isIdle(session, now) || session.state !== 'awaiting_answer') {
      return null;
    }
    const card = await this.options.cards.findById(session.queue[session.position]);
    if (!card || card.owner !== owner) {
      return null;
    }
    return { card, position: session.position, total: session.queue.length };
  }

  /**
   * Deletes every session idle for longer than the timeout.
   *
   * @returns Number of sessions removed
   */
  async sweepIdle(now: Date): Promise<number> {
    return this.options.sessions.deleteIdleSince(this.idleCutoff(now));
  }

  private async findLive(owner: string, now: Date): Promise<ReviewSession> {
    const session = await this.options.sessions.findById(owner);
    if (!session || this.isIdle(session, now)) {
      throw new NotFoundError('No review session is running. Send /review to start one.');
    }
    return session;
  }

  private idleCutoff(now: Date): Date {
    return new Date(now.getTime() - this.options.idleTimeoutMs);
  }

  private isIdle(session: ReviewSession, now: Date): boolean {
    return session.lastActivityAt.getTime() < this.idleCutoff(now).getTime();
  }
}
