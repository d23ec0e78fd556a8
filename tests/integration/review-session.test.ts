/**
 * Review Session Integration Tests
 *
 * Drives the review session manager against an in-memory database:
 * a full walk through a batch, answer ordering rules, concurrent starts,
 * idle timeouts and cards deleted mid-session.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConflictError, InvariantError, NoCardsError, NotFoundError } from '../../src/core/errors';
import { cleanupTestContext, createTestContext, type TestContext } from '../setup';
import { DAY, HOUR, T0, at, seedCards } from '../helpers';

const OWNER = 'u1';

describe('ReviewSessionManager', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(async () => {
    await cleanupTestContext(ctx);
  });

  it('walks a batch in due order and applies each grade', async () => {
    const { reviews, repositories } = ctx.app;
    const [first, second, third] = await seedCards(repositories.cards, OWNER, 3);

    const session = await reviews.start(OWNER, T0);
    expect(session.queue).toEqual([first.id, second.id, third.id]);
    expect(session.state).toBe('in_progress');

    const prompt = await reviews.nextPrompt(OWNER, T0);
    expect(prompt.card.id).toBe(first.id);
    expect(prompt.position).toBe(0);
    expect(prompt.total).toBe(3);

    const answer = await reviews.submitAnswer(OWNER, 5, T0);
    expect(answer.state).toBe('in_progress');
    expect(answer.answered).toBe(1);
    expect(answer.card?.repetitions).toBe(1);
    expect(answer.card?.intervalDays).toBe(1);
    expect(answer.card?.dueAt).toEqual(at(DAY));

    const stored = await repositories.cards.findById(first.id);
    expect(stored?.repetitions).toBe(1);
    expect(stored?.dueAt).toEqual(at(DAY));

    expect((await reviews.nextPrompt(OWNER, T0)).card.id).toBe(second.id);
    await reviews.submitAnswer(OWNER, 4, T0);
    expect((await reviews.nextPrompt(OWNER, T0)).card.id).toBe(third.id);
    const last = await reviews.submitAnswer(OWNER, 0, T0);

    expect(last.state).toBe('complete');
    expect(last.answered).toBe(3);
    expect(await repositories.reviewSessions.findById(OWNER)).toBeNull();
    expect(await reviews.status(OWNER, T0)).toBeNull();
  });

  it('sizes the batch from the owner preferences', async () => {
    const { reviews, settings, repositories } = ctx.app;
    await seedCards(repositories.cards, OWNER, 4);
    await settings.register(OWNER, 'c1', T0);
    await settings.change(OWNER, 'cardsPerSession', { op: 'set', value: 2 }, T0);

    const session = await reviews.start(OWNER, T0);
    expect(session.queue).toHaveLength(2);
  });

  it('tops up with cards that are not due yet', async () => {
    const { reviews, repositories } = ctx.app;
    const [due] = await seedCards(repositories.cards, OWNER, 1);
    const later = await repositories.cards.create({
      owner: OWNER,
      front: 'später',
      back: 'later',
      dueAt: at(2 * DAY),
    });

    const session = await reviews.start(OWNER, T0);
    expect(session.queue).toEqual([due.id, later.id]);
  });

  it('returns exactly the due cards when the deck is smaller than the batch', async () => {
    const { reviews, repositories } = ctx.app;
    await seedCards(repositories.cards, OWNER, 3);

    const session = await reviews.start(OWNER, T0);
    expect(session.queue).toHaveLength(3);
  });

  it('refuses a second prompt before the first is answered', async () => {
    const { reviews, repositories } = ctx.app;
    await seedCards(repositories.cards, OWNER, 2);
    await reviews.start(OWNER, T0);
    await reviews.nextPrompt(OWNER, T0);

    await expect(reviews.nextPrompt(OWNER, T0)).rejects.toThrow(NotFoundError);
    await expect(reviews.nextPrompt(OWNER, T0)).rejects.toThrow('Answer the current card first');
  });

  it('refuses an answer when no card is waiting', async () => {
    const { reviews, repositories } = ctx.app;
    await seedCards(repositories.cards, OWNER, 2);
    await reviews.start(OWNER, T0);

    await expect(reviews.submitAnswer(OWNER, 4, T0)).rejects.toThrow(ConflictError);
  });

  it('rejects an out-of-range quality before touching the session', async () => {
    const { reviews, repositories } = ctx.app;
    await seedCards(repositories.cards, OWNER, 1);
    await reviews.start(OWNER, T0);
    await reviews.nextPrompt(OWNER, T0);

    await expect(reviews.submitAnswer(OWNER, 6, T0)).rejects.toThrow(InvariantError);
    expect((await reviews.status(OWNER, T0))?.state).toBe('awaiting_answer');
  });

  it('lets only one of two concurrent starts through', async () => {
    const { reviews, repositories } = ctx.app;
    await seedCards(repositories.cards, OWNER, 3);

    const results = await Promise.allSettled([reviews.start(OWNER, T0), reviews.start(OWNER, T0)]);

    const fulfilled = results.filter((result) => result.status === 'fulfilled');
    const rejected = results.filter((result) => result.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    if (rejected[0]?.status === 'rejected') {
      expect(rejected[0].reason).toBeInstanceOf(ConflictError);
    }
    expect(await repositories.reviewSessions.findById(OWNER)).not.toBeNull();
  });

  it('raises NoCardsError for an empty deck', async () => {
    await expect(ctx.app.reviews.start(OWNER, T0)).rejects.toThrow(NoCardsError);
  });

  it('replaces a session that went idle', async () => {
    const { reviews, repositories } = ctx.app;
    await seedCards(repositories.cards, OWNER, 2);
    await reviews.start(OWNER, T0);
    await reviews.nextPrompt(OWNER, T0);

    const later = at(DAY + 1);
    expect(await reviews.status(OWNER, later)).toBeNull();
    await expect(reviews.submitAnswer(OWNER, 4, later)).rejects.toThrow(NotFoundError);

    const fresh = await reviews.start(OWNER, later);
    expect(fresh.startedAt).toEqual(later);
    expect(fresh.position).toBe(0);
  });

  it('sweeps idle sessions and keeps active ones', async () => {
    const { reviews, repositories } = ctx.app;
    await seedCards(repositories.cards, OWNER, 1);
    await seedCards(repositories.cards, 'u2', 1);
    await reviews.start(OWNER, T0);
    await reviews.start('u2', at(12 * HOUR));

    expect(await reviews.sweepIdle(at(25 * HOUR))).toBe(1);
    expect(await repositories.reviewSessions.findById(OWNER)).toBeNull();
    expect(await repositories.reviewSessions.findById('u2')).not.toBeNull();
  });

  it('skips cards deleted after the session started', async () => {
    const { reviews, repositories } = ctx.app;
    const [first, second] = await seedCards(repositories.cards, OWNER, 2);
    await reviews.start(OWNER, T0);
    await repositories.cards.delete(first.id);

    const prompt = await reviews.nextPrompt(OWNER, T0);
    expect(prompt.card.id).toBe(second.id);
    expect(prompt.position).toBe(1);

    const answer = await reviews.submitAnswer(OWNER, 4, T0);
    expect(answer.state).toBe('complete');
  });

  it('ends the session when every queued card is gone', async () => {
    const { reviews, repositories } = ctx.app;
    await seedCards(repositories.cards, OWNER, 1);
    await reviews.start(OWNER, T0);
    await repositories.cards.deleteByOwner(OWNER);

    await expect(reviews.nextPrompt(OWNER, T0)).rejects.toThrow('No cards left in this review session');
    expect(await repositories.reviewSessions.findById(OWNER)).toBeNull();
  });

  it('shows the waiting card again without moving the session', async () => {
    const { reviews, repositories } = ctx.app;
    const [first] = await seedCards(repositories.cards, OWNER, 2);

    expect(await reviews.currentPrompt(OWNER, T0)).toBeNull();
    await reviews.start(OWNER, T0);
    expect(await reviews.currentPrompt(OWNER, T0)).toBeNull();

    await reviews.nextPrompt(OWNER, T0);
    const before = await reviews.status(OWNER, T0);
    const again = await reviews.currentPrompt(OWNER, at(HOUR));
    expect(again).toEqual({ card: first, position: 0, total: 2 });
    expect(await reviews.status(OWNER, at(HOUR))).toEqual(before);

    await repositories.cards.delete(first.id);
    expect(await reviews.currentPrompt(OWNER, at(HOUR))).toBeNull();
  });

  it('cancels without error when nothing is running', async () => {
    expect(await ctx.app.reviews.cancel(OWNER)).toBe(false);
  });
});
