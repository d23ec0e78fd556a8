/**
 * Quiz Session Integration Tests
 *
 * Token lifecycle against an in-memory database: single-use reveals,
 * ownership, expiry and the sweeper.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { ForbiddenError, NoCardsError, NotFoundError } from '../../src/core/errors';
import { cleanupTestContext, createTestContext, type TestContext } from '../setup';
import { DAY, MINUTE, T0, at, seedCards } from '../helpers';

const OWNER = 'u1';
const EXPIRED = 'This question is no longer available. Send /game for a new one.';

describe('QuizSessionManager', () => {
  let ctx: TestContext;

  afterEach(async () => {
    await cleanupTestContext(ctx);
  });

  it('issues a question from the most due card', async () => {
    ctx = createTestContext();
    const [first] = await seedCards(ctx.app.repositories.cards, OWNER, 2);

    const quiz = await ctx.app.quizzes.issue(OWNER, T0);

    expect(quiz.token).toMatch(/^[0-9a-f]{32}$/);
    expect(quiz.cardId).toBe(first.id);
    expect(quiz.direction).toBe('front_to_back');
    expect(quiz.prompt).toBe('word1');
    expect(quiz.correctAnswer).toBe('meaning1');
    expect(quiz.expiresAt).toEqual(at(15 * MINUTE));
    expect(quiz.revealed).toBe(false);
  });

  it('asks back to front when the coin says so', async () => {
    ctx = createTestContext({ random: () => 0.75 });
    await seedCards(ctx.app.repositories.cards, OWNER, 1);

    const quiz = await ctx.app.quizzes.issue(OWNER, T0);

    expect(quiz.direction).toBe('back_to_front');
    expect(quiz.prompt).toBe('meaning1');
    expect(quiz.correctAnswer).toBe('word1');
  });

  it('raises NoCardsError for an empty deck', async () => {
    ctx = createTestContext();
    await expect(ctx.app.quizzes.issue(OWNER, T0)).rejects.toThrow(NoCardsError);
  });

  it('reveals a token exactly once', async () => {
    ctx = createTestContext();
    await seedCards(ctx.app.repositories.cards, OWNER, 1);
    const { token } = await ctx.app.quizzes.issue(OWNER, T0);

    const reveal = await ctx.app.quizzes.reveal(token, OWNER, at(MINUTE));
    expect(reveal).toEqual({
      prompt: 'word1',
      answer: 'meaning1',
      direction: 'front_to_back',
      cardId: 1,
    });

    await expect(ctx.app.quizzes.reveal(token, OWNER, at(MINUTE))).rejects.toThrow(EXPIRED);
  });

  it('lets only one of two concurrent reveals through', async () => {
    ctx = createTestContext();
    await seedCards(ctx.app.repositories.cards, OWNER, 1);
    const { token } = await ctx.app.quizzes.issue(OWNER, T0);

    const results = await Promise.allSettled([
      ctx.app.quizzes.reveal(token, OWNER, T0),
      ctx.app.quizzes.reveal(token, OWNER, T0),
    ]);

    expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    const [failure] = results.filter((result) => result.status === 'rejected');
    expect(failure?.status === 'rejected' && failure.reason instanceof NotFoundError).toBe(true);
  });

  it('refuses a reveal by another user and keeps the token usable', async () => {
    ctx = createTestContext();
    await seedCards(ctx.app.repositories.cards, OWNER, 1);
    const { token } = await ctx.app.quizzes.issue(OWNER, T0);

    await expect(ctx.app.quizzes.reveal(token, 'u2', T0)).rejects.toThrow(ForbiddenError);
    await expect(ctx.app.quizzes.reveal(token, OWNER, T0)).resolves.toMatchObject({
      answer: 'meaning1',
    });
  });

  it('gives a stranger the same refusal for live, used and expired tokens', async () => {
    ctx = createTestContext();
    await seedCards(ctx.app.repositories.cards, OWNER, 1);
    const live = await ctx.app.quizzes.issue(OWNER, T0);
    const used = await ctx.app.quizzes.issue(OWNER, T0);
    await ctx.app.quizzes.reveal(used.token, OWNER, T0);
    const stale = await ctx.app.quizzes.issue(OWNER, T0);
    const later = at(15 * MINUTE + 1);

    await expect(ctx.app.quizzes.reveal(live.token, 'u2', T0)).rejects.toThrow(
      new ForbiddenError(EXPIRED)
    );
    await expect(ctx.app.quizzes.reveal(used.token, 'u2', T0)).rejects.toThrow(
      new ForbiddenError(EXPIRED)
    );
    await expect(ctx.app.quizzes.reveal(stale.token, 'u2', later)).rejects.toThrow(
      new ForbiddenError(EXPIRED)
    );
    await expect(ctx.app.quizzes.reveal('deadbeef', 'u2', T0)).rejects.toThrow(EXPIRED);
  });

  it('rejects an unknown token', async () => {
    ctx = createTestContext();
    await expect(ctx.app.quizzes.reveal('deadbeef', OWNER, T0)).rejects.toThrow(NotFoundError);
  });

  it('still reveals at the expiry instant and not a millisecond later', async () => {
    ctx = createTestContext();
    await seedCards(ctx.app.repositories.cards, OWNER, 1);
    const first = await ctx.app.quizzes.issue(OWNER, T0);
    const second = await ctx.app.quizzes.issue(OWNER, T0);

    await expect(ctx.app.quizzes.reveal(first.token, OWNER, at(15 * MINUTE))).resolves.toMatchObject({
      answer: 'meaning1',
    });
    await expect(ctx.app.quizzes.reveal(second.token, OWNER, at(15 * MINUTE + 1))).rejects.toThrow(
      EXPIRED
    );
  });

  it('sweeps expired questions, revealed or not', async () => {
    ctx = createTestContext();
    await seedCards(ctx.app.repositories.cards, OWNER, 1);
    const revealed = await ctx.app.quizzes.issue(OWNER, T0);
    await ctx.app.quizzes.reveal(revealed.token, OWNER, T0);
    const pending = await ctx.app.quizzes.issue(OWNER, T0);
    const fresh = await ctx.app.quizzes.issue(OWNER, at(10 * MINUTE));

    expect(await ctx.app.quizzes.sweep(at(15 * MINUTE))).toBe(0);
    expect(await ctx.app.quizzes.sweep(at(15 * MINUTE + 1))).toBe(2);

    const { quizSessions } = ctx.app.repositories;
    expect(await quizSessions.findById(revealed.token)).toBeNull();
    expect(await quizSessions.findById(pending.token)).toBeNull();
    expect(await quizSessions.findById(fresh.token)).not.toBeNull();
  });

  it('leaves the card alone on reveal by default', async () => {
    ctx = createTestContext();
    const [card] = await seedCards(ctx.app.repositories.cards, OWNER, 1);
    const { token } = await ctx.app.quizzes.issue(OWNER, T0);
    await ctx.app.quizzes.reveal(token, OWNER, T0);

    const stored = await ctx.app.repositories.cards.findById(card.id);
    expect(stored?.repetitions).toBe(0);
    expect(stored?.dueAt).toEqual(T0);
  });

  it('grades the card on reveal when a reveal grade is configured', async () => {
    ctx = createTestContext({ env: { QUIZ_REVEAL_GRADE: '4' } });
    const [card] = await seedCards(ctx.app.repositories.cards, OWNER, 1);
    const { token } = await ctx.app.quizzes.issue(OWNER, T0);
    await ctx.app.quizzes.reveal(token, OWNER, T0);

    const stored = await ctx.app.repositories.cards.findById(card.id);
    expect(stored?.repetitions).toBe(1);
    expect(stored?.dueAt).toEqual(at(DAY));
    expect(stored?.lastReviewedAt).toEqual(T0);
  });
});
