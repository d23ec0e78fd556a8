/**
 * Application Context
 *
 * Builds every long-lived object once, from a parsed Config, and hands
 * them around explicitly. Nothing in the core reads the environment or a
 * module-level singleton.
 *
 * Background tasks registered on the scheduler:
 * - `reminders`       every `reminders.tickIntervalMs`
 * - `quiz-sweeper`    every `quiz.sweepIntervalMs`
 * - `review-sweeper`  every `review.sweepIntervalMs`
 */

import type { Config } from './config';
import type { Logger } from './core/logger';
import { KeyedMutex, TaskScheduler, type Clock } from './core/tasks';
import { SchedulingEngine, type RandomSource } from './core/scheduling';
import { ReviewSessionManager } from './core/review';
import { QuizSessionManager } from './core/quiz';
import { ReminderDispatcher } from './core/reminders';
import { VocabularyService } from './core/vocabulary';
import { SettingsService } from './core/settings';
import { FeedbackService } from './core/feedback';
import { CommandRouter } from './bot/command-router';
import { createGateway, type MessagingGateway } from './gateway';
import {
  createDatabase,
  CardRepository,
  FeedbackRepository,
  QuizSessionRepository,
  ReviewSessionRepository,
  UserPreferencesRepository,
  type DatabaseHandle,
} from './storage';

export interface AppRepositories {
  cards: CardRepository;
  reviewSessions: ReviewSessionRepository;
  quizSessions: QuizSessionRepository;
  preferences: UserPreferencesRepository;
  feedback: FeedbackRepository;
}

export interface AppContext {
  config: Config;
  logger: Logger;
  clock: Clock;
  database: DatabaseHandle;
  repositories: AppRepositories;
  gateway: MessagingGateway;
  scheduling: SchedulingEngine;
  reviews: ReviewSessionManager;
  quizzes: QuizSessionManager;
  reminders: ReminderDispatcher;
  vocabulary: VocabularyService;
  settings: SettingsService;
  feedback: FeedbackService;
  router: CommandRouter;
  tasks: TaskScheduler;
  /** Stops the tasks and closes the database */
  close(): Promise<void>;
}

/** Replacements for the pieces tests and the CLI swap out. */
export interface ContextOverrides {
  logger?: Logger;
  clock?: Clock;
  random?: RandomSource;
  gateway?: MessagingGateway;
  database?: DatabaseHandle;
}

export function createAppContext(config: Config, overrides: ContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? console;
  const clock = overrides.clock ?? (() => new Date());
  const random = overrides.random ?? Math.random;

  const database = overrides.database ?? createDatabase(config.database.path);
  const { db } = database;

  const repositories: AppRepositories = {
    cards: new CardRepository(db),
    reviewSessions: new ReviewSessionRepository(db),
    quizSessions: new QuizSessionRepository(db),
    preferences: new UserPreferencesRepository(db),
    feedback: new FeedbackRepository(db),
  };

  const gateway = overrides.gateway ?? createGateway(config.gateway, logger);
  const mutex = new KeyedMutex();
  const scheduling = new SchedulingEngine(repositories.cards, random);

  const reviews = new ReviewSessionManager({
    sessions: repositories.reviewSessions,
    cards: repositories.cards,
    preferences: repositories.preferences,
    scheduling,
    mutex,
    idleTimeoutMs: config.review.idleTimeoutMs,
    defaultCardsPerSession: config.defaults.cardsPerSession,
  });

  const quizzes = new QuizSessionManager({
    sessions: repositories.quizSessions,
    scheduling,
    mutex,
    ttlMs: config.quiz.ttlMs,
    revealGrade: config.quiz.revealGrade,
    random,
  });

  const reminders = new ReminderDispatcher({
    preferences: repositories.preferences,
    scheduling,
    gateway,
    logger,
    pauseAfterMisses: config.reminders.pauseAfterMisses,
  });

  const vocabulary = new VocabularyService({
    cards: repositories.cards,
    quizzes: repositories.quizSessions,
    reviews,
  });

  const settings = new SettingsService({
    preferences: repositories.preferences,
    defaults: config.defaults,
  });

  const feedback = new FeedbackService({
    feedback: repositories.feedback,
    gateway,
    adminIds: config.admins.ids,
    logger,
  });

  const router = new CommandRouter({
    reviews,
    quizzes,
    vocabulary,
    settings,
    feedback,
    reminders,
    gateway,
    logger,
    clock,
  });

  const tasks = new TaskScheduler(logger, clock);
  tasks.register({
    name: 'reminders',
    intervalMs: config.reminders.tickIntervalMs,
    runOnStart: true,
    run: (now) => reminders.tick(now),
  });
  tasks.register({
    name: 'quiz-sweeper',
    intervalMs: config.quiz.sweepIntervalMs,
    run: (now) => quizzes.sweep(now),
  });
  tasks.register({
    name: 'review-sweeper',
    intervalMs: config.review.sweepIntervalMs,
    run: (now) => reviews.sweepIdle(now),
  });

  return {
    config,
    logger,
    clock,
    database,
    repositories,
    gateway,
    scheduling,
    reviews,
    quizzes,
    reminders,
    vocabulary,
    settings,
    feedback,
    router,
    tasks,
    async close() {
      await tasks.stop();
      database.sqlite.close();
    },
  };
}
