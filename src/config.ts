/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration for Vocab Reminder. Values come from
 * environment variables (a `.env` file is read by the entry points through
 * dotenv) and are validated against a zod schema with defaults.
 *
 * Nothing is parsed at import time: entry points call `loadConfig()` once
 * and pass the result into the application context, so the core never
 * reads process-wide state.
 *
 * Usage:
 *   import { loadConfig } from './config';
 *
 *   const config = loadConfig(process.env);
 *   console.log(config.server.port);
 *   console.log(config.quiz.ttlMs);
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

/**
 * Zod schema for validating environment configuration.
 * This provides runtime validation and TypeScript type inference.
 */
const configSchema = z.object({
  // Server configuration
  server: z.object({
    port: z.number().int().positive().default(3000),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  // Database configuration
  database: z.object({
    path: z.string().min(1).default('vocab-reminder.db'),
  }),

  // Outgoing chat messages; console delivery when no URL is set
  gateway: z.object({
    url: z.string().url().optional(),
    token: z.string().optional(),
  }),

  // User ids that receive /feedback messages
  admins: z.object({
    ids: z.array(z.string()).default([]),
  }),

  // Defaults applied to new users by /start
  defaults: z.object({
    remindersPerDay: z.number().int().min(1).max(12).default(3),
    cardsPerSession: z.number().int().min(1).max(20).default(5),
  }),

  // Reminder dispatcher loop
  reminders: z.object({
    tickIntervalMs: z.number().int().positive().default(MINUTE_MS),
    // Unanswered reminders in a row before reminders pause
    pauseAfterMisses: z.number().int().positive().default(9),
  }),

  // Quiz tokens and their sweeper
  quiz: z.object({
    ttlMs: z.number().int().positive().default(15 * MINUTE_MS),
    sweepIntervalMs: z.number().int().positive().default(MINUTE_MS),
    // Grade applied to the card when the answer is revealed; unset = no update
    revealGrade: z.number().int().min(0).max(5).optional(),
  }),

  // Review sessions
  review: z.object({
    idleTimeoutMs: z.number().int().positive().default(24 * HOUR_MS),
    sweepIntervalMs: z.number().int().positive().default(10 * MINUTE_MS),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

/** Environment shape accepted by loadConfig (process.env fits). */
export type Environment = Record<string, string | undefined>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse a comma-separated string into an array of trimmed strings.
 * Returns an empty array if the input is undefined or empty.
 */
function parseCommaSeparated(value: string | undefined): string[] {
  if (!value || value.trim() === '') {
    return [];
  }
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Parse an integer from an environment variable string.
 * Returns NaN for values that are present but not integers, so the schema
 * reports them instead of silently falling back to the default.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return /^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
}

/**
 * Treats empty strings as absent.
 */
function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Build the raw (unvalidated) configuration object from environment variables.
 * Values keep whatever the environment gave; the schema decides.
 */
function loadFromEnvironment(env: Environment): Record<string, Record<string, unknown>> {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: nonEmpty(env.HOST),
      nodeEnv: nonEmpty(env.NODE_ENV),
    },
    database: {
      path: nonEmpty(env.DATABASE_PATH),
    },
    gateway: {
      url: nonEmpty(env.GATEWAY_URL),
      token: nonEmpty(env.GATEWAY_TOKEN),
    },
    admins: {
      ids: parseCommaSeparated(env.ADMIN_IDS),
    },
    defaults: {
      remindersPerDay: parseIntOrUndefined(env.DEFAULT_REMINDERS_PER_DAY),
      cardsPerSession: parseIntOrUndefined(env.DEFAULT_CARDS_PER_SESSION),
    },
    reminders: {
      tickIntervalMs: parseIntOrUndefined(env.REMINDER_TICK_MS),
      pauseAfterMisses: parseIntOrUndefined(env.REMINDER_PAUSE_AFTER_MISSES),
    },
    quiz: {
      ttlMs: parseIntOrUndefined(env.QUIZ_TTL_MS),
      sweepIntervalMs: parseIntOrUndefined(env.QUIZ_SWEEP_MS),
      revealGrade: parseIntOrUndefined(env.QUIZ_REVEAL_GRADE),
    },
    review: {
      idleTimeoutMs: parseIntOrUndefined(env.REVIEW_IDLE_TIMEOUT_MS),
      sweepIntervalMs: parseIntOrUndefined(env.REVIEW_SWEEP_MS),
    },
  };
}

/**
 * Environment variable behind each configuration path, for error messages.
 */
const ENV_NAMES: Record<string, string> = {
  'server.port': 'PORT',
  'server.host': 'HOST',
  'server.nodeEnv': 'NODE_ENV',
  'database.path': 'DATABASE_PATH',
  'gateway.url': 'GATEWAY_URL',
  'gateway.token': 'GATEWAY_TOKEN',
  'admins.ids': 'ADMIN_IDS',
  'defaults.remindersPerDay': 'DEFAULT_REMINDERS_PER_DAY',
  'defaults.cardsPerSession': 'DEFAULT_CARDS_PER_SESSION',
  'reminders.tickIntervalMs': 'REMINDER_TICK_MS',
  'reminders.pauseAfterMisses': 'REMINDER_PAUSE_AFTER_MISSES',
  'quiz.ttlMs': 'QUIZ_TTL_MS',
  'quiz.sweepIntervalMs': 'QUIZ_SWEEP_MS',
  'quiz.revealGrade': 'QUIZ_REVEAL_GRADE',
  'review.idleTimeoutMs': 'REVIEW_IDLE_TIMEOUT_MS',
  'review.sweepIntervalMs': 'REVIEW_SWEEP_MS',
};

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.invalidVars = invalidVars;
  }
}

/**
 * Loads and validates configuration from an environment object.
 *
 * @param env - Environment variables, normally `process.env`
 * @returns The validated configuration with defaults filled in
 * @throws {ConfigValidationError} If any variable is present but invalid
 *
 * @example
 * ```typescript
 * try {
 *   const config = loadConfig(process.env);
 * } catch (error) {
 *   if (error instanceof ConfigValidationError) {
 *     console.error('Invalid vars:', error.invalidVars);
 *   }
 *   process.exit(1);
 * }
 * ```
 */
export function loadConfig(env: Environment = process.env): Config {
  const parseResult = configSchema.safeParse(loadFromEnvironment(env));

  if (parseResult.success) {
    return parseResult.data;
  }

  const invalidVars = parseResult.error.errors.map((issue) => {
    const path = issue.path.filter((segment) => typeof segment === 'string').join('.');
    return { name: ENV_NAMES[path] ?? path, reason: issue.message };
  });

  const description = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
  throw new ConfigValidationError(`Invalid configuration: ${description}`, invalidVars);
}

/**
 * Helper to check if a configuration is running in production mode.
 */
export function isProduction(config: Config): boolean {
  return config.server.nodeEnv === 'production';
}
