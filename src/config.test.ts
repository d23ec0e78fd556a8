import { describe, it, expect } from 'vitest';
import { ConfigValidationError, isProduction, loadConfig } from './config';

function invalidNames(env: Record<string, string>): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error.invalidVars.map((invalid) => invalid.name);
    }
    throw error;
  }
  return [];
}

describe('loadConfig', () => {
  it('fills in defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({ port: 3000, host: '0.0.0.0', nodeEnv: 'development' });
    expect(config.database.path).toBe('vocab-reminder.db');
    expect(config.gateway.url).toBeUndefined();
    expect(config.admins.ids).toEqual([]);
    expect(config.defaults).toEqual({ remindersPerDay: 3, cardsPerSession: 5 });
    expect(config.reminders).toEqual({ tickIntervalMs: 60_000, pauseAfterMisses: 9 });
    expect(config.quiz).toEqual({ ttlMs: 900_000, sweepIntervalMs: 60_000 });
    expect(config.review).toEqual({ idleTimeoutMs: 86_400_000, sweepIntervalMs: 600_000 });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      NODE_ENV: 'production',
      DATABASE_PATH: '/data/vocab.db',
      GATEWAY_URL: 'http://relay.test/send',
      GATEWAY_TOKEN: 'test-secret',
      ADMIN_IDS: ' 1, 2,,3 ',
      QUIZ_REVEAL_GRADE: '3',
    });

    expect(config.server.port).toBe(8080);
    expect(config.database.path).toBe('/data/vocab.db');
    expect(config.gateway).toEqual({ url: 'http://relay.test/send', token: 'test-secret' });
    expect(config.admins.ids).toEqual(['1', '2', '3']);
    expect(config.quiz.revealGrade).toBe(3);
    expect(isProduction(config)).toBe(true);
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ PORT: '', GATEWAY_URL: ' ' });
    expect(config.server.port).toBe(3000);
    expect(config.gateway.url).toBeUndefined();
  });

  it('names each invalid variable', () => {
    expect(invalidNames({ PORT: 'abc' })).toEqual(['PORT']);
    expect(invalidNames({ QUIZ_REVEAL_GRADE: '7' })).toEqual(['QUIZ_REVEAL_GRADE']);
    expect(invalidNames({ DEFAULT_REMINDERS_PER_DAY: '0', GATEWAY_URL: 'not a url' })).toEqual([
      'GATEWAY_URL',
      'DEFAULT_REMINDERS_PER_DAY',
    ]);
    expect(invalidNames({ NODE_ENV: 'staging' })).toEqual(['NODE_ENV']);
  });

  it('rejects fractional numbers instead of truncating them', () => {
    expect(invalidNames({ QUIZ_TTL_MS: '1.5' })).toEqual(['QUIZ_TTL_MS']);
  });
});
