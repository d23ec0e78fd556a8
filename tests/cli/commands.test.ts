/**
 * CLI Command Tests
 *
 * Commands print through console.log; the spy collects the lines.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runExportCommand, runImportCommand } from '../../src/cli/commands/vocabulary';
import { runSweepCommand } from '../../src/cli/commands/sweep';
import { runUsersCommand } from '../../src/cli/commands/users';
import { dim, formatTable, green, yellow } from '../../src/cli/utils/terminal';
import { cleanupTestContext, createTestContext, type TestContext } from '../setup';
import { HOUR, MINUTE, T0, at, seedCards } from '../helpers';

describe('formatTable', () => {
  it('pads columns to the longest cell', () => {
    const table = formatTable(['owner', 'cards'], [['u1', '12'], ['u10', '3']]);

    expect(table.split('\n')).toEqual([
      '\x1b[1mowner  cards\x1b[0m',
      `\x1b[2m${'─'.repeat(12)}\x1b[0m`,
      'u1     12',
      'u10    3',
    ]);
  });
});

describe('CLI commands', () => {
  let ctx: TestContext;
  let log: MockInstance<typeof console.log>;
  let dir: string;

  const printed = (): unknown[] => log.mock.calls.map((call) => call[0]);

  beforeEach(async () => {
    ctx = createTestContext();
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = await mkdtemp(join(tmpdir(), 'vocab-cli-'));
  });

  afterEach(async () => {
    log.mockRestore();
    await rm(dir, { recursive: true, force: true });
    await cleanupTestContext(ctx);
  });

  it('imports a file and lists skipped rows', async () => {
    const file = join(dir, 'words.csv');
    await writeFile(file, 'Hund,dog\nbad', 'utf8');

    await runImportCommand(ctx.app.vocabulary, 'u1', file, T0);

    expect(printed()).toEqual([
      green('Imported 1 new and 0 updated pairs for u1.'),
      yellow('Skipped 1 rows:'),
      dim('  line 2: bad (expected 2 or 3 columns, found 1)'),
    ]);
    expect(await ctx.app.repositories.cards.countByOwner('u1')).toBe(1);
  });

  it('exports a deck to the given path', async () => {
    await seedCards(ctx.app.repositories.cards, 'u1', 2);
    const output = join(dir, 'out.csv');

    await runExportCommand(ctx.app.vocabulary, 'u1', { output }, T0);

    expect(await readFile(output, 'utf8')).toBe('\uFEFFword1,meaning1\r\nword2,meaning2\r\n');
    expect(printed()).toEqual([green(`Exported 2 cards to ${output}`)]);
  });

  it('lists registered users', async () => {
    await ctx.app.settings.register('u1', 'c1', T0);
    await seedCards(ctx.app.repositories.cards, 'u1', 2);

    await runUsersCommand(ctx.app.repositories.preferences, ctx.app.repositories.cards);

    const output = printed();
    expect(output).toHaveLength(1);
    const lines = String(output[0]).split('\n');
    expect(lines[2]?.split(/\s+/)).toEqual(['u1', '2', '3', '5', '2024-03-01T16:00:00.000Z']);
  });

  it('shows paused reminders in place of the next reminder time', async () => {
    await ctx.app.settings.register('u1', 'c1', T0);
    await ctx.app.repositories.preferences.pauseReminders('u1', 9);

    await runUsersCommand(ctx.app.repositories.preferences, ctx.app.repositories.cards);

    const lines = String(printed()[0]).split('\n');
    expect(lines[2]?.split(/\s+/)).toEqual(['u1', '0', '3', '5', 'paused']);
  });

  it('says so when nobody is registered', async () => {
    await runUsersCommand(ctx.app.repositories.preferences, ctx.app.repositories.cards);
    expect(printed()).toEqual([yellow('No users registered yet.')]);
  });

  it('runs the sweepers and, on request, the reminder tick', async () => {
    await ctx.app.settings.register('u1', 'c1', T0);
    await seedCards(ctx.app.repositories.cards, 'u1', 1);
    await ctx.app.quizzes.issue('u1', T0);
    ctx.clock.set(at(8 * HOUR + MINUTE));

    await runSweepCommand(ctx.app, { reminders: true });

    expect(printed()).toEqual([
      green('Removed 1 expired quiz question(s).'),
      green('Removed 0 idle review session(s).'),
      green('Reminders: 1 sent, 0 skipped, 0 paused, 0 failed.'),
    ]);
    expect(ctx.gateway.to('c1')).toHaveLength(1);
  });
});
