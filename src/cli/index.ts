/**
 * CLI Entry Point for Vocab Reminder
 *
 * Available commands:
 * - `serve`                   start the HTTP surface and background tasks
 * - `migrate`                 apply pending schema migrations
 * - `import <owner> <file>`   load a CSV file into a user's deck
 * - `export <owner> [-o f]`   write a user's deck to CSV
 * - `users`                   list registered users
 * - `sweep [--reminders]`     run the background tasks once
 *
 * ```bash
 * npm run cli -- import 42 words.csv
 * npm run cli -- sweep --reminders
 * ```
 *
 * Every command except `serve` opens the database, does its work and
 * closes it again.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { AppError } from '@/core/errors';
import { silentLogger } from '@/core/logger';
import { ConfigValidationError, loadConfig, type Config } from '../config';
import { createAppContext, type AppContext } from '../context';
import { runServer } from '../serve';
import { createDatabase } from '../storage';
import { createGateway } from '../gateway';
import { runExportCommand, runImportCommand } from './commands/vocabulary';
import { runSweepCommand } from './commands/sweep';
import { runUsersCommand } from './commands/users';
import { dim, green, red } from './utils/terminal';

/**
 * Builds a context for one command, runs `fn` and closes the database.
 * Only the gateway writes to the console; task and dispatcher logs are
 * dropped.
 */
async function withContext(
  config: Config,
  fn: (context: AppContext) => Promise<void>
): Promise<void> {
  const context = createAppContext(config, {
    logger: silentLogger,
    gateway: createGateway(config.gateway, console),
  });
  try {
    await fn(context);
  } finally {
    await context.close();
  }
}

function createProgram(config: Config): Command {
  const program = new Command('vocab-reminder')
    .description('Spaced repetition vocabulary reminders delivered through a chat bot')
    .version('0.1.0');

  program
    .command('serve')
    .description('Start the HTTP server and the background tasks')
    .action(async () => {
      await runServer(config);
    });

  program
    .command('migrate')
    .description('Apply pending schema migrations')
    .action(() => {
      const { sqlite } = createDatabase(config.database.path);
      sqlite.close();
      console.log(green(`Database at ${config.database.path} is up to date.`));
    });

  program
    .command('import <owner> <file>')
    .description("Import a CSV file into a user's deck")
    .action(async (owner: string, file: string) => {
      await withContext(config, (context) =>
        runImportCommand(context.vocabulary, owner, file, context.clock())
      );
    });

  program
    .command('export <owner>')
    .description("Export a user's deck as CSV")
    .option('-o, --output <file>', 'Output file path')
    .action(async (owner: string, options: { output?: string }) => {
      await withContext(config, (context) =>
        runExportCommand(context.vocabulary, owner, options, context.clock())
      );
    });

  program
    .command('users')
    .description('List registered users')
    .action(async () => {
      await withContext(config, (context) =>
        runUsersCommand(context.repositories.preferences, context.repositories.cards)
      );
    });

  program
    .command('sweep')
    .description('Remove expired quiz questions and idle review sessions once')
    .option('--reminders', 'Also send due reminders', false)
    .action(async (options: { reminders: boolean }) => {
      await withContext(config, (context) => runSweepCommand(context, options));
    });

  return program;
}

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  await createProgram(config).parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    console.error(red(`Configuration error: ${error.message}`));
    for (const invalid of error.invalidVars) {
      console.error(dim(`  ${invalid.name}: ${invalid.reason}`));
    }
  } else if (error instanceof AppError) {
    console.error(red(`Error: ${error.message}`));
  } else {
    console.error(red('Error:'), error);
  }
  process.exit(1);
});
