/**
 * CLI Import/Export Commands
 *
 * Load a CSV file into a user's deck, or write the deck out, without going
 * through the chat. Both use the same VocabularyService the bot does, so
 * files behave identically on either path.
 *
 * ```bash
 * npm run cli -- import 42 words.csv
 * npm run cli -- export 42 -o backup.csv
 * ```
 */

import { readFile, writeFile } from 'node:fs/promises';
import type { VocabularyService } from '@/core/vocabulary';
import { dim, green, yellow } from '../utils/terminal';

export async function runImportCommand(
  vocabulary: VocabularyService,
  owner: string,
  file: string,
  now: Date
): Promise<void> {
  const text = await readFile(file, 'utf8');
  const result = await vocabulary.importCsv(owner, text, now);

  console.log(green(`Imported ${result.created} new and ${result.updated} updated pairs for ${owner}.`));
  if (result.rejected.length > 0) {
    console.log(yellow(`Skipped ${result.rejected.length} rows:`));
    for (const row of result.rejected) {
      console.log(dim(`  line ${row.line}: ${row.content} (${row.reason})`));
    }
  }
}

export interface ExportCommandOptions {
  /** Output path; defaults to the dated file name in the working directory */
  output?: string;
}

export async function runExportCommand(
  vocabulary: VocabularyService,
  owner: string,
  options: ExportCommandOptions,
  now: Date
): Promise<void> {
  const file = await vocabulary.exportCsv(owner, now);
  const path = options.output ?? file.fileName;
  await writeFile(path, file.content, 'utf8');
  console.log(green(`Exported ${file.count} cards to ${path}`));
}
