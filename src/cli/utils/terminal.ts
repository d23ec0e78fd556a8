/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape wrappers for colorizing CLI output, plus a fixed-width table
 * printer. In non-TTY environments the codes pass through harmlessly.
 *
 * ```typescript
 * console.log(green('Imported 12 new pairs'));
 * console.log(formatTable(['owner', 'cards'], [['42', '12']]));
 * ```
 */

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/** Secondary information such as hints and ids. */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

/**
 * A horizontal line of box-drawing characters.
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

export function printBlankLine(): void {
  console.log('');
}

/**
 * Lays rows out in left-aligned columns, the header bold and separated by
 * a line. Column widths follow the longest cell.
 */
export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const line = (cells: string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join('  ')
      .trimEnd();

  const total = widths.reduce((sum, width) => sum + width, 0) + 2 * (widths.length - 1);
  return [bold(line(headers)), formatSeparator(total), ...rows.map(line)].join('\n');
}
