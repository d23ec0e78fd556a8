/**
 * Logger
 *
 * The narrow logging surface the core and the background loops write to.
 * `console` satisfies it, and tests pass a recording fake. Messages carry
 * a bracketed component prefix such as `[reminders]`.
 */

export interface Logger {
  log(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/** Logger that writes to the process console. */
export const consoleLogger: Logger = console;

/** Logger that drops everything (CLI runs that print their own output). */
export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
