/**
 * Diagnostics logger for the CLI.
 *
 * Everything goes to stderr so that JSON and SARIF on stdout stay parseable.
 * Errors are always printed; --quiet silences the rest and --debug adds
 * [DEBUG] lines.
 */

export type LogLevel = "error" | "info" | "debug";

interface LoggerState {
  quiet: boolean;
  debug: boolean;
}

const state: LoggerState = {
  quiet: false,
  debug: false,
};

/**
 * Apply the global --quiet / --debug flags. Quiet wins over debug.
 */
export function configureLogger(options: { quiet?: boolean; debug?: boolean }): void {
  state.quiet = options.quiet ?? false;
  state.debug = state.quiet ? false : (options.debug ?? false);
}

export function getLoggerState(): Readonly<LoggerState> {
  return { ...state };
}

/**
 * Reset logger to defaults (for tests).
 */
export function resetLogger(): void {
  configureLogger({});
}

function enabled(level: LogLevel): boolean {
  switch (level) {
    case "error":
      return true;
    case "info":
      return !state.quiet;
    case "debug":
      return !state.quiet && state.debug;
  }
}

export function warn(message: string): void {
  if (enabled("info")) console.error(message);
}

export function info(message: string): void {
  if (enabled("info")) console.error(message);
}

export function debug(message: string): void {
  if (enabled("debug")) console.error(`[DEBUG] ${message}`);
}

export function error(message: string): void {
  console.error(message);
}
