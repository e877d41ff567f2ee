/**
 * 0 = errors only, 1 = info (-v), 2 = debug (-vv)
 */
export type Verbosity = 0 | 1 | 2;

export interface Logger {
  readonly verbosity: Verbosity;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export type LogSink = (line: string) => void;

export function toVerbosity(count: number): Verbosity {
  if (count >= 2) return 2;
  return count === 1 ? 1 : 0;
}

/**
 * Run-scoped logger. Everything goes to stderr; stdout is reserved for
 * dry-run output.
 */
export function createLogger(verbosity: Verbosity, sink: LogSink = (line) => console.error(line)): Logger {
  return {
    verbosity,
    error: (message) => sink(`ERROR: ${message}`),
    warn: (message) => sink(`WARNING: ${message}`),
    info: (message) => {
      if (verbosity >= 1) sink(message);
    },
    debug: (message) => {
      if (verbosity >= 2) sink(`DEBUG: ${message}`);
    },
  };
}

/** Discards everything; for callers that do not log */
export const silentLogger: Logger = createLogger(0, () => {});
