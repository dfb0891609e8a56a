export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console-backed logger. Messages below `minLevel` are dropped and every
 * line is prefixed with `[scope]`.
 */
export function createConsoleLogger(
  scope: string,
  minLevel: LogLevel = "info",
  sink: Pick<Console, LogLevel> = console,
): Logger {
  const write =
    (level: LogLevel) =>
    (message: string, ...details: unknown[]) => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
      sink[level](`[${scope}] ${message}`, ...details);
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
