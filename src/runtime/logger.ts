/** Logger port and its console-backed implementation. */

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

type Sink = (line: string) => void;

/**
 * Logger writing one line per entry: `LEVEL message {fields}`.
 * debug/info go to stdout, warn/error to stderr.
 */
export function createConsoleLogger(
  level: LogLevel = "info",
  sinks: { out?: Sink; err?: Sink } = {},
): Logger {
  const out: Sink = sinks.out ?? ((line) => console.log(line));
  const err: Sink = sinks.err ?? ((line) => console.error(line));
  const threshold = RANK[level];

  const emit =
    (entryLevel: Exclude<LogLevel, "silent">, sink: Sink) =>
    (message: string, fields?: Record<string, unknown>): void => {
      if (RANK[entryLevel] < threshold) return;
      const suffix =
        fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
      sink(`${entryLevel.toUpperCase()} ${message}${suffix}`);
    };

  return {
    debug: emit("debug", out),
    info: emit("info", out),
    warn: emit("warn", err),
    error: emit("error", err),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
