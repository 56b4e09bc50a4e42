import { type Logger, destination, pino } from "pino";

export type LogLevel =
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace"
  | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export interface LoggerOptions {
  level?: LogLevel;
  /** Pretty-print with colors. Defaults to whether stderr is a terminal. */
  pretty?: boolean;
}

let logger: Logger | null = null;

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create the process-wide logger. Output goes to stderr so log lines never
 * mix with the menu on stdout.
 */
export function initLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : "warn");
  const pretty =
    (options.pretty ?? process.stderr.isTTY === true) && level !== "silent";

  logger = pretty
    ? pino({
        level,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            destination: 2,
          },
        },
      })
    : pino({ level }, destination(2));

  return logger;
}

export function getLogger(): Logger {
  return logger ?? initLogger();
}
