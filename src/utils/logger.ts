/**
 * JSON-lines logger. One object per line on stdout, errors on stderr.
 * The level comes from `LOG_LEVEL` (default `info`) at each call.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  readonly component?: string;
  readonly [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const isLogLevel = (value: string): value is LogLevel =>
  Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);

const configuredLevel = (): LogLevel => {
  const level = process.env["LOG_LEVEL"]?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : "info";
};

const shouldLog = (level: LogLevel): boolean =>
  LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[configuredLevel()];

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** A logger whose entries carry `context` in addition to this one's. */
  child(context: LogContext): Logger;
}

/**
 * Creates a logger that stamps every entry with `defaultContext`.
 *
 * @example
 * ```ts
 * createLogger({ component: "pipeline" }).info("Generated", { files: 6 });
 * // stdout: {"level":"info","message":"Generated","timestamp":"...","component":"pipeline","files":6}
 * ```
 */
export const createLogger = (defaultContext: LogContext = {}): Logger => {
  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (!shouldLog(level)) return;

    const line = JSON.stringify({
      level,
      message,
      timestamp: new Date().toISOString(),
      ...defaultContext,
      ...context,
    });
    if (level === "error") {
      process.stderr.write(`${line}\n`);
    } else {
      process.stdout.write(`${line}\n`);
    }
  };

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (context) => createLogger({ ...defaultContext, ...context }),
  };
};

export const logger = createLogger({ component: "ddb-repo-codegen" });
