/**
 * Structured Logging with Pino
 *
 * Provides a singleton Pino logger with structured JSON output on stderr.
 * In development, uses pino-pretty for human-readable logs.
 * stdout is left to the CLI summary.
 *
 * Configuration:
 * - LOG_LEVEL env var (default: 'info')
 * - NODE_ENV controls pretty-printing
 */

import { pino, type Logger as PinoLogger, type DestinationStream } from "pino";
import { resolveLogLevel, type LogLevel } from "./config.js";

export type Logger = PinoLogger;

/**
 * Root logger options
 */
export interface RootLoggerOptions {
  level: LogLevel;
  /** Human-readable output through pino-pretty */
  pretty: boolean;
  /** Where JSON lines go; stderr keeps stdout for the CLI summary */
  destination?: DestinationStream;
}

/**
 * Build the root logger. Output always goes to stderr unless a destination is given.
 */
export function createRootLogger(options: RootLoggerOptions): Logger {
  const { level, pretty, destination = process.stderr } = options;

  if (pretty) {
    return pino({
      name: "mackerel-alert-export",
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss.l",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(
    {
      name: "mackerel-alert-export",
      level,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination
  );
}

/**
 * Singleton logger instance.
 * Pretty-prints in development, JSON otherwise.
 */
export const logger: Logger = createRootLogger({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  pretty: process.env.NODE_ENV === "development",
});

/**
 * Context bound to every line of a run
 */
export interface LoggerContext {
  period?: string;
  timeZone?: string;
  outputPath?: string;
}

/**
 * Create a child logger with bound context fields.
 *
 * @example
 * ```ts
 * const log = createLogger({ period: "2026-09" })
 * log.info("fetch alerts")
 * // => {"level":"info","period":"2026-09","msg":"fetch alerts"}
 * ```
 */
export function createLogger(context: LoggerContext, parent: Logger = logger): Logger {
  return parent.child(context);
}
