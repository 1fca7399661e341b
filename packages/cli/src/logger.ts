import * as path from "node:path";
import { pino } from "pino";

/**
 * Valid log levels.
 */
export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogConfig {
  /** Directory for log files */
  logDir: string;
  /** Log filename. Default: cipher.log */
  logFile: string;
  /** Minimum log level for console. Default: warn */
  consoleLevel: LogLevel;
  /** Minimum log level for file. Default: same as console */
  fileLevel: LogLevel;
  /** Log to stderr. Default: true */
  logToConsole: boolean;
  /** Log to file. Default: false */
  logToFile: boolean;
  /** Use pretty printing for console. Default: true outside production */
  prettyPrint: boolean;
}

/**
 * Get the minimum (most verbose) of two log levels.
 */
function getMinLevel(a: LogLevel, b: LogLevel): LogLevel {
  const order: Record<LogLevel, number> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
    fatal: 5,
    silent: 6,
  };
  return order[a] <= order[b] ? a : b;
}

/**
 * Create a logger with the given configuration.
 *
 * Console output goes to stderr: stdout is reserved for cipher output.
 * A stream whose level is "silent" is not opened at all.
 *
 * @throws if the log file cannot be created (the file is opened synchronously)
 */
export function createLogger(config: LogConfig): pino.Logger {
  const streams: pino.StreamEntry[] = [];
  const { consoleLevel, fileLevel } = config;

  if (config.logToConsole && consoleLevel !== "silent") {
    if (config.prettyPrint) {
      const pretty = pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      });
      streams.push({ stream: pretty, level: consoleLevel });
    } else {
      streams.push({ stream: process.stderr, level: consoleLevel });
    }
  }

  if (config.logToFile && fileLevel !== "silent") {
    const fileStream = pino.destination({
      dest: path.join(config.logDir, config.logFile),
      mkdir: true,
      sync: true,
    });
    streams.push({ stream: fileStream, level: fileLevel });
  }

  if (streams.length === 0) {
    return pino({ level: "silent" });
  }

  if (streams.length === 1 && streams[0]) {
    return pino({ level: streams[0].level }, streams[0].stream);
  }

  // pino needs a base level at or below every stream level
  const minLevel = getMinLevel(consoleLevel, fileLevel);
  return pino({ level: minLevel }, pino.multistream(streams));
}
