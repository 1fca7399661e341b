import { homedir } from "node:os";
import { join } from "node:path";
import { type LogConfig, type LogLevel, isLogLevel } from "./logger.js";

export interface CliConfig {
  /** Parent of the default log directory (default: ~/.classic-ciphers/) */
  dataDir: string;
  /** Logging configuration */
  logging: LogConfig;
}

type Env = Record<string, string | undefined>;

function getEnvBoolean(
  env: Env,
  name: string,
  defaultValue: boolean,
): boolean {
  const value = env[name];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() !== "false" && value !== "0";
}

function getEnvLogLevel(
  env: Env,
  name: string,
  defaultValue: LogLevel,
): LogLevel {
  const value = env[name]?.toLowerCase();
  if (value === undefined || !isLogLevel(value)) return defaultValue;
  return value;
}

export function loadConfig(env: Env = process.env): CliConfig {
  const dataDir = env.CIPHER_DATA_DIR ?? join(homedir(), ".classic-ciphers");
  const logLevel = getEnvLogLevel(env, "CIPHER_LOG_LEVEL", "warn");

  return {
    dataDir,
    logging: {
      logDir: env.CIPHER_LOG_DIR ?? join(dataDir, "logs"),
      logFile: env.CIPHER_LOG_FILE ?? "cipher.log",
      consoleLevel: logLevel,
      fileLevel: getEnvLogLevel(env, "CIPHER_LOG_FILE_LEVEL", logLevel),
      logToConsole: getEnvBoolean(env, "CIPHER_LOG_TO_CONSOLE", true),
      logToFile: getEnvBoolean(env, "CIPHER_LOG_TO_FILE", false),
      prettyPrint: getEnvBoolean(
        env,
        "CIPHER_LOG_PRETTY",
        env.NODE_ENV !== "production",
      ),
    },
  };
}
