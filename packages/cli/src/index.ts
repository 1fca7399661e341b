export { parseArgs, UsageError, type CliCommand } from "./args.js";
export {
  EXIT_OK,
  EXIT_REJECTED,
  EXIT_USAGE,
  HELP_TEXT,
  getVersion,
  runCli,
  stripTrailingNewline,
  type CliIO,
} from "./commands.js";
export { loadConfig, type CliConfig } from "./config.js";
export {
  LOG_LEVELS,
  createLogger,
  isLogLevel,
  type LogConfig,
  type LogLevel,
} from "./logger.js";
