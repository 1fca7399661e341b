#!/usr/bin/env node

/**
 * Entry point for the `cipher` command.
 *
 * Usage:
 *   cipher encrypt caesar --key 3 HELLO
 *   cipher --help
 */

import type { pino } from "pino";
import { type CliIO, runCli } from "./commands.js";
import { loadConfig } from "./config.js";
import { type LogConfig, createLogger } from "./logger.js";

const MINIMUM_NODE_VERSION = 20;

/**
 * Check if Node.js version meets minimum requirements.
 * Returns false (after reporting) if the version is too low.
 */
function checkNodeVersion(): boolean {
  const currentVersion = process.versions.node;
  const majorVersion = Number.parseInt(currentVersion.split(".")[0] ?? "0", 10);

  if (majorVersion < MINIMUM_NODE_VERSION) {
    console.error(`Error: Node.js ${MINIMUM_NODE_VERSION}+ is required.`);
    console.error(`Current version: ${currentVersion}`);
    return false;
  }
  return true;
}

async function readStdin(): Promise<string> {
  process.stdin.setEncoding("utf-8");
  let data = "";
  for await (const chunk of process.stdin) {
    data += String(chunk);
  }
  return data;
}

/** Create the logger, or report why the log file could not be opened. */
function openLogger(logging: LogConfig): pino.Logger | null {
  try {
    return createLogger(logging);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Error: cannot open log file in ${logging.logDir}: ${reason}`);
    console.error("Set CIPHER_LOG_DIR or CIPHER_LOG_TO_FILE=false.");
    return null;
  }
}

const io: CliIO = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
  readStdin,
};

if (!checkNodeVersion()) {
  process.exitCode = 1;
} else {
  const config = loadConfig();
  const logger = openLogger(config.logging);

  if (logger) {
    runCli(process.argv.slice(2), io, logger).then(
      (code) => {
        process.exitCode = code;
      },
      (error: unknown) => {
        console.error(error);
        process.exitCode = 1;
      },
    );
  } else {
    process.exitCode = 1;
  }
}
