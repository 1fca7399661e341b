import * as fs from "node:fs";
import {
  type CipherRequest,
  InvalidArgumentError,
  RANGE,
  findOutOfBounds,
  parseCipherRequest,
  runCipher,
} from "@classic-ciphers/codec";
import type { pino } from "pino";
import { z } from "zod";
import { type CliCommand, UsageError, parseArgs } from "./args.js";

export const EXIT_OK = 0;
export const EXIT_REJECTED = 1;
export const EXIT_USAGE = 2;

/** Terminal access, injected so commands can run without a process */
export interface CliIO {
  /** Write one line to stdout */
  stdout(line: string): void;
  /** Write one line to stderr */
  stderr(line: string): void;
  /** Read all of stdin */
  readStdin(): Promise<string>;
}

export const HELP_TEXT = `
cipher - Caesar and Bellaso ciphers over the space-to-underscore alphabet

USAGE:
  cipher <encrypt|decrypt> <caesar|bellaso> --key <key> [text]
  cipher check [text]

OPTIONS:
  --key, -k <key>   Integer shift (caesar) or key string (bellaso)
  --help, -h        Show this help message
  --version, -v     Show version number

Text is read from stdin when omitted. Use -- before text that starts with
a dash. Input is uppercased before encryption; characters outside
' ' (0x20) to '_' (0x5f) are rejected. check tests the text as given.

ENVIRONMENT VARIABLES:
  CIPHER_LOG_LEVEL        Console log level (default: warn)
  CIPHER_LOG_FILE_LEVEL   File log level (default: console level)
  CIPHER_LOG_TO_CONSOLE   Log to stderr (default: true)
  CIPHER_LOG_TO_FILE      Log to file (default: false)
  CIPHER_LOG_DIR          Log directory (default: ~/.classic-ciphers/logs)
  CIPHER_LOG_FILE         Log filename (default: cipher.log)
  CIPHER_LOG_PRETTY       Pretty console logs (default: true unless production)

EXAMPLES:
  cipher encrypt caesar --key 3 HELLO
  echo KHOOR | cipher decrypt caesar --key=-61
  cipher encrypt bellaso --key SECRET "ATTACK AT DAWN"
`.trim();

const PackageJsonSchema = z.object({ version: z.string() });

export function getVersion(): string {
  try {
    const packageJsonPath = new URL("../package.json", import.meta.url);
    const raw: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
    const parsed = PackageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : "unknown";
  } catch {
    return "unknown";
  }
}

/** Strip a single trailing newline left by `echo` or a terminal. */
export function stripTrailingNewline(text: string): string {
  if (text.endsWith("\r\n")) return text.slice(0, -2);
  if (text.endsWith("\n")) return text.slice(0, -1);
  return text;
}

async function resolveText(
  text: string | undefined,
  io: CliIO,
): Promise<string> {
  if (text !== undefined) return text;
  return stripTrailingNewline(await io.readStdin());
}

function parseCaesarKey(raw: string): number {
  if (!/^[+-]?\d+$/.test(raw)) {
    throw new UsageError(`Caesar key must be an integer, got "${raw}"`);
  }
  // Reduce before converting: digits beyond double precision change the shift
  return Number(BigInt(raw.replace(/^\+/, "")) % BigInt(RANGE));
}

function buildRequest(
  command: Extract<CliCommand, { kind: "cipher" }>,
  text: string,
): CipherRequest {
  const key =
    command.cipher === "caesar" ? parseCaesarKey(command.key) : command.key;
  return parseCipherRequest({
    cipher: command.cipher,
    direction: command.direction,
    text,
    key,
  });
}

async function execute(
  command: CliCommand,
  io: CliIO,
  logger: pino.Logger,
): Promise<number> {
  switch (command.kind) {
    case "help":
      io.stdout(HELP_TEXT);
      return EXIT_OK;

    case "version":
      io.stdout(`cipher v${getVersion()}`);
      return EXIT_OK;

    case "check": {
      const text = await resolveText(command.text, io);
      const index = findOutOfBounds(text);
      logger.debug({ length: text.length, index }, "Bounds check");
      if (index === -1) {
        io.stdout("in bounds");
        return EXIT_OK;
      }
      io.stdout(`out of bounds at index ${index}`);
      return EXIT_REJECTED;
    }

    case "cipher": {
      const text = await resolveText(command.text, io);
      const request = buildRequest(command, text);
      const result = runCipher(request);
      logger.debug(
        {
          cipher: result.cipher,
          direction: result.direction,
          length: result.length,
        },
        "Cipher operation complete",
      );
      io.stdout(result.output);
      return EXIT_OK;
    }
  }
}

/**
 * Run the CLI against the given arguments and return the exit code.
 *
 * Usage and input errors are reported on stderr. Anything else is logged
 * and rethrown.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO,
  logger: pino.Logger,
): Promise<number> {
  try {
    return await execute(parseArgs(argv), io, logger);
  } catch (error) {
    if (error instanceof UsageError) {
      logger.debug({ argv }, error.message);
      io.stderr(`Error: ${error.message}`);
      io.stderr("Run 'cipher --help' for usage information.");
      return EXIT_USAGE;
    }
    if (error instanceof InvalidArgumentError) {
      logger.debug({ code: error.code, index: error.index }, "Input rejected");
      io.stderr(`Error: ${error.message}`);
      return EXIT_REJECTED;
    }
    logger.error({ err: error }, "Unexpected failure");
    throw error;
  }
}
