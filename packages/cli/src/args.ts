import type { CipherDirection, CipherName } from "@classic-ciphers/codec";

/** Error thrown when the command line cannot be understood */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "check"; text?: string }
  | {
      kind: "cipher";
      direction: CipherDirection;
      cipher: CipherName;
      /** Raw --key value; interpretation depends on the cipher */
      key: string;
      text?: string;
    };

function isDirection(value: string): value is CipherDirection {
  return value === "encrypt" || value === "decrypt";
}

function isCipherName(value: string): value is CipherName {
  return value === "caesar" || value === "bellaso";
}

/**
 * Parse command line arguments (without the node and script entries).
 *
 * Values that begin with a dash are accepted after --key, so negative
 * Caesar keys need no special quoting. Text that begins with a dash must
 * follow `--`.
 *
 * @throws UsageError on unknown commands, options or missing values
 */
export function parseArgs(argv: readonly string[]): CliCommand {
  const positionals: string[] = [];
  let key: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";

    if (arg === "--help" || arg === "-h") return { kind: "help" };
    if (arg === "--version" || arg === "-v") return { kind: "version" };

    if (arg === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    if (arg === "--key" || arg === "-k") {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`Option ${arg} requires a value`);
      }
      key = value;
      i++;
      continue;
    }

    if (arg.startsWith("--key=")) {
      key = arg.slice("--key=".length);
      continue;
    }

    if (arg.length > 1 && arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    positionals.push(arg);
  }

  const [command, ...rest] = positionals;

  if (command === undefined) {
    throw new UsageError("Missing command");
  }

  if (command === "check") {
    if (key !== undefined) {
      throw new UsageError("check does not take --key");
    }
    if (rest.length > 1) {
      throw new UsageError(`Unexpected arguments: ${rest.slice(1).join(" ")}`);
    }
    return { kind: "check", text: rest[0] };
  }

  if (!isDirection(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }

  const [cipher, text, ...extra] = rest;
  if (cipher === undefined) {
    throw new UsageError(`Missing cipher for ${command}`);
  }
  if (!isCipherName(cipher)) {
    throw new UsageError(`Unknown cipher: ${cipher}`);
  }
  if (key === undefined) {
    throw new UsageError(`Missing --key for ${command}`);
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected arguments: ${extra.join(" ")}`);
  }

  return { kind: "cipher", direction: command, cipher, key, text };
}
