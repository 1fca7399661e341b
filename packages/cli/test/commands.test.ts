import { pino } from "pino";
import { describe, expect, it, vi } from "vitest";
import {
  type CliIO,
  EXIT_OK,
  EXIT_REJECTED,
  EXIT_USAGE,
  runCli,
  stripTrailingNewline,
} from "../src/commands.js";
import { createLogger } from "../src/logger.js";

const silentLogger = createLogger({
  logDir: "unused",
  logFile: "unused.log",
  consoleLevel: "silent",
  fileLevel: "silent",
  logToConsole: false,
  logToFile: false,
  prettyPrint: false,
});

function createIO(stdin = "") {
  const out: string[] = [];
  const err: string[] = [];
  const readStdin = vi.fn(async () => stdin);
  const io: CliIO = {
    stdout: (line) => {
      out.push(line);
    },
    stderr: (line) => {
      err.push(line);
    },
    readStdin,
  };
  return { io, out, err, readStdin };
}

describe("runCli", () => {
  describe("cipher commands", () => {
    it("encrypts with Caesar", async () => {
      const { io, out, err, readStdin } = createIO();
      const code = await runCli(
        ["encrypt", "caesar", "--key", "3", "HELLO"],
        io,
        silentLogger,
      );

      expect(code).toBe(EXIT_OK);
      expect(out).toEqual(["KHOOR"]);
      expect(err).toEqual([]);
      expect(readStdin).not.toHaveBeenCalled();
    });

    it("decrypts with Caesar and a lowercase ciphertext", async () => {
      const { io, out } = createIO();
      await runCli(["decrypt", "caesar", "--key=3", "khoor"], io, silentLogger);
      expect(out).toEqual(["HELLO"]);
    });

    it("accepts negative Caesar keys", async () => {
      const { io, out } = createIO();
      await runCli(
        ["encrypt", "caesar", "--key", "-61", "HELLO"],
        io,
        silentLogger,
      );
      expect(out).toEqual(["KHOOR"]);
    });

    it("keeps every digit of a Caesar key beyond double precision", async () => {
      // 99999999999999999999 is 63 mod 64, a shift of -1
      const { io, out } = createIO();
      await runCli(
        ["encrypt", "caesar", "--key", "99999999999999999999", "HELLO"],
        io,
        silentLogger,
      );
      expect(out).toEqual(["GDKKN"]);
    });

    it("accepts a Caesar key with a leading plus sign", async () => {
      const { io, out } = createIO();
      await runCli(["encrypt", "caesar", "--key=+3", "HELLO"], io, silentLogger);
      expect(out).toEqual(["KHOOR"]);
    });

    it("encrypts text that starts with a dash after --", async () => {
      const { io, out } = createIO();
      await runCli(
        ["encrypt", "caesar", "--key", "3", "--", "-HI"],
        io,
        silentLogger,
      );
      expect(out).toEqual(["0KL"]);
    });

    it("encrypts with Bellaso", async () => {
      const { io, out } = createIO();
      const code = await runCli(
        ["encrypt", "bellaso", "-k", "AB", "HELLO"],
        io,
        silentLogger,
      );
      expect(code).toBe(EXIT_OK);
      expect(out).toEqual(["IGMNP"]);
    });

    it("reads the text from stdin when it is omitted", async () => {
      const { io, out, readStdin } = createIO("IGMNP\n");
      const code = await runCli(
        ["decrypt", "bellaso", "--key", "AB"],
        io,
        silentLogger,
      );
      expect(code).toBe(EXIT_OK);
      expect(readStdin).toHaveBeenCalledOnce();
      expect(out).toEqual(["HELLO"]);
    });

    it("strips a CRLF line ending from stdin", async () => {
      const { io, out } = createIO("KHOOR\r\n");
      await runCli(["decrypt", "caesar", "--key", "3"], io, silentLogger);
      expect(out).toEqual(["HELLO"]);
    });

    it("logs completed operations at debug", async () => {
      const lines: string[] = [];
      const logger = pino(
        { level: "debug" },
        {
          write: (line: string) => {
            lines.push(line);
          },
        },
      );
      const { io } = createIO();
      await runCli(["encrypt", "caesar", "--key", "3", "HELLO"], io, logger);

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
        level: 20,
        msg: "Cipher operation complete",
        cipher: "caesar",
        direction: "encrypt",
        length: 5,
      });
    });
  });

  describe("check", () => {
    it("reports text inside the window", async () => {
      const { io, out } = createIO();
      const code = await runCli(["check", "HELLO WORLD"], io, silentLogger);
      expect(code).toBe(EXIT_OK);
      expect(out).toEqual(["in bounds"]);
    });

    it("reports the first character outside the window", async () => {
      const { io, out } = createIO();
      const code = await runCli(["check", "HELLo"], io, silentLogger);
      expect(code).toBe(EXIT_REJECTED);
      expect(out).toEqual(["out of bounds at index 4"]);
    });

    it("checks stdin when no text is given", async () => {
      const { io, out } = createIO("OK\n");
      await runCli(["check"], io, silentLogger);
      expect(out).toEqual(["in bounds"]);
    });
  });

  describe("errors", () => {
    it("reports rejected input with exit code 1", async () => {
      const { io, out, err } = createIO();
      const code = await runCli(
        ["encrypt", "caesar", "--key", "3", "hello\u0001"],
        io,
        silentLogger,
      );
      expect(code).toBe(EXIT_REJECTED);
      expect(out).toEqual([]);
      expect(err).toEqual([
        "Error: Input contains character 0x01 at index 5, outside 0x20-0x5f",
      ]);
    });

    it("reports an empty Bellaso key as a rejected request", async () => {
      const { io, err } = createIO();
      const code = await runCli(
        ["encrypt", "bellaso", "--key=", "HI"],
        io,
        silentLogger,
      );
      expect(code).toBe(EXIT_REJECTED);
      expect(err).toHaveLength(1);
      expect(err[0]).toMatch(/^Error: Invalid cipher request: key: /);
    });

    it("reports a non-integer Caesar key as a usage error", async () => {
      const { io, err } = createIO();
      const code = await runCli(
        ["encrypt", "caesar", "--key", "three", "HI"],
        io,
        silentLogger,
      );
      expect(code).toBe(EXIT_USAGE);
      expect(err).toEqual([
        'Error: Caesar key must be an integer, got "three"',
        "Run 'cipher --help' for usage information.",
      ]);
    });

    it("reports unknown commands as usage errors", async () => {
      const { io, err } = createIO();
      const code = await runCli(["rotate"], io, silentLogger);
      expect(code).toBe(EXIT_USAGE);
      expect(err[0]).toBe("Error: Unknown command: rotate");
    });

    it("rethrows unexpected failures", async () => {
      const { io } = createIO();
      io.readStdin = async () => {
        throw new Error("stdin closed");
      };
      await expect(
        runCli(["decrypt", "caesar", "--key", "1"], io, silentLogger),
      ).rejects.toThrow("stdin closed");
    });
  });

  describe("help and version", () => {
    it("prints usage", async () => {
      const { io, out } = createIO();
      const code = await runCli(["--help"], io, silentLogger);
      expect(code).toBe(EXIT_OK);
      expect(out).toHaveLength(1);
      expect(out[0]).toMatch(/^cipher - Caesar and Bellaso ciphers/);
    });

    it("prints the package version", async () => {
      const { io, out } = createIO();
      await runCli(["--version"], io, silentLogger);
      expect(out).toEqual(["cipher v0.1.0"]);
    });
  });
});

describe("stripTrailingNewline", () => {
  it("removes one trailing newline", () => {
    expect(stripTrailingNewline("A\n")).toBe("A");
    expect(stripTrailingNewline("A\r\n")).toBe("A");
    expect(stripTrailingNewline("A\n\n")).toBe("A\n");
  });

  it("leaves text without a newline alone", () => {
    expect(stripTrailingNewline("A")).toBe("A");
    expect(stripTrailingNewline("")).toBe("");
  });
});
