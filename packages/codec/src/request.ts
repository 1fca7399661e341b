import { z } from "zod";
import { type AlphabetWindow, DEFAULT_ALPHABET } from "./alphabet.js";
import { decryptBellaso, encryptBellaso } from "./bellaso.js";
import { decryptCaesar, encryptCaesar } from "./caesar.js";
import { InvalidArgumentError } from "./errors.js";

const DirectionSchema = z.enum(["encrypt", "decrypt"]);

export type CipherDirection = z.infer<typeof DirectionSchema>;

const CaesarRequestSchema = z.object({
  cipher: z.literal("caesar"),
  direction: DirectionSchema,
  text: z.string(),
  key: z.number().int(),
});

const BellasoRequestSchema = z.object({
  cipher: z.literal("bellaso"),
  direction: DirectionSchema,
  text: z.string(),
  key: z.string().min(1),
});

/**
 * A single cipher operation, as accepted from untyped sources (CLI, JSON).
 * The key type follows the cipher: an integer shift or a key string.
 */
export const CipherRequestSchema = z.discriminatedUnion("cipher", [
  CaesarRequestSchema,
  BellasoRequestSchema,
]);

export type CipherRequest = z.infer<typeof CipherRequestSchema>;

export type CipherName = CipherRequest["cipher"];

export interface CipherResult {
  cipher: CipherName;
  direction: CipherDirection;
  /** Text as given in the request, before case normalization */
  input: string;
  output: string;
  /** Length of the output, always equal to the input length */
  length: number;
}

/**
 * Validate an untyped value as a cipher request.
 *
 * @throws InvalidArgumentError listing every schema issue
 */
export function parseCipherRequest(input: unknown): CipherRequest {
  const result = CipherRequestSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(
      `Invalid cipher request: ${details}`,
      "INVALID_REQUEST",
    );
  }
  return result.data;
}

function transform(request: CipherRequest, alphabet: AlphabetWindow): string {
  switch (request.cipher) {
    case "caesar":
      return request.direction === "encrypt"
        ? encryptCaesar(request.text, request.key, alphabet)
        : decryptCaesar(request.text, request.key, alphabet);
    case "bellaso":
      return request.direction === "encrypt"
        ? encryptBellaso(request.text, request.key, alphabet)
        : decryptBellaso(request.text, request.key, alphabet);
  }
}

/** Run the operation a request describes. */
export function runCipher(
  request: CipherRequest,
  alphabet: AlphabetWindow = DEFAULT_ALPHABET,
): CipherResult {
  const output = transform(request, alphabet);
  return {
    cipher: request.cipher,
    direction: request.direction,
    input: request.text,
    output,
    length: output.length,
  };
}
