/**
 * Caesar (fixed shift) cipher over the alphabet window.
 *
 * Encryption normalizes case and rejects characters outside the window.
 * Decryption only normalizes case: characters outside the window are shifted
 * and wrapped like any other, never rejected.
 */

import {
  type AlphabetWindow,
  DEFAULT_ALPHABET,
  assertInBounds,
  mapCodes,
  mod,
  normalizeCase,
} from "./alphabet.js";
import { InvalidArgumentError } from "./errors.js";

function keyOffset(key: number, alphabet: AlphabetWindow): number {
  if (!Number.isInteger(key)) {
    throw new InvalidArgumentError(
      `Caesar key must be an integer, got ${key}`,
      "INVALID_KEY",
    );
  }
  return mod(key, alphabet.range);
}

/**
 * Shift every character of `plaintext` forward by `key` positions.
 *
 * @param key - Any integer of any magnitude; negative and out-of-range keys wrap
 * @throws InvalidArgumentError if the uppercased plaintext leaves the window
 */
export function encryptCaesar(
  plaintext: string,
  key: number,
  alphabet: AlphabetWindow = DEFAULT_ALPHABET,
): string {
  const offset = keyOffset(key, alphabet);
  const normalized = normalizeCase(plaintext);
  assertInBounds(normalized, alphabet);

  const { lowerBound, range } = alphabet;
  return mapCodes(
    normalized,
    (code) => mod(code - lowerBound + offset, range) + lowerBound,
  );
}

/**
 * Shift every character of `ciphertext` back by `key` positions.
 * Inverse of {@link encryptCaesar} for the same key and alphabet.
 */
export function decryptCaesar(
  ciphertext: string,
  key: number,
  alphabet: AlphabetWindow = DEFAULT_ALPHABET,
): string {
  const offset = keyOffset(key, alphabet);
  const normalized = normalizeCase(ciphertext);

  const { lowerBound, range } = alphabet;
  return mapCodes(
    normalized,
    (code) => mod(code - lowerBound - offset + range, range) + lowerBound,
  );
}
