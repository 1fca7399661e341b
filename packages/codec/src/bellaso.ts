/**
 * Bellaso cipher: each character is offset by the code of the matching
 * character of a key repeated to the text length.
 *
 * The key is used as given. It is not uppercased or checked against the
 * window, since any code reduces into the window the same way.
 */

import {
  type AlphabetWindow,
  DEFAULT_ALPHABET,
  assertInBounds,
  mapCodes,
  normalizeCase,
  wrapIntoWindow,
} from "./alphabet.js";
import { repeatToLength } from "./keystream.js";

/**
 * @throws InvalidArgumentError if the uppercased plaintext leaves the window or the key is empty
 */
export function encryptBellaso(
  plaintext: string,
  key: string,
  alphabet: AlphabetWindow = DEFAULT_ALPHABET,
): string {
  const normalized = normalizeCase(plaintext);
  assertInBounds(normalized, alphabet);
  const stream = repeatToLength(key, normalized.length);

  return mapCodes(normalized, (code, i) =>
    wrapIntoWindow(code + stream.charCodeAt(i), alphabet),
  );
}

/**
 * Inverse of {@link encryptBellaso}. The ciphertext is checked as given,
 * without case normalization.
 *
 * @throws InvalidArgumentError if the ciphertext leaves the window or the key is empty
 */
export function decryptBellaso(
  ciphertext: string,
  key: string,
  alphabet: AlphabetWindow = DEFAULT_ALPHABET,
): string {
  assertInBounds(ciphertext, alphabet);
  const stream = repeatToLength(key, ciphertext.length);

  return mapCodes(ciphertext, (code, i) =>
    wrapIntoWindow(code - stream.charCodeAt(i), alphabet),
  );
}
