/**
 * Alphabet window shared by both ciphers.
 *
 * The window is a closed range of UTF-16 code units [lowerBound, upperBound].
 * Every transform works modulo the window's range and re-offsets the result
 * into the window, so valid input always produces valid output.
 */

import { InvalidArgumentError } from "./errors.js";

/** Lowest code unit in the default window (space) */
export const LOWER_BOUND = 0x20;

/** Highest code unit in the default window (underscore) */
export const UPPER_BOUND = 0x5f;

/** Number of code units in the default window */
export const RANGE = UPPER_BOUND - LOWER_BOUND + 1;

const MAX_CODE_UNIT = 0xffff;

export interface AlphabetWindow {
  readonly lowerBound: number;
  readonly upperBound: number;
  /** upperBound - lowerBound + 1 */
  readonly range: number;
}

function isCodeUnit(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_CODE_UNIT;
}

function formatCode(code: number): string {
  return `0x${code.toString(16).padStart(2, "0")}`;
}

/**
 * Build an immutable alphabet window.
 *
 * @throws InvalidArgumentError if either bound is not a code unit or the bounds are reversed
 */
export function createAlphabet(
  lowerBound: number,
  upperBound: number,
): AlphabetWindow {
  if (!isCodeUnit(lowerBound) || !isCodeUnit(upperBound)) {
    throw new InvalidArgumentError(
      `Alphabet bounds must be integer code units between 0x00 and 0xffff, got ${lowerBound} and ${upperBound}`,
      "INVALID_ALPHABET",
    );
  }
  if (lowerBound > upperBound) {
    throw new InvalidArgumentError(
      `Alphabet lower bound ${formatCode(lowerBound)} is above upper bound ${formatCode(upperBound)}`,
      "INVALID_ALPHABET",
    );
  }
  return Object.freeze({
    lowerBound,
    upperBound,
    range: upperBound - lowerBound + 1,
  });
}

/** Space through underscore: digits, uppercase letters and common punctuation */
export const DEFAULT_ALPHABET: AlphabetWindow = createAlphabet(
  LOWER_BOUND,
  UPPER_BOUND,
);

/**
 * Mathematical modulo. Unlike `%`, the result is never negative for a
 * positive modulus.
 */
export function mod(value: number, modulus: number): number {
  return ((value % modulus) + modulus) % modulus;
}

/** Reduce any code (above, below or inside the window) into the window. */
export function wrapIntoWindow(code: number, alphabet: AlphabetWindow): number {
  return mod(code - alphabet.lowerBound, alphabet.range) + alphabet.lowerBound;
}

/**
 * Uppercase each code unit on its own. A unit whose uppercase form is longer
 * than one unit ("ß" -> "SS") is kept as it is, so the result always has the
 * same length as the input.
 */
export function normalizeCase(text: string): string {
  let result = "";
  for (let i = 0; i < text.length; i++) {
    const unit = text.charAt(i);
    const upper = unit.toUpperCase();
    result += upper.length === 1 ? upper : unit;
  }
  return result;
}

/**
 * Index of the first character outside the window, or -1 when every
 * character is inside it.
 */
export function findOutOfBounds(
  text: string,
  alphabet: AlphabetWindow = DEFAULT_ALPHABET,
): number {
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code < alphabet.lowerBound || code > alphabet.upperBound) {
      return i;
    }
  }
  return -1;
}

/** True if every character of `text` lies inside the window. */
export function isInBounds(
  text: string,
  alphabet: AlphabetWindow = DEFAULT_ALPHABET,
): boolean {
  return findOutOfBounds(text, alphabet) === -1;
}

/**
 * @throws InvalidArgumentError carrying the index of the first character outside the window
 */
export function assertInBounds(
  text: string,
  alphabet: AlphabetWindow = DEFAULT_ALPHABET,
): void {
  const index = findOutOfBounds(text, alphabet);
  if (index === -1) return;

  const code = text.charCodeAt(index);
  throw new InvalidArgumentError(
    `Input contains character ${formatCode(code)} at index ${index}, outside ${formatCode(alphabet.lowerBound)}-${formatCode(alphabet.upperBound)}`,
    "OUT_OF_BOUNDS",
    index,
  );
}

/** Apply `shift` to every code unit of `text`. */
export function mapCodes(
  text: string,
  shift: (code: number, index: number) => number,
): string {
  let result = "";
  for (let i = 0; i < text.length; i++) {
    result += String.fromCharCode(shift(text.charCodeAt(i), i));
  }
  return result;
}
