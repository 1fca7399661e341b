import { InvalidArgumentError } from "./errors.js";

/**
 * Repeat `key` until it is exactly `length` characters long, truncating the
 * last repetition.
 *
 * @throws InvalidArgumentError if `key` is empty or `length` is not a non-negative integer
 */
export function repeatToLength(key: string, length: number): string {
  if (key.length === 0) {
    throw new InvalidArgumentError("Key must not be empty", "EMPTY_KEY");
  }
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new InvalidArgumentError(
      `Key stream length must be a non-negative integer, got ${length}`,
      "INVALID_LENGTH",
    );
  }

  const repetitions = Math.ceil(length / key.length);
  return key.repeat(repetitions).slice(0, length);
}
