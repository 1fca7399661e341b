import { InvalidArgumentError } from "../src/errors.js";

/** Run `fn` and return the InvalidArgumentError it throws. */
export function captureInvalidArgument(fn: () => unknown): InvalidArgumentError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidArgumentError) return error;
    throw error;
  }
  throw new Error("Expected InvalidArgumentError to be thrown");
}

/** Every character of the default window, space through underscore. */
export const FULL_WINDOW = Array.from({ length: 64 }, (_, i) =>
  String.fromCharCode(0x20 + i),
).join("");
