/** Reasons a cipher operation can reject its arguments */
export type InvalidArgumentCode =
  | "OUT_OF_BOUNDS"
  | "EMPTY_KEY"
  | "INVALID_KEY"
  | "INVALID_LENGTH"
  | "INVALID_ALPHABET"
  | "INVALID_REQUEST";

/**
 * Error thrown when a cipher operation is called with arguments it cannot
 * transform. Raised before any output is produced.
 */
export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly code: InvalidArgumentCode,
    /** Position of the offending character, for OUT_OF_BOUNDS */
    public readonly index?: number,
  ) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}
