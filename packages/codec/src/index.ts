export {
  LOWER_BOUND,
  UPPER_BOUND,
  RANGE,
  DEFAULT_ALPHABET,
  createAlphabet,
  findOutOfBounds,
  isInBounds,
  normalizeCase,
  type AlphabetWindow,
} from "./alphabet.js";

export { InvalidArgumentError, type InvalidArgumentCode } from "./errors.js";

export { repeatToLength } from "./keystream.js";

export { encryptCaesar, decryptCaesar } from "./caesar.js";

export { encryptBellaso, decryptBellaso } from "./bellaso.js";

export {
  CipherRequestSchema,
  parseCipherRequest,
  runCipher,
  type CipherDirection,
  type CipherName,
  type CipherRequest,
  type CipherResult,
} from "./request.js";
