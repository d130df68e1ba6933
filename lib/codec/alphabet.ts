/**
 * Alphabet constants shared by the integer and string codecs.
 *
 * Both encodings draw their symbols from the 94 printable ASCII characters
 * `!` (33) through `~` (126).
 *
 * @module
 */

export const DIGIT_OFFSET = 33;
export const DIGIT_BASE = 94;

/**
 * Human-readable characters in wire order: position `i` is written on the
 * wire as the ASCII character `DIGIT_OFFSET + i`.
 */
export const STRING_ALPHABET =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789" +
  "!\"#$%&'()*+,-./:;<=>?@[\\]^_`|~ \n";

export const wireChar = (position: number): string =>
  String.fromCharCode(DIGIT_OFFSET + position);

/**
 * @returns the digit value of a wire character, or undefined when the
 * character is not printable ASCII.
 */
export const digitValue = (ch: string): number | undefined => {
  const position = ch.charCodeAt(0) - DIGIT_OFFSET;
  return ch.length === 1 && position >= 0 && position < DIGIT_BASE
    ? position
    : undefined;
};
