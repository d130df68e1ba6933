/**
 * Codec error definitions.
 *
 * This module defines the error raised when text cannot be translated to or
 * from the base-94 wire encoding.
 *
 * @module
 */

export type CodecErrorKind =
  | "InvalidDigit"
  | "NegativeInteger"
  | "UnencodableCharacter"
  | "AmbiguousVariable";

export class CodecError extends Error {
  constructor(
    message: string,
    public readonly kind: CodecErrorKind,
    /** The text or the integer that could not be translated. */
    public readonly input: string,
  ) {
    super(message);
    this.name = "CodecError";
  }
}
