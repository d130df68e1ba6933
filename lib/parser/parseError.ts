/**
 * Parse error definitions.
 *
 * This module defines the error raised by the token grammar layer and the
 * renaming parser.
 *
 * @module
 */

export type ParseErrorKind =
  | "EmptyInput"
  | "UnexpectedEndOfInput"
  | "UnknownIndicator"
  | "MalformedToken"
  | "TrailingTokens"
  | "UnknownOperator"
  | "UnrecognizedGrammarRule";

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly kind: ParseErrorKind,
    /** The literal text of the offending token, when there is one. */
    public readonly token?: string,
  ) {
    super(message);
    this.name = "ParseError";
  }
}
