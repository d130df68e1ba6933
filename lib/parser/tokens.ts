/**
 * Wire tokenizer.
 *
 * A program is a whitespace-separated list of tokens. The first character
 * of a token is its indicator and selects the grammar category; the rest is
 * the body.
 *
 * @module
 */

export interface Token {
  indicator: string;
  body: string;
  /** The token exactly as written. */
  literal: string;
  /** Position of the token in the stream, counting from zero. */
  offset: number;
}

const WHITESPACE_REGEX = /\s+/;

export const mkToken = (literal: string, offset: number): Token => ({
  indicator: literal.charAt(0),
  body: literal.slice(1),
  literal,
  offset,
});

export function tokenize(text: string): Token[] {
  return text
    .split(WHITESPACE_REGEX)
    .filter((literal) => literal.length > 0)
    .map(mkToken);
}
