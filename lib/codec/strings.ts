/**
 * String substitution cipher.
 *
 * Strings travel as printable ASCII where each character stands for the
 * alphabet entry at the same position. Characters outside the table pass
 * through unchanged in both directions.
 *
 * @module
 */
import { mkString, type StringValue } from "../terms/value.js";
import { STRING_ALPHABET, wireChar } from "./alphabet.js";

const DECODE_TABLE: ReadonlyMap<string, string> = new Map(
  Array.from(STRING_ALPHABET, (ch, i): [string, string] => [wireChar(i), ch]),
);

const ENCODE_TABLE: ReadonlyMap<string, string> = new Map(
  Array.from(STRING_ALPHABET, (ch, i): [string, string] => [ch, wireChar(i)]),
);

const translate = (
  input: string,
  table: ReadonlyMap<string, string>,
): string => Array.from(input, (ch) => table.get(ch) ?? ch).join("");

/**
 * Decodes a wire string body, e.g. `B%,,/}Q/2,$_` → `Hello World!`.
 */
export const decodeString = (encoded: string): StringValue =>
  mkString(translate(encoded, DECODE_TABLE));

/**
 * Encodes human-readable text into its wire body.
 */
export const encodeString = (source: string): string =>
  translate(source, ENCODE_TABLE);
