/**
 * Base-94 integer bodies.
 *
 * An integer body is a big-endian numeral whose digits are the ASCII
 * characters 33–126 (`!` is 0, `"` is 1, …). Bodies never carry a sign;
 * negative numbers are written with the unary negation operator.
 *
 * @module
 */
import { mkInteger, type IntegerValue } from "../terms/value.js";
import { CodecError } from "./codecError.js";
import { DIGIT_BASE, digitValue, wireChar } from "./alphabet.js";

const BASE = BigInt(DIGIT_BASE);

/**
 * Interprets a base-94 body, wrapping the result to int64.
 *
 * @throws CodecError (`InvalidDigit`) when a character is not printable ASCII
 */
export const decodeIntegerBody = (encoded: string): bigint => {
  let result = 0n;
  for (const ch of encoded) {
    const digit = digitValue(ch);
    if (digit === undefined) {
      throw new CodecError(
        `invalid base-94 digit '${ch}' in integer body "${encoded}"`,
        "InvalidDigit",
        encoded,
      );
    }
    result = result * BASE + BigInt(digit);
  }
  return BigInt.asIntN(64, result);
};

/**
 * Writes a non-negative integer as a base-94 body. Zero is `!`.
 *
 * @throws CodecError (`NegativeInteger`) for values below zero
 */
export const encodeIntegerBody = (value: bigint): string => {
  if (value < 0n) {
    throw new CodecError(
      `cannot encode negative integer ${value} as a base-94 body`,
      "NegativeInteger",
      value.toString(),
    );
  }
  if (value === 0n) {
    return wireChar(0);
  }

  const digits: string[] = [];
  let remaining = value;
  while (remaining > 0n) {
    digits.push(wireChar(Number(remaining % BASE)));
    remaining /= BASE;
  }
  return digits.reverse().join("");
};

export const decodeInteger = (encoded: string): IntegerValue =>
  mkInteger(decodeIntegerBody(encoded));
