/**
 * Wire unparser.
 *
 * Writes an expression back out as a token stream that {@link parseIcfp}
 * accepts. Renamed binder ids are negative and have no base-94 form, so every
 * id is written as its absolute value. For a tree fresh from the parser,
 * re-parsing the output renames the binders in the same order and yields an
 * identical tree. Variables that the written form would resolve differently
 * are refused.
 *
 * @module
 */
import { STRING_ALPHABET } from "../codec/alphabet.js";
import { encodeIntegerBody } from "../codec/base94.js";
import { CodecError } from "../codec/codecError.js";
import { encodeString } from "../codec/strings.js";
import { type Expr, UnaryOperator } from "../terms/expr.js";
import type { Value } from "../terms/value.js";

const absolute = (n: bigint): bigint => (n < 0n ? -n : n);

const encodeStringBody = (text: string): string => {
  for (const ch of text) {
    if (!STRING_ALPHABET.includes(ch)) {
      throw new CodecError(
        `character ${JSON.stringify(ch)} has no wire encoding`,
        "UnencodableCharacter",
        text,
      );
    }
  }
  return encodeString(text);
};

const unparseValue = (value: Value): string => {
  switch (value.kind) {
    case "boolean":
      return value.value ? "T" : "F";
    case "string":
      return `S${encodeStringBody(value.value)}`;
    case "integer":
      return value.value < 0n
        ? `U${UnaryOperator.Negate} I${encodeIntegerBody(-value.value)}`
        : `I${encodeIntegerBody(value.value)}`;
  }
};

/**
 * Checks that `v<|id|>` read back under `binders` (innermost last) resolves
 * to `id` again: to the nearest binder written with the same numeral, or,
 * for a non-negative id, to no binder at all.
 */
const checkVariable = (id: bigint, binders: readonly bigint[]): void => {
  const written = absolute(id);
  let resolved: bigint | undefined;
  for (const binder of binders) {
    if (absolute(binder) === written) {
      resolved = binder;
    }
  }
  if (resolved === undefined ? id < 0n : resolved !== id) {
    throw new CodecError(
      `variable v${id} would not refer to the same binder when read back`,
      "AmbiguousVariable",
      `v${id}`,
    );
  }
};

const unparseIn = (expr: Expr, binders: readonly bigint[]): string => {
  const sub = (child: Expr): string => unparseIn(child, binders);
  switch (expr.kind) {
    case "literal":
      return unparseValue(expr.value);
    case "unary":
      return `U${expr.op} ${sub(expr.operand)}`;
    case "binary":
      return `B${expr.op} ${sub(expr.left)} ${sub(expr.right)}`;
    case "if":
      return `? ${sub(expr.condition)} ${sub(expr.thenBranch)}` +
        ` ${sub(expr.elseBranch)}`;
    case "lambda":
      return `L${encodeIntegerBody(absolute(expr.binderId))} ${
        unparseIn(expr.body, [...binders, expr.binderId])
      }`;
    case "variable":
      checkVariable(expr.id, binders);
      return `v${encodeIntegerBody(absolute(expr.id))}`;
  }
};

/**
 * @throws CodecError (`UnencodableCharacter`) for strings outside the
 * alphabet, (`AmbiguousVariable`) for a variable that would be captured by
 * a different binder or lose its sign when read back
 */
export const unparseIcfp = (expr: Expr): string => unparseIn(expr, []);
