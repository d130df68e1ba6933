/**
 * Random program generation.
 *
 * Produces random expressions in source form: binder ids are small
 * non-negative numerals that are deliberately reused across and within
 * scopes, and every variable refers to some enclosing binder.
 *
 * @module
 */
import { STRING_ALPHABET } from "../codec/alphabet.js";
import {
  BinaryOperator,
  type Expr,
  mkBinary,
  mkIf,
  mkLambda,
  mkLiteral,
  mkUnary,
  mkVariable,
  UnaryOperator,
} from "./expr.js";
import { mkBoolean, mkInteger, mkString, type Value } from "./value.js";

/**
 * Simple interface for random number generation.
 * This allows the generator to work with any random number source
 * without bundling specific dependencies.
 */
export interface RandomSource {
  /** Returns a random integer between min (inclusive) and max (inclusive) */
  intBetween(min: number, max: number): number;
}

/** Raw binder ids are drawn from 0 through this value. */
const MAX_RAW_ID = 3;

const pick = <T>(rs: RandomSource, items: readonly T[]): T => {
  const item = items[rs.intBetween(0, items.length - 1)];
  if (item === undefined) {
    throw new Error("cannot pick from an empty list");
  }
  return item;
};

const UNARY_OPERATORS = Object.values(UnaryOperator);
const BINARY_OPERATORS = Object.values(BinaryOperator);

export const randString = (rs: RandomSource, maxLength: number): string => {
  const length = rs.intBetween(0, maxLength);
  let text = "";
  for (let i = 0; i < length; i++) {
    text += STRING_ALPHABET.charAt(rs.intBetween(0, STRING_ALPHABET.length - 1));
  }
  return text;
};

export function randValue(rs: RandomSource): Value {
  const die = rs.intBetween(1, 3);

  if (die === 1) {
    return mkBoolean(rs.intBetween(0, 1) === 1);
  } else if (die === 2) {
    return mkInteger(rs.intBetween(0, 1_000_000));
  } else {
    return mkString(randString(rs, 12));
  }
}

const randLeaf = (rs: RandomSource, scope: readonly bigint[]): Expr =>
  scope.length > 0 && rs.intBetween(0, 1) === 1
    ? mkVariable(pick(rs, scope))
    : mkLiteral(randValue(rs));

/**
 * @param rs the random source to use.
 * @param depth the maximum nesting depth.
 * @param scope raw binder ids visible at this point.
 */
export function randProgram(
  rs: RandomSource,
  depth: number,
  scope: readonly bigint[] = [],
): Expr {
  if (depth <= 0) {
    return randLeaf(rs, scope);
  }

  switch (rs.intBetween(1, 5)) {
    case 1:
      return mkUnary(
        pick(rs, UNARY_OPERATORS),
        randProgram(rs, depth - 1, scope),
      );
    case 2:
      return mkBinary(
        pick(rs, BINARY_OPERATORS),
        randProgram(rs, depth - 1, scope),
        randProgram(rs, depth - 1, scope),
      );
    case 3:
      return mkIf(
        randProgram(rs, depth - 1, scope),
        randProgram(rs, depth - 1, scope),
        randProgram(rs, depth - 1, scope),
      );
    case 4: {
      const rawId = BigInt(rs.intBetween(0, MAX_RAW_ID));
      return mkLambda(rawId, randProgram(rs, depth - 1, [...scope, rawId]));
    }
    default:
      return randLeaf(rs, scope);
  }
}
