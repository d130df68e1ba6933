/**
 * Scalar operator semantics.
 *
 * These functions act on values that are already fully evaluated; deciding
 * when operands get forced is the evaluator's business. Integer results wrap
 * to 64 bits, division truncates toward zero and the remainder takes the
 * dividend's sign.
 *
 * @module
 */
import { decodeIntegerBody, encodeIntegerBody } from "../codec/base94.js";
import { decodeString, encodeString } from "../codec/strings.js";
import {
  BinaryOperator,
  binaryOperatorLabel,
  UnaryOperator,
  unaryOperatorLabel,
} from "../terms/expr.js";
import {
  mkBoolean,
  mkInteger,
  mkString,
  type Value,
  valuesEqual,
} from "../terms/value.js";
import { EvaluationError, typeMismatch } from "./evaluationError.js";

/** Every binary operator except application, which is lazy. */
export type StrictBinaryOperator = Exclude<
  BinaryOperator,
  BinaryOperator.Apply
>;

const expectInteger = (operator: string, value: Value): bigint => {
  if (value.kind !== "integer") {
    throw typeMismatch(operator, "integer", value);
  }
  return value.value;
};

const expectBoolean = (operator: string, value: Value): boolean => {
  if (value.kind !== "boolean") {
    throw typeMismatch(operator, "boolean", value);
  }
  return value.value;
};

const expectString = (operator: string, value: Value): string => {
  if (value.kind !== "string") {
    throw typeMismatch(operator, "string", value);
  }
  return value.value;
};

export function applyUnary(op: UnaryOperator, operand: Value): Value {
  const label = unaryOperatorLabel(op);
  switch (op) {
    case UnaryOperator.Negate:
      return mkInteger(-expectInteger(label, operand));
    case UnaryOperator.LogicalNot:
      return mkBoolean(!expectBoolean(label, operand));
    case UnaryOperator.StringToInt:
      return mkInteger(
        decodeIntegerBody(encodeString(expectString(label, operand))),
      );
    case UnaryOperator.IntToString: {
      const n = expectInteger(label, operand);
      // a negative number has no base-94 digits
      return n < 0n ? mkString("") : decodeString(encodeIntegerBody(n));
    }
  }
}

const divisor = (operator: string, value: Value): bigint => {
  const n = expectInteger(operator, value);
  if (n === 0n) {
    throw new EvaluationError(`${operator} by zero`, "DivisionByZero", {
      operator,
      value,
    });
  }
  return n;
};

const sliceCount = (
  operator: string,
  count: Value,
  n: bigint,
  length: number,
): number => {
  if (n < 0n || n > BigInt(length)) {
    throw new EvaluationError(
      `${operator} count ${n} is outside [0, ${length}]`,
      "IndexOutOfRange",
      { operator, value: count },
    );
  }
  return Number(n);
};

export function applyBinary(
  op: StrictBinaryOperator,
  left: Value,
  right: Value,
): Value {
  const label = binaryOperatorLabel(op);
  switch (op) {
    case BinaryOperator.Add:
      return mkInteger(expectInteger(label, left) + expectInteger(label, right));
    case BinaryOperator.Sub:
      return mkInteger(expectInteger(label, left) - expectInteger(label, right));
    case BinaryOperator.Mul:
      return mkInteger(expectInteger(label, left) * expectInteger(label, right));
    case BinaryOperator.Div: {
      const dividend = expectInteger(label, left);
      return mkInteger(dividend / divisor(label, right));
    }
    case BinaryOperator.Mod: {
      const dividend = expectInteger(label, left);
      return mkInteger(dividend % divisor(label, right));
    }
    case BinaryOperator.Less:
      return mkBoolean(expectInteger(label, left) < expectInteger(label, right));
    case BinaryOperator.Greater:
      return mkBoolean(expectInteger(label, left) > expectInteger(label, right));
    case BinaryOperator.Equal:
      if (left.kind !== right.kind) {
        throw typeMismatch(label, left.kind, right);
      }
      return mkBoolean(valuesEqual(left, right));
    case BinaryOperator.Or: {
      const lft = expectBoolean(label, left);
      const rgt = expectBoolean(label, right);
      return mkBoolean(lft || rgt);
    }
    case BinaryOperator.And: {
      const lft = expectBoolean(label, left);
      const rgt = expectBoolean(label, right);
      return mkBoolean(lft && rgt);
    }
    case BinaryOperator.Concat:
      return mkString(expectString(label, left) + expectString(label, right));
    case BinaryOperator.Take:
    case BinaryOperator.Drop: {
      const count = expectInteger(label, left);
      const chars = Array.from(expectString(label, right));
      const n = sliceCount(label, left, count, chars.length);
      return mkString(
        (op === BinaryOperator.Take ? chars.slice(0, n) : chars.slice(n))
          .join(""),
      );
    }
  }
}
