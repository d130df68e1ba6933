/**
 * JSON form of expressions.
 *
 * Used for debugging output and for exchanging parsed programs with other
 * tools. Bigints, which JSON cannot hold, are written as tagged strings.
 *
 * @module
 */
import {
  type Expr,
  isBinaryOperator,
  isUnaryOperator,
  mkBinary,
  mkIf,
  mkLambda,
  mkLiteral,
  mkUnary,
  mkVariable,
} from "./expr.js";
import { mkBoolean, mkInteger, mkString, type Value } from "./value.js";

const BIGINT_TAG = "__bigint__";
const BIGINT_PATTERN = /^-?\d+$/;

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const invalid = (path: string, problem: string): Error =>
  new Error(`Invalid expression JSON at ${path}: ${problem}`);

/**
 * Serializes an expression to JSON.
 *
 * @param space indentation passed through to `JSON.stringify`
 */
export function serializeExpr(expr: Expr, space?: number): string {
  const replacer = (_key: string, value: unknown) => {
    if (typeof value === "bigint") {
      return { [BIGINT_TAG]: value.toString() };
    }
    return value;
  };
  return JSON.stringify(expr, replacer, space);
}

const reviver = (_key: string, value: unknown): unknown => {
  if (isRecord(value) && BIGINT_TAG in value) {
    const digits = value[BIGINT_TAG];
    if (typeof digits !== "string" || !BIGINT_PATTERN.test(digits)) {
      throw new Error(`Invalid bigint encoding: ${JSON.stringify(digits)}`);
    }
    return BigInt(digits);
  }
  return value;
};

const expectBigint = (value: unknown, path: string): bigint => {
  if (typeof value !== "bigint") {
    throw invalid(path, "expected a tagged bigint");
  }
  return value;
};

function toValue(json: unknown, path: string): Value {
  if (!isRecord(json)) {
    throw invalid(path, "expected a value object");
  }
  const { kind, value } = json;
  switch (kind) {
    case "string":
      if (typeof value === "string") return mkString(value);
      break;
    case "boolean":
      if (typeof value === "boolean") return mkBoolean(value);
      break;
    case "integer":
      return mkInteger(expectBigint(value, `${path}.value`));
    default:
      throw invalid(path, `unknown value kind ${JSON.stringify(kind)}`);
  }
  throw invalid(`${path}.value`, `expected a ${kind} payload`);
}

function toExpr(json: unknown, path: string): Expr {
  if (!isRecord(json)) {
    throw invalid(path, "expected an expression object");
  }
  switch (json.kind) {
    case "literal":
      return mkLiteral(toValue(json.value, `${path}.value`));
    case "unary": {
      const { op } = json;
      if (typeof op !== "string" || !isUnaryOperator(op)) {
        throw invalid(`${path}.op`, `unknown unary operator`);
      }
      return mkUnary(op, toExpr(json.operand, `${path}.operand`));
    }
    case "binary": {
      const { op } = json;
      if (typeof op !== "string" || !isBinaryOperator(op)) {
        throw invalid(`${path}.op`, `unknown binary operator`);
      }
      return mkBinary(
        op,
        toExpr(json.left, `${path}.left`),
        toExpr(json.right, `${path}.right`),
      );
    }
    case "if":
      return mkIf(
        toExpr(json.condition, `${path}.condition`),
        toExpr(json.thenBranch, `${path}.thenBranch`),
        toExpr(json.elseBranch, `${path}.elseBranch`),
      );
    case "lambda":
      return mkLambda(
        expectBigint(json.binderId, `${path}.binderId`),
        toExpr(json.body, `${path}.body`),
      );
    case "variable":
      return mkVariable(expectBigint(json.id, `${path}.id`));
    default:
      throw invalid(path, `unknown expression kind ${JSON.stringify(json.kind)}`);
  }
}

/**
 * Parses and validates the output of {@link serializeExpr}.
 *
 * @throws Error if the JSON is malformed or not an expression
 */
export function deserializeExpr(json: string): Expr {
  try {
    return toExpr(JSON.parse(json, reviver), "$");
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in expression: ${error.message}`);
    }
    throw error;
  }
}
