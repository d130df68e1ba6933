/**
 * Expression tree of the lazy base-94 language.
 *
 * This module defines the closed set of AST variants produced by the renaming
 * parser and rewritten by the evaluator, their constructors, and a
 * human-readable printer.
 *
 * @module
 */
import { prettyPrintValue, type Value } from "./value.js";

/**
 * Unary operators. Each member's value is its one-character wire code.
 */
export enum UnaryOperator {
  Negate = "-",
  LogicalNot = "!",
  StringToInt = "#",
  IntToString = "$",
}

/**
 * Binary operators. Each member's value is its one-character wire code.
 */
export enum BinaryOperator {
  Add = "+",
  Sub = "-",
  Mul = "*",
  Div = "/",
  Mod = "%",
  Less = "<",
  Greater = ">",
  Equal = "=",
  Or = "|",
  And = "&",
  Concat = ".",
  Take = "T",
  Drop = "D",
  Apply = "$",
}

const UNARY_OPERATORS: readonly string[] = Object.values(UnaryOperator);
const BINARY_OPERATORS: readonly string[] = Object.values(BinaryOperator);

export const isUnaryOperator = (code: string): code is UnaryOperator =>
  UNARY_OPERATORS.includes(code);

export const isBinaryOperator = (code: string): code is BinaryOperator =>
  BINARY_OPERATORS.includes(code);

export interface LiteralExpr {
  kind: "literal";
  value: Value;
}

export interface UnaryExpr {
  kind: "unary";
  op: UnaryOperator;
  operand: Expr;
}

export interface BinaryExpr {
  kind: "binary";
  op: BinaryOperator;
  left: Expr;
  right: Expr;
}

export interface IfExpr {
  kind: "if";
  condition: Expr;
  thenBranch: Expr;
  elseBranch: Expr;
}

/**
 * λ<binderId>.<body>. After renaming, binder ids are negative and unique
 * across the whole program.
 */
export interface LambdaExpr {
  kind: "lambda";
  binderId: bigint;
  body: Expr;
}

/**
 * A reference to the lambda whose binder id equals `id`. Free references
 * keep the non-negative id they were written with.
 */
export interface VariableExpr {
  kind: "variable";
  id: bigint;
}

/**
 * e ::= literal | op e | e op e | if e e e | λn.e | vn
 */
export type Expr =
  | LiteralExpr
  | UnaryExpr
  | BinaryExpr
  | IfExpr
  | LambdaExpr
  | VariableExpr;

export type ExprKind = Expr["kind"];

export const mkLiteral = (value: Value): LiteralExpr => ({
  kind: "literal",
  value,
});

export const mkUnary = (op: UnaryOperator, operand: Expr): UnaryExpr => ({
  kind: "unary",
  op,
  operand,
});

export const mkBinary = (
  op: BinaryOperator,
  left: Expr,
  right: Expr,
): BinaryExpr => ({
  kind: "binary",
  op,
  left,
  right,
});

export const mkIf = (
  condition: Expr,
  thenBranch: Expr,
  elseBranch: Expr,
): IfExpr => ({
  kind: "if",
  condition,
  thenBranch,
  elseBranch,
});

export const mkLambda = (binderId: bigint, body: Expr): LambdaExpr => ({
  kind: "lambda",
  binderId,
  body,
});

export const mkVariable = (id: bigint): VariableExpr => ({
  kind: "variable",
  id,
});

/**
 * Applies `fn` to each argument in turn, associating to the left.
 */
export const mkApply = (fn: Expr, ...args: Expr[]): Expr =>
  args.reduce<Expr>(
    (acc, arg) => mkBinary(BinaryOperator.Apply, acc, arg),
    fn,
  );

/**
 * Weak head normal form: reduced enough to inspect the outermost shape.
 */
export const isWeakHeadNormal = (
  expr: Expr,
): expr is LiteralExpr | LambdaExpr | VariableExpr =>
  expr.kind === "literal" || expr.kind === "lambda" ||
  expr.kind === "variable";

const UNARY_NAMES: Record<UnaryOperator, string> = {
  [UnaryOperator.Negate]: "neg",
  [UnaryOperator.LogicalNot]: "not",
  [UnaryOperator.StringToInt]: "str->int",
  [UnaryOperator.IntToString]: "int->str",
};

const BINARY_SYMBOLS: Record<
  Exclude<BinaryOperator, BinaryOperator.Apply>,
  string
> = {
  [BinaryOperator.Add]: "+",
  [BinaryOperator.Sub]: "-",
  [BinaryOperator.Mul]: "*",
  [BinaryOperator.Div]: "/",
  [BinaryOperator.Mod]: "%",
  [BinaryOperator.Less]: "<",
  [BinaryOperator.Greater]: ">",
  [BinaryOperator.Equal]: "==",
  [BinaryOperator.Or]: "||",
  [BinaryOperator.And]: "&&",
  [BinaryOperator.Concat]: "++",
  [BinaryOperator.Take]: "take",
  [BinaryOperator.Drop]: "drop",
};

const UNARY_LABELS: ReadonlyMap<string, string> = new Map(
  Object.entries(UnaryOperator).map(([name, code]): [string, string] => [
    code,
    name,
  ]),
);

const BINARY_LABELS: ReadonlyMap<string, string> = new Map(
  Object.entries(BinaryOperator).map(([name, code]): [string, string] => [
    code,
    name,
  ]),
);

/** The operator's name, e.g. `Negate` for `-`. */
export const unaryOperatorLabel = (op: UnaryOperator): string =>
  UNARY_LABELS.get(op) ?? op;

/** The operator's name, e.g. `Take` for `T`. */
export const binaryOperatorLabel = (op: BinaryOperator): string =>
  BINARY_LABELS.get(op) ?? op;

const variableName = (id: bigint): string => `v${id}`;

/**
 * Pretty-prints an expression with λ, infix operators and parentheses.
 * Application is written as juxtaposition: `(f x)`.
 */
export const prettyPrintExpr = (expr: Expr): string => {
  switch (expr.kind) {
    case "literal":
      return prettyPrintValue(expr.value);
    case "unary":
      return `(${UNARY_NAMES[expr.op]} ${prettyPrintExpr(expr.operand)})`;
    case "binary":
      if (expr.op === BinaryOperator.Apply) {
        return `(${prettyPrintExpr(expr.left)} ${prettyPrintExpr(expr.right)})`;
      }
      return `(${prettyPrintExpr(expr.left)} ${BINARY_SYMBOLS[expr.op]}` +
        ` ${prettyPrintExpr(expr.right)})`;
    case "if":
      return `(if ${prettyPrintExpr(expr.condition)}` +
        ` then ${prettyPrintExpr(expr.thenBranch)}` +
        ` else ${prettyPrintExpr(expr.elseBranch)})`;
    case "lambda":
      return `λ${variableName(expr.binderId)}.${prettyPrintExpr(expr.body)}`;
    case "variable":
      return variableName(expr.id);
  }
};
