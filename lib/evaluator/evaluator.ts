/**
 * Evaluator interface.
 *
 * This module defines the interface for evaluators of the lazy language,
 * providing single-step reduction and the two derived reduction loops.
 *
 * @module
 */
import type {
  Expr,
  LambdaExpr,
  LiteralExpr,
  VariableExpr,
} from "../terms/expr.js";
import type { Value } from "../terms/value.js";

export type WeakHeadNormalForm = LiteralExpr | LambdaExpr | VariableExpr;

export interface EvaluationStats {
  /** Calls to {@link Evaluator.step}, nested ones included. */
  steps: number;
  /** Applications that bound an argument to a lambda. */
  betaReductions: number;
}

export interface Evaluator {
  /** Perform exactly one reduction (or return terminal input unchanged). */
  step(expr: Expr): Expr;

  /** Keep stepping until a literal, lambda or variable is reached. */
  maximallyEvaluate(expr: Expr): WeakHeadNormalForm;

  /** Keep stepping until a literal is reached. */
  fullyEvaluate(expr: Expr): Value;

  readonly stats: Readonly<EvaluationStats>;
}
