/**
 * Call-by-name small-step evaluator.
 *
 * Arguments are bound unevaluated in a single flat environment keyed by
 * binder id. That is sound only because the renaming parser gives every
 * lambda in a program its own id.
 *
 * Application is lazy in its argument; every other binary operator and the
 * condition of an `if` are strict. Unbounded reduction is cut off by a step
 * budget shared by every loop of one top-level evaluation, and unbounded
 * nesting by a depth limit; both are reported as `NonTermination`.
 *
 * @module
 */
import {
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_ITERATIONS,
} from "../consts/limits.js";
import {
  BinaryOperator,
  type Expr,
  isWeakHeadNormal,
  type LiteralExpr,
  mkBinary,
  mkLiteral,
  mkUnary,
} from "../terms/expr.js";
import type { Value } from "../terms/value.js";
import { EvaluationError } from "./evaluationError.js";
import type {
  EvaluationStats,
  Evaluator,
  WeakHeadNormalForm,
} from "./evaluator.js";
import { applyBinary, applyUnary } from "./operators.js";

export interface EvaluatorOptions {
  /**
   * Steps one top-level evaluation may take, nested loops included; defaults
   * to {@link DEFAULT_MAX_ITERATIONS}.
   */
  maxIterations?: number;
  /** Nested evaluation loops allowed; defaults to {@link DEFAULT_MAX_DEPTH}. */
  maxDepth?: number;
  /** Called with each intermediate expression of the outermost loop. */
  trace?: (expr: Expr) => void;
}

const isLiteral = (expr: Expr): expr is LiteralExpr =>
  expr.kind === "literal";

const isStackOverflow = (error: unknown): boolean =>
  error instanceof RangeError && /call stack/i.test(error.message);

const positiveLimit = (name: string, value: number): number => {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
  return value;
};

/**
 * Create one evaluator per program run; the environment is never reset.
 */
export class LazyEvaluator implements Evaluator {
  private readonly environment = new Map<bigint, Expr>();
  private readonly maxIterations: number;
  private readonly maxDepth: number;
  private readonly trace: ((expr: Expr) => void) | undefined;
  private loopDepth = 0;
  private remainingSteps = 0;

  public readonly stats: EvaluationStats = { steps: 0, betaReductions: 0 };

  public constructor(options: EvaluatorOptions = {}) {
    this.maxIterations = positiveLimit(
      "maxIterations",
      options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    );
    this.maxDepth = positiveLimit(
      "maxDepth",
      options.maxDepth ?? DEFAULT_MAX_DEPTH,
    );
    this.trace = options.trace;
  }

  step(expr: Expr): Expr {
    this.stats.steps++;
    switch (expr.kind) {
      case "literal":
      case "lambda":
        return expr;
      case "variable": {
        const bound = this.environment.get(expr.id);
        if (bound === undefined) {
          throw new EvaluationError(
            `variable v${expr.id} is not bound`,
            "UnboundVariable",
            { id: expr.id },
          );
        }
        return bound;
      }
      case "unary":
        return isLiteral(expr.operand)
          ? mkLiteral(applyUnary(expr.op, expr.operand.value))
          : mkUnary(expr.op, this.step(expr.operand));
      case "if": {
        const condition = this.fullyEvaluate(expr.condition);
        if (condition.kind !== "boolean") {
          throw new EvaluationError(
            `if condition evaluated to ${condition.kind}, expected boolean`,
            "NonBooleanCondition",
            { expected: "boolean", actual: condition.kind, value: condition },
          );
        }
        return condition.value ? expr.thenBranch : expr.elseBranch;
      }
      case "binary": {
        const { op } = expr;
        if (op === BinaryOperator.Apply) {
          return this.stepApply(expr.left, expr.right);
        }
        const left = this.fullyEvaluate(expr.left);
        const right = this.fullyEvaluate(expr.right);
        return mkLiteral(applyBinary(op, left, right));
      }
    }
  }

  private stepApply(fn: Expr, arg: Expr): Expr {
    const head = this.maximallyEvaluate(fn);
    switch (head.kind) {
      case "lambda":
        this.environment.set(head.binderId, arg);
        this.stats.betaReductions++;
        return head.body;
      case "literal":
        throw new EvaluationError(
          `cannot apply ${head.value.kind} value`,
          "ApplyNonFunction",
          { operator: "Apply", actual: head.value.kind, value: head.value },
        );
      case "variable":
        return mkBinary(BinaryOperator.Apply, head, arg);
    }
  }

  maximallyEvaluate(expr: Expr): WeakHeadNormalForm {
    return this.iterate(expr, isWeakHeadNormal, "weak head normal form");
  }

  fullyEvaluate(expr: Expr): Value {
    return this.iterate(expr, isLiteral, "a value").value;
  }

  private iterate<T extends Expr>(
    expr: Expr,
    done: (expr: Expr) => expr is T,
    target: string,
  ): T {
    if (this.loopDepth === 0) {
      this.remainingSteps = this.maxIterations;
    } else if (this.loopDepth >= this.maxDepth) {
      throw new EvaluationError(
        `evaluation nested deeper than ${this.maxDepth} levels`,
        "NonTermination",
        { limit: this.maxDepth },
      );
    }

    this.loopDepth++;
    try {
      let next = this.budgetedStep(expr, target);
      for (;;) {
        if (this.loopDepth === 1) {
          this.trace?.(next);
        }
        if (done(next)) {
          return next;
        }
        next = this.budgetedStep(next, target);
      }
    } catch (error) {
      if (this.loopDepth === 1 && isStackOverflow(error)) {
        throw new EvaluationError(
          "evaluation exhausted the call stack",
          "NonTermination",
          { limit: this.maxDepth },
        );
      }
      throw error;
    } finally {
      this.loopDepth--;
    }
  }

  private budgetedStep(expr: Expr, target: string): Expr {
    if (this.remainingSteps <= 0) {
      throw new EvaluationError(
        `evaluation did not reach ${target} within ${this.maxIterations} steps`,
        "NonTermination",
        { limit: this.maxIterations },
      );
    }
    this.remainingSteps--;
    return this.step(expr);
  }
}
