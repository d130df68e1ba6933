import { assert, expect } from "chai";

import { evaluateIcfp } from "../../lib/evaluator/evaluate.js";
import { EvaluationError } from "../../lib/evaluator/evaluationError.js";
import {
  type EvaluatorOptions,
  LazyEvaluator,
} from "../../lib/evaluator/lazyEvaluator.js";
import { parseIcfp } from "../../lib/parser/icfp.js";
import {
  BinaryOperator,
  type Expr,
  mkApply,
  mkBinary,
  mkLiteral,
  mkUnary,
  mkVariable,
  prettyPrintExpr,
  UnaryOperator,
} from "../../lib/terms/expr.js";
import {
  mkBoolean,
  mkInteger,
  mkString,
  type Value,
} from "../../lib/terms/value.js";
import { catchError } from "../util/catchError.js";

const evaluationError = (source: string, options: EvaluatorOptions = {}) =>
  catchError(() => evaluateIcfp(source, options), EvaluationError);

// Y (λf.λn. if n = 0 then 1 else (λp. f p + f p) (n - 1)) 4. Every call
// rebinds the same slot of the flat environment, so n ends up defined in
// terms of itself.
const SELF_REFERENTIAL_RECURSION = "B$ B$ L\" B$ L# B$ v\" B$ v# v# " +
  "L# B$ v\" B$ v# v# L\" L# ? B= v# I! I\" " +
  "B$ L$ B+ B$ v\" v$ B$ v\" v$ B- v# I\" I%";

describe("LazyEvaluator", () => {
  describe("fullyEvaluate", () => {
    const programs: [string, Value][] = [
      ["I/6", mkInteger(1337)],
      ["U- I$", mkInteger(-3)],
      ["U! T", mkBoolean(false)],
      ["U# S4%34", mkInteger(15818151)],
      ["U$ I4%34", mkString("test")],
      ["B+ I# I$", mkInteger(5)],
      ["B- I$ I#", mkInteger(1)],
      ["B* I$ I#", mkInteger(6)],
      ["B/ U- I( I#", mkInteger(-3)],
      ["B% U- I( I#", mkInteger(-1)],
      ["B< I$ I#", mkBoolean(false)],
      ["B> I$ I#", mkBoolean(true)],
      ["B= I$ I#", mkBoolean(false)],
      ["B= S4% S4%", mkBoolean(true)],
      ["B| T F", mkBoolean(true)],
      ["B& T F", mkBoolean(false)],
      ["B. S4% S34", mkString("test")],
      ["BT I$ S4%34", mkString("tes")],
      ["BD I$ S4%34", mkString("t")],
      ["? B> I# I$ S9%3 S./", mkString("no")],
      ["B$ L# v# I#", mkInteger(2)],
      ["B$ B$ L# L$ v# I\" I#", mkInteger(1)],
      ["B$ B$ L# L$ v# B. SB%,,/ S}Q/2,$_ IK", mkString("Hello World!")],
    ];

    for (const [source, expected] of programs) {
      it(`evaluates ${source}`, () => {
        assert.deepEqual(evaluateIcfp(source), expected);
      });
    }

    it("never forces an argument the body ignores", () => {
      assert.deepEqual(
        evaluateIcfp("B$ L# B$ L\" B+ v\" v\" B* I$ I# v8"),
        mkInteger(12),
      );
      assert.deepEqual(evaluateIcfp("B$ L# I\" B/ I\" I!"), mkInteger(1));
    });

    it("never evaluates the branch not taken", () => {
      assert.deepEqual(evaluateIcfp("? T I\" B/ I\" I!"), mkInteger(1));
      assert.deepEqual(evaluateIcfp("? F B/ I\" I! I#"), mkInteger(2));
    });

    it("checks both operands of Or and And", () => {
      const error = evaluationError("B& F I!");
      assert.strictEqual(error.kind, "TypeMismatch");
      assert.strictEqual(error.context.operator, "And");
      assert.strictEqual(evaluationError("B| T S!").context.actual, "string");
    });

    it("forces both operands of strict operators", () => {
      assert.deepEqual(evaluateIcfp("B+ B$ L# v# I$ I%"), mkInteger(7));
      assert.strictEqual(
        evaluationError("B+ I\" B/ I\" I!").kind,
        "DivisionByZero",
      );
    });

    it("keeps same-numbered binders in separate scopes apart", () => {
      assert.deepEqual(
        evaluateIcfp("B$ L# B. B$ L# v# S). v# S/54"),
        mkString("inout"),
      );
    });

    it("applies a function twice", () => {
      const evaluator = new LazyEvaluator();
      const value = evaluator.fullyEvaluate(
        parseIcfp("B$ B$ L\" L# B$ v\" B$ v\" v# L$ B+ v$ I\" I!"),
      );
      assert.deepEqual(value, mkInteger(2));
      assert.strictEqual(evaluator.stats.betaReductions, 4);
    });
  });

  describe("step", () => {
    it("leaves literals and lambdas alone", () => {
      const evaluator = new LazyEvaluator();
      const literal = parseIcfp("I!");
      const lambda = parseIcfp("L# v#");
      assert.strictEqual(evaluator.step(literal), literal);
      assert.strictEqual(evaluator.step(lambda), lambda);
    });

    it("binds the argument unevaluated and returns the body", () => {
      const evaluator = new LazyEvaluator();
      const next = evaluator.step(parseIcfp("B$ L# v# B+ I\" I\""));
      assert.deepEqual(next, mkVariable(-1n));
      assert.deepEqual(
        evaluator.step(next),
        mkBinary(
          BinaryOperator.Add,
          mkLiteral(mkInteger(1)),
          mkLiteral(mkInteger(1)),
        ),
      );
      assert.strictEqual(evaluator.stats.betaReductions, 1);
    });

    it("reduces inside a unary operand before applying it", () => {
      const evaluator = new LazyEvaluator();
      const once = evaluator.step(parseIcfp("U- B+ I\" I\""));
      assert.deepEqual(
        once,
        mkUnary(UnaryOperator.Negate, mkLiteral(mkInteger(2))),
      );
      assert.deepEqual(evaluator.step(once), mkLiteral(mkInteger(-2)));
    });

    it("returns the chosen branch unevaluated", () => {
      const evaluator = new LazyEvaluator();
      assert.deepEqual(
        evaluator.step(parseIcfp("? T B+ I\" I\" I!")),
        mkBinary(
          BinaryOperator.Add,
          mkLiteral(mkInteger(1)),
          mkLiteral(mkInteger(1)),
        ),
      );
    });

    it("leaves an application whose head is a variable partially reduced", () => {
      const evaluator = new LazyEvaluator();
      const first = evaluator.step(parseIcfp("B$ L# B$ v# I! v$"));
      assert.deepEqual(first, mkApply(mkVariable(-1n), mkLiteral(mkInteger(0))));
      const second = evaluator.step(first);
      assert.deepEqual(second, mkApply(mkVariable(3n), mkLiteral(mkInteger(0))));
      const error = catchError(() => evaluator.step(second), EvaluationError);
      assert.strictEqual(error.kind, "UnboundVariable");
      assert.strictEqual(error.context.id, 3n);
    });
  });

  describe("maximallyEvaluate", () => {
    it("stops at a lambda without entering it", () => {
      const evaluator = new LazyEvaluator();
      const lambda = parseIcfp("B$ L# L$ B/ v# I! I\"");
      assert.strictEqual(evaluator.maximallyEvaluate(lambda).kind, "lambda");
    });

    it("stops at the first variable it reaches", () => {
      const evaluator = new LazyEvaluator();
      assert.deepEqual(
        evaluator.maximallyEvaluate(parseIcfp("B$ L# v# v$")),
        mkVariable(-1n),
      );
      assert.deepEqual(evaluator.maximallyEvaluate(mkVariable(-1n)), mkVariable(3n));
    });
  });

  describe("errors", () => {
    it("reports unbound variables", () => {
      const error = evaluationError("v#");
      assert.strictEqual(error.kind, "UnboundVariable");
      assert.strictEqual(error.context.id, 2n);
      assert.strictEqual(error.message, "variable v2 is not bound");
    });

    it("reports non-boolean conditions", () => {
      const error = evaluationError("? I! T F");
      assert.strictEqual(error.kind, "NonBooleanCondition");
      assert.strictEqual(error.context.actual, "integer");
    });

    it("reports application of a literal", () => {
      const error = evaluationError("B$ I! I!");
      assert.strictEqual(error.kind, "ApplyNonFunction");
      assert.strictEqual(error.context.actual, "integer");
    });

    it("reports operand type mismatches", () => {
      const error = evaluationError("B+ I! S!");
      assert.strictEqual(error.kind, "TypeMismatch");
      assert.strictEqual(error.context.operator, "Add");
      assert.strictEqual(error.context.expected, "integer");
      assert.strictEqual(error.context.actual, "string");
    });

    it("reports take counts past the end of the string", () => {
      assert.strictEqual(
        evaluationError("BT I' S4%34").kind,
        "IndexOutOfRange",
      );
    });

    it("gives up on a self-application loop", () => {
      const error = evaluationError("B$ L! B$ v! v! L! B$ v! v!", {
        maxIterations: 100,
      });
      assert.strictEqual(error.kind, "NonTermination");
      assert.strictEqual(error.context.limit, 100);
    });

    it("gives up on a loop under a strict operator", () => {
      const error = evaluationError(
        "B$ L! B+ I\" B$ v! v! L! B+ I\" B$ v! v!",
        { maxIterations: 500 },
      );
      assert.strictEqual(error.kind, "NonTermination");
      assert.strictEqual(error.context.limit, 500);
    });

    it("counts nested steps against one budget", () => {
      const error = evaluationError(SELF_REFERENTIAL_RECURSION, {
        maxIterations: 20,
        maxDepth: 10_000,
      });
      assert.strictEqual(error.kind, "NonTermination");
      assert.strictEqual(error.context.limit, 20);
      assert.match(error.message, /within 20 steps$/);
    });

    it("gives up on recursion that nests without bound", () => {
      const error = evaluationError(SELF_REFERENTIAL_RECURSION, {
        maxIterations: 10_000,
        maxDepth: 50,
      });
      assert.strictEqual(error.kind, "NonTermination");
      assert.strictEqual(error.context.limit, 50);
      assert.strictEqual(error.message, "evaluation nested deeper than 50 levels");
    });

    it("reports recursion as non-termination with the default limits", () => {
      assert.strictEqual(
        evaluationError(SELF_REFERENTIAL_RECURSION).kind,
        "NonTermination",
      );
    });

    it("reports an exhausted call stack as non-termination", () => {
      const error = evaluationError(SELF_REFERENTIAL_RECURSION, {
        maxDepth: Number.MAX_SAFE_INTEGER,
      });
      assert.strictEqual(error.kind, "NonTermination");
      assert.strictEqual(error.message, "evaluation exhausted the call stack");
    });

    it("rejects a budget that is not a positive integer", () => {
      expect(() => new LazyEvaluator({ maxIterations: 0 })).to.throw(
        "maxIterations must be a positive integer, got 0",
      );
      expect(() => new LazyEvaluator({ maxIterations: 1.5 })).to.throw(Error);
      expect(() => new LazyEvaluator({ maxDepth: -1 })).to.throw(
        "maxDepth must be a positive integer, got -1",
      );
    });
  });

  describe("trace and stats", () => {
    it("reports each expression of the outermost loop", () => {
      const seen: Expr[] = [];
      const evaluator = new LazyEvaluator({ trace: (e) => seen.push(e) });
      evaluator.fullyEvaluate(parseIcfp("B$ L# v# I#"));
      assert.deepEqual(seen.map(prettyPrintExpr), ["v-1", "2"]);
    });

    it("counts steps and beta reductions", () => {
      const evaluator = new LazyEvaluator();
      evaluator.fullyEvaluate(parseIcfp("B$ L# B+ v# I\" I#"));
      assert.deepEqual(evaluator.stats, { steps: 5, betaReductions: 1 });
    });
  });
});
