/**
 * Lazy base-94 language toolkit: codec, renaming parser and call-by-name
 * evaluator.
 *
 * This module re-exports the public API:
 * - the base-94 integer and string codecs
 * - the expression tree, value types and printers
 * - the tokenizer, raw tree builder and renaming parser
 * - the lazy evaluator and its errors
 *
 * @example
 * ```ts
 * import { evaluateIcfp, prettyPrintValue } from "lazy-icfp";
 * const value = evaluateIcfp("B$ L# B. v# v# S4%34");
 * prettyPrintValue(value); // "\"testtest\""
 * ```
 *
 * @module
 */

// Codec exports
export {
  decodeInteger,
  decodeIntegerBody,
  encodeIntegerBody,
} from "./codec/base94.js";
export { decodeString, encodeString } from "./codec/strings.js";
export { CodecError, type CodecErrorKind } from "./codec/codecError.js";

// Term exports
export {
  BinaryOperator,
  type Expr,
  type ExprKind,
  mkApply,
  mkBinary,
  mkIf,
  mkLambda,
  mkLiteral,
  mkUnary,
  mkVariable,
  /** Generates a human-readable string representation of an expression. */
  prettyPrintExpr,
  UnaryOperator,
} from "./terms/expr.js";
export {
  mkBoolean,
  mkInteger,
  mkString,
  /** Generates a human-readable string representation of a value. */
  prettyPrintValue,
  type Value,
  type ValueKind,
  valuesEqual,
} from "./terms/value.js";
export { deserializeExpr, serializeExpr } from "./terms/serialization.js";

// Parser exports
export { type Token, tokenize } from "./parser/tokens.js";
export {
  buildRawTree,
  type GrammarRule,
  type RawNode,
  readRawTree,
} from "./parser/rawTree.js";
export {
  emptyRenameScope,
  parseRawNode,
  RenameCounter,
  type RenameScope,
} from "./parser/renaming.js";
/** Parses a wire-format program into a renamed expression tree. */
export { type ParsedProgram, parseIcfp, parseIcfpProgram } from "./parser/icfp.js";
export { unparseIcfp } from "./parser/unparse.js";
export { ParseError, type ParseErrorKind } from "./parser/parseError.js";

// Evaluator exports
export type {
  EvaluationStats,
  Evaluator,
  WeakHeadNormalForm,
} from "./evaluator/evaluator.js";
export {
  type EvaluatorOptions,
  LazyEvaluator,
} from "./evaluator/lazyEvaluator.js";
export { evaluateIcfp } from "./evaluator/evaluate.js";
export {
  EvaluationError,
  type EvaluationErrorKind,
} from "./evaluator/evaluationError.js";
export { DEFAULT_MAX_DEPTH, DEFAULT_MAX_ITERATIONS } from "./consts/limits.js";
