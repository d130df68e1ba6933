/**
 * One-shot evaluation helpers.
 *
 * @module
 */
import { parseIcfp } from "../parser/icfp.js";
import type { Value } from "../terms/value.js";
import { type EvaluatorOptions, LazyEvaluator } from "./lazyEvaluator.js";

/**
 * Parses and fully evaluates a program with a fresh evaluator.
 *
 * @example
 * ```ts
 * evaluateIcfp("I/6"); // { kind: "integer", value: 1337n }
 * ```
 */
export function evaluateIcfp(
  text: string,
  options: EvaluatorOptions = {},
): Value {
  return new LazyEvaluator(options).fullyEvaluate(parseIcfp(text));
}
