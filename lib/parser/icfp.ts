/**
 * Text-to-AST entry points.
 *
 * @example
 * ```ts
 * import { parseIcfp } from "./icfp.js";
 * const expr = parseIcfp("B$ L# v# I#");
 * // λv-1.v-1 applied to 2
 * ```
 *
 * @module
 */
import type { Expr } from "../terms/expr.js";
import { readRawTree } from "./rawTree.js";
import { emptyRenameScope, parseRawNode, RenameCounter } from "./renaming.js";

export interface ParsedProgram {
  expr: Expr;
  /** Number of lambdas renamed, i.e. binder ids -1 through -binderCount. */
  binderCount: number;
}

export function parseIcfpProgram(text: string): ParsedProgram {
  const counter = new RenameCounter();
  const expr = parseRawNode(readRawTree(text), emptyRenameScope(), counter);
  return { expr, binderCount: counter.allocated };
}

/**
 * Parses a whole program, renaming every binder.
 *
 * @throws ParseError for malformed token streams
 * @throws CodecError for integer bodies with invalid digits
 */
export const parseIcfp = (text: string): Expr => parseIcfpProgram(text).expr;
