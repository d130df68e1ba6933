/**
 * Renaming parser.
 *
 * Turns a raw parse tree into an {@link Expr} while giving every lambda a
 * globally unique, negative binder id. Source programs reuse small binder
 * numerals freely; the evaluator keeps all bindings in one flat environment,
 * so two lambdas sharing a numeral would otherwise overwrite each other's
 * arguments. Renaming once, statically, rules that out.
 *
 * @module
 */
import { decodeInteger, decodeIntegerBody } from "../codec/base94.js";
import { decodeString } from "../codec/strings.js";
import {
  compareBigints,
  createEmptyAVL,
  insertAVL,
  type AVLTree,
  searchAVL,
} from "../data/avl/avlNode.js";
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
} from "../terms/expr.js";
import { mkBoolean } from "../terms/value.js";
import { ParseError } from "./parseError.js";
import type { RawNode } from "./rawTree.js";
import type { Token } from "./tokens.js";

/**
 * Immutable mapping from source-level binder id to renamed id. Inner scopes
 * are derived by insertion, which shadows any outer entry for the same id.
 */
export type RenameScope = AVLTree<bigint, bigint>;

export const emptyRenameScope = (): RenameScope => createEmptyAVL();

export const bindRename = (
  scope: RenameScope,
  rawId: bigint,
  renamedId: bigint,
): RenameScope => insertAVL(scope, rawId, renamedId, compareBigints);

export const lookupRename = (
  scope: RenameScope,
  rawId: bigint,
): bigint | undefined => searchAVL(scope, rawId, compareBigints);

/**
 * Source of fresh binder ids, shared by a whole parse. Starts at -1 and
 * only ever counts down.
 */
export class RenameCounter {
  private current: bigint;

  public constructor(private readonly seed: bigint = -1n) {
    this.current = seed;
  }

  /** Hands out the current id and moves the counter down by one. */
  next(): bigint {
    const id = this.current;
    this.current -= 1n;
    return id;
  }

  /** The id the next call to {@link next} will return. */
  peek(): bigint {
    return this.current;
  }

  /** How many ids have been handed out. */
  get allocated(): number {
    return Number(this.seed - this.current);
  }
}

const childAt = (node: RawNode, index: number): RawNode => {
  const child = node.children[index];
  if (child === undefined) {
    throw new ParseError(
      `${node.rule} node '${node.token.literal}' is missing child ${index}`,
      "MalformedToken",
      node.token.literal,
    );
  }
  return child;
};

const unknownOperator = (token: Token): ParseError =>
  new ParseError(
    `unknown operator '${token.body}' in token '${token.literal}'`,
    "UnknownOperator",
    token.literal,
  );

/**
 * Converts a raw node into an expression.
 *
 * Siblings are parsed with the same `activeRenames` snapshot, so none of
 * them can see another's bindings; only a lambda's body sees the scope
 * extended with that lambda's binder.
 *
 * @param node the raw node to convert
 * @param activeRenames bindings visible at this node
 * @param counter the parse-wide id source
 */
export function parseRawNode(
  node: RawNode,
  activeRenames: RenameScope,
  counter: RenameCounter,
): Expr {
  const { token } = node;
  const parseChild = (index: number, scope = activeRenames): Expr =>
    parseRawNode(childAt(node, index), scope, counter);

  switch (node.rule) {
    case "boolean":
      return mkLiteral(mkBoolean(token.indicator === "T"));
    case "integer":
      return mkLiteral(decodeInteger(token.body));
    case "string":
      return mkLiteral(decodeString(token.body));
    case "unary": {
      const op = token.body;
      if (!isUnaryOperator(op)) {
        throw unknownOperator(token);
      }
      return mkUnary(op, parseChild(0));
    }
    case "binary": {
      const op = token.body;
      if (!isBinaryOperator(op)) {
        throw unknownOperator(token);
      }
      const left = parseChild(0);
      const right = parseChild(1);
      return mkBinary(op, left, right);
    }
    case "if": {
      const condition = parseChild(0);
      const thenBranch = parseChild(1);
      const elseBranch = parseChild(2);
      return mkIf(condition, thenBranch, elseBranch);
    }
    case "lambda": {
      const rawId = decodeIntegerBody(token.body);
      const binderId = counter.next();
      return mkLambda(
        binderId,
        parseChild(0, bindRename(activeRenames, rawId, binderId)),
      );
    }
    case "variable": {
      const rawId = decodeIntegerBody(token.body);
      // a free variable keeps its source id
      return mkVariable(lookupRename(activeRenames, rawId) ?? rawId);
    }
    default:
      throw new ParseError(
        `unrecognized grammar rule '${node.rule}' for token '${token.literal}'`,
        "UnrecognizedGrammarRule",
        token.literal,
      );
  }
}
