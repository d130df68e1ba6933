/**
 * Raw parse tree construction.
 *
 * Groups a token stream into a prefix tree according to the wire grammar:
 *
 * expr = "T" | "F" | "I" body | "S" body | "v" body
 *      | "U" op expr | "B" op expr expr | "?" expr expr expr | "L" body expr
 *
 * The tree is untyped on purpose: each node records only its grammar rule and
 * token, so trees produced by other front ends can be handed to the renaming
 * parser too.
 *
 * @module
 */
import { ParseError } from "./parseError.js";
import { type Token, tokenize } from "./tokens.js";

export type GrammarRule =
  | "boolean"
  | "integer"
  | "string"
  | "unary"
  | "binary"
  | "if"
  | "lambda"
  | "variable";

export interface RawNode {
  /** Normally a {@link GrammarRule}; anything else is rejected later. */
  rule: string;
  token: Token;
  children: RawNode[];
}

interface IndicatorShape {
  rule: GrammarRule;
  arity: number;
  body: "empty" | "nonEmpty" | "opCode" | "any";
}

const INDICATORS: ReadonlyMap<string, IndicatorShape> = new Map<
  string,
  IndicatorShape
>([
  ["T", { rule: "boolean", arity: 0, body: "empty" }],
  ["F", { rule: "boolean", arity: 0, body: "empty" }],
  ["I", { rule: "integer", arity: 0, body: "nonEmpty" }],
  ["S", { rule: "string", arity: 0, body: "any" }],
  ["U", { rule: "unary", arity: 1, body: "opCode" }],
  ["B", { rule: "binary", arity: 2, body: "opCode" }],
  ["?", { rule: "if", arity: 3, body: "empty" }],
  ["L", { rule: "lambda", arity: 1, body: "nonEmpty" }],
  ["v", { rule: "variable", arity: 0, body: "nonEmpty" }],
]);

const checkBody = (token: Token, shape: IndicatorShape): void => {
  const ok = shape.body === "any" ||
    (shape.body === "empty" && token.body.length === 0) ||
    (shape.body === "nonEmpty" && token.body.length > 0) ||
    (shape.body === "opCode" && token.body.length === 1);
  if (!ok) {
    throw new ParseError(
      `malformed ${shape.rule} token '${token.literal}' at position ${token.offset}`,
      "MalformedToken",
      token.literal,
    );
  }
};

/**
 * Builds the raw tree for the expression starting at `tokens[start]`.
 *
 * @returns the node and the index of the first token after it
 */
export function readRawNode(
  tokens: readonly Token[],
  start: number,
): [RawNode, number] {
  const token = tokens[start];
  if (token === undefined) {
    throw new ParseError(
      "unexpected end of input: expected an expression",
      "UnexpectedEndOfInput",
    );
  }

  const shape = INDICATORS.get(token.indicator);
  if (shape === undefined) {
    throw new ParseError(
      `unknown indicator '${token.indicator}' in token '${token.literal}'`,
      "UnknownIndicator",
      token.literal,
    );
  }
  checkBody(token, shape);

  const children: RawNode[] = [];
  let next = start + 1;
  for (let i = 0; i < shape.arity; i++) {
    const [child, after] = readRawNode(tokens, next);
    children.push(child);
    next = after;
  }
  return [{ rule: shape.rule, token, children }, next];
}

/**
 * Builds the raw tree of a whole token stream, which must hold exactly one
 * expression.
 */
export function buildRawTree(tokens: readonly Token[]): RawNode {
  if (tokens.length === 0) {
    throw new ParseError("empty program", "EmptyInput");
  }
  const [node, next] = readRawNode(tokens, 0);
  const extra = tokens[next];
  if (extra !== undefined) {
    throw new ParseError(
      `unexpected extra input starting at token '${extra.literal}'` +
        ` (position ${extra.offset})`,
      "TrailingTokens",
      extra.literal,
    );
  }
  return node;
}

export const readRawTree = (text: string): RawNode =>
  buildRawTree(tokenize(text));
