import { assert } from "chai";

import { ParseError } from "../../lib/parser/parseError.js";
import { readRawTree } from "../../lib/parser/rawTree.js";
import { tokenize } from "../../lib/parser/tokens.js";
import { catchError } from "../util/catchError.js";

describe("tokenize", () => {
  it("splits on any run of whitespace and drops empty pieces", () => {
    const tokens = tokenize("  B$  L#\n\tv# ");
    assert.deepEqual(tokens, [
      { indicator: "B", body: "$", literal: "B$", offset: 0 },
      { indicator: "L", body: "#", literal: "L#", offset: 1 },
      { indicator: "v", body: "#", literal: "v#", offset: 2 },
    ]);
  });

  it("returns nothing for blank input", () => {
    assert.deepEqual(tokenize(" \n "), []);
  });
});

describe("raw parse tree", () => {
  it("groups prefix operators with their operands", () => {
    const tree = readRawTree("B. S4% ? T S34 F");
    assert.strictEqual(tree.rule, "binary");
    assert.strictEqual(tree.token.literal, "B.");
    assert.deepEqual(
      tree.children.map((child) => child.rule),
      ["string", "if"],
    );
    const branch = tree.children[1];
    assert.isDefined(branch);
    assert.deepEqual(
      branch?.children.map((child) => child.token.literal),
      ["T", "S34", "F"],
    );
  });

  it("accepts an empty string body", () => {
    assert.strictEqual(readRawTree("S").rule, "string");
  });

  const failures: [string, string, string | undefined][] = [
    ["", "EmptyInput", undefined],
    ["B+ I!", "UnexpectedEndOfInput", undefined],
    ["? T", "UnexpectedEndOfInput", undefined],
    ["X!", "UnknownIndicator", "X!"],
    ["Tx", "MalformedToken", "Tx"],
    ["I", "MalformedToken", "I"],
    ["U-- I!", "MalformedToken", "U--"],
    ["L v!", "MalformedToken", "L"],
    ["I! I!", "TrailingTokens", "I!"],
  ];

  for (const [source, kind, token] of failures) {
    it(`reports ${kind} for ${JSON.stringify(source)}`, () => {
      const error = catchError(() => readRawTree(source), ParseError);
      assert.strictEqual(error.kind, kind);
      assert.strictEqual(error.token, token);
    });
  }

  it("names the position of trailing tokens", () => {
    const error = catchError(() => readRawTree("U- I! I\""), ParseError);
    assert.strictEqual(
      error.message,
      "unexpected extra input starting at token 'I\"' (position 2)",
    );
  });
});
