import { describe, it } from "node:test";
import assert from "node:assert";
import { buildTree, collectVariables, evaluate, parse, type Bit, type Node } from "../src";

function tree(postfix: string): Node {
  const result = buildTree(postfix);
  assert.ok(result.ok);
  return result.out;
}

describe("buildTree", () => {
  it("builds a binary node with the earlier operand on the left", () => {
    assert.deepStrictEqual(tree("AB*"), {
      type: "and",
      lhs: { type: "var", name: "A" },
      rhs: { type: "var", name: "B" },
    });
  });

  it("builds constants and negation", () => {
    assert.deepStrictEqual(tree("1'0+"), {
      type: "or",
      lhs: { type: "not", operand: { type: "const", value: 1 } },
      rhs: { type: "const", value: 0 },
    });
  });

  const failures = [
    ["'", { kind: "InvalidNotOperand" }],
    ["A*", { kind: "InvalidAndOperands" }],
    ["A^", { kind: "InvalidXorOperands" }],
    ["+", { kind: "InvalidOrOperands" }],
    ["A?", { kind: "InvalidToken", token: "?" }],
    ["AB*(", { kind: "InvalidToken", token: "(" }],
    ["AB", { kind: "InvalidExpression", reason: "dangling-operands" }],
    ["", { kind: "InvalidExpression", reason: "empty" }],
  ] as const;
  for (const [postfix, error] of failures) {
    it(`should reject [${postfix}] with ${error.kind}`, () => {
      assert.deepStrictEqual(buildTree(postfix), { ok: false, error });
    });
  }
});

describe("evaluate", () => {
  const xor = tree("AB^");
  const rows: [Bit, Bit, Bit][] = [[0, 0, 0], [0, 1, 1], [1, 0, 1], [1, 1, 0]];
  for (const [a, b, y] of rows) {
    it(`should evaluate A^B at A=${a} B=${b} to ${y}`, () => {
      assert.equal(evaluate(xor, new Map([["A", a], ["B", b]])), y);
    });
  }

  it("evaluates nested negation", () => {
    assert.equal(evaluate(tree("A'B*'"), new Map<string, Bit>([["A", 0], ["B", 1]])), 0);
    assert.equal(evaluate(tree("A'B*'"), new Map<string, Bit>([["A", 1], ["B", 1]])), 1);
  });

  it("throws for an unassigned variable", () => {
    assert.throws(() => evaluate(tree("Q"), new Map()), /No value assigned to variable Q/);
  });
});

describe("parse", () => {
  it("parses juxtaposition as AND", () => {
    const result = parse("AB'");
    assert.deepStrictEqual(result, {
      ok: true,
      out: {
        variables: ["A", "B"],
        root: {
          type: "and",
          lhs: { type: "var", name: "A" },
          rhs: { type: "not", operand: { type: "var", name: "B" } },
        },
      },
    });
  });

  const failures = [
    ["a", { kind: "InvalidCharacter", char: "a", position: 0 }],
    ["(AB", { kind: "InvalidExpression", reason: "unmatched-open" }],
    ["AB)", { kind: "InvalidExpression", reason: "unmatched-close" }],
    ["+A", { kind: "InvalidOrOperands" }],
    ["A^", { kind: "InvalidXorOperands" }],
    ["'A", { kind: "InvalidNotOperand" }],
    ["()", { kind: "InvalidExpression", reason: "empty" }],
  ] as const;
  for (const [input, error] of failures) {
    it(`should reject [${input}] with ${error.kind}`, () => {
      assert.deepStrictEqual(parse(input), { ok: false, error });
    });
  }

  it("collects the variables of a tree", () => {
    const result = parse("C(A+B)C'");
    assert.ok(result.ok);
    assert.deepStrictEqual(collectVariables(result.out.root), ["A", "B", "C"]);
  });
});
