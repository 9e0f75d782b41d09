import { describe, it } from "node:test";
import assert from "node:assert";
import { assignmentOf, buildTruthTable, evaluateConstant, parse, type Parsed } from "../src";

function parsed(input: string): Parsed {
  const result = parse(input);
  assert.ok(result.ok);
  return result.out;
}

describe("assignmentOf", () => {
  it("maps the first variable to the most significant bit", () => {
    assert.deepStrictEqual(assignmentOf(5, ["A", "B", "C"]), new Map([["A", 1], ["B", 0], ["C", 1]]));
    assert.deepStrictEqual(assignmentOf(4, ["A", "B", "C"]), new Map([["A", 1], ["B", 0], ["C", 0]]));
  });
});

describe("buildTruthTable", () => {
  const cases: [string, number[], number[]][] = [
    ["A", [0, 1], [1]],
    ["A'", [1, 0], [0]],
    ["AB'+A'B", [0, 1, 1, 0], [1, 2]],
    ["A+BC", [0, 0, 0, 1, 1, 1, 1, 1], [3, 4, 5, 6, 7]],
    ["(AB'+A'B)'^C", [1, 0, 0, 1, 0, 1, 1, 0], [0, 3, 5, 6]],
    ["AA'", [0, 0], []],
  ];
  for (const [input, outputs, minterms] of cases) {
    it(`should tabulate [${input}]`, () => {
      const { root, variables } = parsed(input);
      const table = buildTruthTable(root, variables);
      assert.deepStrictEqual(table.outputs, outputs);
      assert.deepStrictEqual(table.minterms, minterms);
      assert.deepStrictEqual(table.variables, variables);
    });
  }

  it("produces strictly ascending minterms within range", () => {
    for (const input of ["A+B+C+D", "AB^CD", "(A+B')(C^D)E"]) {
      const { root, variables } = parsed(input);
      const { minterms } = buildTruthTable(root, variables);
      assert.ok(minterms.length <= 2 ** variables.length);
      for (let i = 1; i < minterms.length; i++) {
        assert.ok(minterms[i - 1]! < minterms[i]!);
      }
    }
  });
});

describe("evaluateConstant", () => {
  const cases: [string, number][] = [
    ["0", 0],
    ["1", 1],
    ["1^1'", 1],
    ["1'1'", 0],
    ["(0+1)''", 1],
  ];
  for (const [input, expected] of cases) {
    it(`should evaluate [${input}] to ${expected}`, () => {
      assert.equal(evaluateConstant(parsed(input).root), expected);
    });
  }
});
