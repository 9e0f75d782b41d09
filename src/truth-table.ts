import { evaluate, type Bit, type Node } from './ast';

export type TruthTable = {
  // Variables in bit order, first = most significant
  variables: string[];

  // Output for every assignment index
  outputs: Bit[];

  // Indices where the output is 1, strictly ascending
  minterms: number[];
};

const noAssignment: ReadonlyMap<string, Bit> = new Map();

/**
 * Evaluates an expression that has no variables.
 */
export function evaluateConstant(root: Node): Bit {
  return evaluate(root, noAssignment);
}

export function assignmentOf(index: number, variables: readonly string[]): Map<string, Bit> {
  const n = variables.length;
  return new Map(variables.map((name, k): [string, Bit] => [name, (index >> (n - 1 - k)) & 1 ? 1 : 0]));
}

/**
 * Evaluates the tree for every assignment of the variables.
 */
export function buildTruthTable(root: Node, variables: readonly string[]): TruthTable {
  const rows = 2 ** variables.length;
  const outputs: Bit[] = [];
  const minterms: number[] = [];

  for (let i = 0; i < rows; i++) {
    const y = evaluate(root, assignmentOf(i, variables));
    outputs.push(y);
    if (y === 1) {
      minterms.push(i);
    }
  }

  return { variables: [...variables], outputs, minterms };
}
