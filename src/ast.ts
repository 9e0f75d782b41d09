import { fail, ok, type LogicError, type Result } from './errors';
import { AND, NOT, OR, XOR, insertAnd, isDigit, isVariable, validate } from './lexer';
import { toPostfix } from './postfix';

export type Bit = 0 | 1;

export type BinaryOp = 'and' | 'or' | 'xor';

export type Node =
  | { type: 'const', value: Bit }
  | { type: 'var', name: string }
  | { type: 'not', operand: Node }
  | { type: BinaryOp, lhs: Node, rhs: Node };

const binaryOps: Record<string, { op: BinaryOp, error: LogicError } | undefined> = {
  [AND]: { op: 'and', error: { kind: 'InvalidAndOperands' } },
  [XOR]: { op: 'xor', error: { kind: 'InvalidXorOperands' } },
  [OR]: { op: 'or', error: { kind: 'InvalidOrOperands' } },
};

// postfix stream -> expression tree
export function buildTree(postfix: string): Result<Node> {
  const stack: Node[] = [];

  for (const token of postfix) {
    if (isVariable(token)) {
      stack.push({ type: 'var', name: token });
      continue;
    }
    if (isDigit(token)) {
      stack.push({ type: 'const', value: token === '1' ? 1 : 0 });
      continue;
    }
    if (token === NOT) {
      const operand = stack.pop();
      if (!operand) {
        return fail({ kind: 'InvalidNotOperand' });
      }
      stack.push({ type: 'not', operand });
      continue;
    }
    const binary = binaryOps[token];
    if (!binary) {
      return fail({ kind: 'InvalidToken', token });
    }
    const rhs = stack.pop();
    const lhs = stack.pop();
    if (!lhs || !rhs) {
      return fail(binary.error);
    }
    stack.push({ type: binary.op, lhs, rhs });
  }

  const [root, ...rest] = stack;
  if (!root) {
    return fail({ kind: 'InvalidExpression', reason: 'empty' });
  }
  if (rest.length > 0) {
    return fail({ kind: 'InvalidExpression', reason: 'dangling-operands' });
  }
  return ok(root);
}

export function evaluate(node: Node, assignment: ReadonlyMap<string, Bit>): Bit {
  switch (node.type) {
    case 'const':
      return node.value;
    case 'var': {
      const value = assignment.get(node.name);
      if (value === undefined) {
        throw new Error(`No value assigned to variable ${node.name}`);
      }
      return value;
    }
    case 'not':
      return evaluate(node.operand, assignment) === 1 ? 0 : 1;
    case 'and':
      return evaluate(node.lhs, assignment) & evaluate(node.rhs, assignment) ? 1 : 0;
    case 'or':
      return evaluate(node.lhs, assignment) | evaluate(node.rhs, assignment) ? 1 : 0;
    case 'xor':
      return evaluate(node.lhs, assignment) ^ evaluate(node.rhs, assignment) ? 1 : 0;
  }
}

export function collectVariables(node: Node): string[] {
  const names = new Set<string>();
  const visit = (n: Node): void => {
    switch (n.type) {
      case 'const':
        return;
      case 'var':
        names.add(n.name);
        return;
      case 'not':
        visit(n.operand);
        return;
      default:
        visit(n.lhs);
        visit(n.rhs);
    }
  };
  visit(node);
  return [...names].sort();
}

export type Parsed = {
  variables: string[];
  root: Node;
};

export function parse(input: string): Result<Parsed> {
  const vars = validate(input);
  if (!vars.ok) return vars;

  const postfix = toPostfix(insertAnd(input));
  if (!postfix.ok) return postfix;

  const tree = buildTree(postfix.out);
  if (!tree.ok) return tree;

  return ok({ variables: vars.out, root: tree.out });
}
