import { fail, ok, type Result } from './errors';
import { AND, NOT, OR, XOR, isDigit, isVariable } from './lexer';

// stack priority: NOT > AND > XOR > OR, '(' lowest
const priority: Record<string, number> = {
  '(': 1,
  [OR]: 2,
  [XOR]: 3,
  [AND]: 4,
  [NOT]: 5,
};

function prio(op: string): number {
  return priority[op] ?? 0;
}

/**
 * Operator-precedence conversion of an explicit-AND expression to postfix,
 * with NOT runs folded by parity.
 */
export function toPostfix(expr: string): Result<string> {
  let out = '';
  const stack: string[] = [];
  const top = () => stack[stack.length - 1] ?? '';

  for (const c of expr) {
    if (isVariable(c) || isDigit(c)) {
      out += c;
    } else if (c === ')') {
      while (stack.length > 0 && top() !== '(') {
        out += stack.pop() ?? '';
      }
      if (stack.length === 0) {
        return fail({ kind: 'InvalidExpression', reason: 'unmatched-close' });
      }
      stack.pop();
    } else if (stack.length === 0 || c === '(' || prio(top()) < prio(c)) {
      stack.push(c);
    } else {
      while (stack.length > 0 && prio(top()) > prio(c)) {
        out += stack.pop() ?? '';
      }
      stack.push(c);
    }
  }

  while (stack.length > 0) {
    const op = stack.pop() ?? '';
    if (op === '(') {
      return fail({ kind: 'InvalidExpression', reason: 'unmatched-open' });
    }
    out += op;
  }
  return ok(collapseNots(out));
}

export function collapseNots(postfix: string): string {
  let out = '';
  let run = 0;
  for (const c of postfix) {
    if (c === NOT) {
      run++;
      continue;
    }
    if (run % 2 === 1) out += NOT;
    run = 0;
    out += c;
  }
  if (run % 2 === 1) out += NOT;
  return out;
}
