import { fail, ok, type Result } from './errors';

export const AND = '*';
export const OR = '+';
export const XOR = '^';
export const NOT = "'";

const SYMBOLS = new Set(['(', ')', OR, NOT, XOR, '0', '1']);

export function isVariable(c: string): boolean {
  return c.length === 1 && c >= 'A' && c <= 'Z';
}

export function isDigit(c: string): boolean {
  return c === '0' || c === '1';
}

/**
 * Checks the character set and collects the variables in natural order.
 * Parentheses and operator placement are left to the later stages.
 */
export function validate(input: string): Result<string[]> {
  const vars = new Set<string>();
  for (const [position, char] of [...input].entries()) {
    if (isVariable(char)) {
      vars.add(char);
    } else if (!SYMBOLS.has(char)) {
      return fail({ kind: 'InvalidCharacter', char, position });
    }
  }
  return ok([...vars].sort());
}

/**
 * Makes juxtaposition explicit: `AB'(C+1)` becomes `A*B'*(C+1)`.
 */
export function insertAnd(input: string): string {
  let out = '';
  let prev = '';
  for (const c of input) {
    const opensOperand = isVariable(c) || isDigit(c) || c === '(';
    if (prev !== '' && opensOperand && prev !== '(' && prev !== OR && prev !== XOR) {
      out += AND;
    }
    out += c;
    prev = c;
  }
  return out;
}
