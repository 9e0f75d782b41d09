export type LogicError =
  | { kind: 'InvalidCharacter'; char: string; position: number }
  | { kind: 'InvalidExpression'; reason: 'unmatched-close' | 'unmatched-open' | 'dangling-operands' | 'empty' }
  | { kind: 'InvalidNotOperand' }
  | { kind: 'InvalidAndOperands' }
  | { kind: 'InvalidXorOperands' }
  | { kind: 'InvalidOrOperands' }
  | { kind: 'InvalidToken'; token: string };

export type Result<T> = { ok: true, out: T } | { ok: false, error: LogicError };

export function ok<T>(out: T): Result<T> {
  return { ok: true, out };
}

export function fail<T>(error: LogicError): Result<T> {
  return { ok: false, error };
}

const reasons = {
  'unmatched-close': "unmatched ')'",
  'unmatched-open': "unmatched '('",
  'dangling-operands': 'missing operator',
  'empty': 'empty expression',
} as const;

export function describeError(error: LogicError): string {
  switch (error.kind) {
    case 'InvalidCharacter':
      return `[ERROR] Invalid character '${error.char}' at ${error.position}`;
    case 'InvalidExpression':
      return `[ERROR] Invalid expression: ${reasons[error.reason]}`;
    case 'InvalidNotOperand':
      return '[ERROR] Invalid NOT logic';
    case 'InvalidAndOperands':
      return '[ERROR] Invalid AND logic';
    case 'InvalidXorOperands':
      return '[ERROR] Invalid XOR logic';
    case 'InvalidOrOperands':
      return '[ERROR] Invalid OR logic';
    case 'InvalidToken':
      return `[ERROR] Invalid token '${error.token}'`;
  }
}
