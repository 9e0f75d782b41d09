#!/usr/bin/env node
/**
 * Boolean expression reducer
 *
 * Usage: logic-reduce [expression]
 */

import { once } from 'node:events';
import * as readline from 'node:readline/promises';
import { describeError } from './errors';
import { formatReport } from './format';
import { analyze } from './simplify';

export type CliIO = {
  readLine: (prompt: string) => Promise<string>;
  write: (text: string) => void;
  error: (text: string) => void;
};

type CliOptions = { help: true } | { help: false, expression: string | null };

export function parseArgs(args: string[]): CliOptions | string {
  let expression: string | null = null;

  for (const arg of args) {
    if (arg === '-h' || arg === '--help') {
      return { help: true };
    } else if (arg.startsWith('-')) {
      return `Error: Unknown option '${arg}'`;
    } else if (expression !== null) {
      return `Error: Unexpected argument '${arg}'`;
    } else {
      expression = arg;
    }
  }

  return { help: false, expression };
}

export function usage(): string {
  return `Boolean expression reducer

Usage: logic-reduce [expression]

Variables are A-Z, constants 0 and 1. Operators, by precedence:
  '   NOT (postfix)
      AND (juxtaposition)
  ^   XOR
  +   OR

Without an expression, one is read from standard input.

Examples:
  logic-reduce "AB'+A'B"
  logic-reduce "(AB'+A'B)'^C"`;
}

// First whitespace-delimited word, or '' for a blank line
function firstWord(line: string): string {
  return line.trim().split(/\s+/)[0] ?? '';
}

export async function main(args: string[], io: CliIO): Promise<number> {
  const options = parseArgs(args);
  if (typeof options === 'string') {
    io.error(options);
    io.error(usage());
    return 1;
  }
  if (options.help) {
    io.write(usage());
    return 0;
  }

  const input = options.expression ?? firstWord(await io.readLine('Input expression: '));
  const result = analyze(input);
  if (!result.ok) {
    io.error(describeError(result.error));
    return 1;
  }

  io.write('');
  io.write(formatReport(result.out));
  return 0;
}

// Resolves '' when the input ends before a line arrives
export async function readLineFrom(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  prompt: string,
): Promise<string> {
  const rl = readline.createInterface({ input, output });
  const closed = once(rl, 'close').then(() => '');
  try {
    return await Promise.race([rl.question(prompt), closed]);
  } finally {
    rl.close();
  }
}

export const terminalIO: CliIO = {
  readLine: (prompt) => readLineFrom(process.stdin, process.stdout, prompt),
  write: (text) => console.log(text),
  error: (text) => console.error(text),
};

if (require.main === module) {
  void main(process.argv.slice(2), terminalIO)
    .then((code) => { process.exitCode = code; })
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
