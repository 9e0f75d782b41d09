import { parse, type Bit } from './ast';
import { ok, type Result } from './errors';
import { minimize, type Cover } from './qm';
import { renderCover } from './render';
import { buildTruthTable, evaluateConstant, type TruthTable } from './truth-table';

export type Analysis =
  | { kind: 'constant', value: Bit }
  | { kind: 'table', table: TruthTable, cover: Cover };

/**
 * Runs the whole pipeline on one expression.
 */
export function analyze(input: string): Result<Analysis> {
  const parsed = parse(input);
  if (!parsed.ok) return parsed;

  const { variables, root } = parsed.out;
  if (variables.length === 0) {
    return ok({ kind: 'constant', value: evaluateConstant(root) });
  }

  const table = buildTruthTable(root, variables);
  return ok({ kind: 'table', table, cover: minimize(table.minterms, variables.length) });
}

export function simplify(input: string): Result<string> {
  const analysis = analyze(input);
  if (!analysis.ok) return analysis;

  const result = analysis.out;
  if (result.kind === 'constant') {
    return ok(String(result.value));
  }
  return ok(renderCover(result.cover, result.table.variables));
}
