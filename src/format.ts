import { renderCover } from './render';
import type { Analysis } from './simplify';
import type { TruthTable } from './truth-table';

export function formatTable(table: TruthTable): string {
  const n = table.variables.length;
  const lines = [table.variables.map(name => `${name} `).join('') + '| Y'];
  for (const [i, y] of table.outputs.entries()) {
    let row = '';
    for (let j = n - 1; j >= 0; j--) {
      row += `${(i >> j) & 1} `;
    }
    lines.push(`${row}| ${y}`);
  }
  return lines.join('\n');
}

export function formatMinterms(minterms: readonly number[]): string {
  return `Y = m(${minterms.join(', ')})`;
}

export function formatReport(analysis: Analysis): string {
  if (analysis.kind === 'constant') {
    return `Constant expression:\nY = ${analysis.value}`;
  }
  const { table, cover } = analysis;
  return [
    formatTable(table),
    '',
    formatMinterms(table.minterms),
    '',
    `Y = ${renderCover(cover, table.variables)}`,
  ].join('\n');
}
