import type { Cover } from './qm';

/**
 * `0` becomes a negated literal, `1` a plain one, `-` is dropped.
 */
export function renderProduct(pattern: string, variables: readonly string[]): string {
  let out = '';
  for (const [i, bit] of [...pattern].entries()) {
    const name = variables[i] ?? '';
    if (bit === '0') out += `${name}'`;
    else if (bit === '1') out += name;
  }
  return out;
}

/**
 * Patterns in the order their products are printed: by literal string.
 */
export function orderPatterns(patterns: readonly string[], variables: readonly string[]): string[] {
  return patterns
    .map(pattern => ({ pattern, text: renderProduct(pattern, variables) }))
    .sort((a, b) => (a.text < b.text ? -1 : a.text > b.text ? 1 : 0))
    .map(({ pattern }) => pattern);
}

export function renderCover(cover: Cover, variables: readonly string[]): string {
  switch (cover.kind) {
    case 'zero':
      return '0';
    case 'one':
      return '1';
    case 'sum':
      return orderPatterns(cover.patterns, variables)
        .map(pattern => renderProduct(pattern, variables))
        .join('+');
  }
}
