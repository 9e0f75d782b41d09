import { orderPatterns } from './render';

export type ExprConfig<T> = {
  ctorAnd: (lhs: T, rhs: T) => T;
  ctorOr: (lhs: T, rhs: T) => T;
  ctorNot: (operand: T) => T;
  ctorLiteral: (value: boolean) => T;
  ctorVariable: (name: string) => T;
}

export type Cover =
  | { kind: 'zero' }
  | { kind: 'one' }
  | { kind: 'sum', patterns: string[] };

export type PrimeImplicant = {
  pattern: string;
  covers: number[];
};

type Bit = '0' | '1' | '-';
type Cube = Bit[];

export function minimize(minterms: readonly number[], n: number): Cover {
  if (minterms.length === 0) {
    return { kind: 'zero' };
  }
  if (minterms.length === 2 ** n) {
    return { kind: 'one' };
  }
  return { kind: 'sum', patterns: selectCover(getPrimes(minterms, n), minterms) };
}

// --- prime implicants
export function getPrimes(minterms: readonly number[], n: number): PrimeImplicant[] {
  const coverage = new Map<string, Set<number>>();
  const coverageOf = (cube: Cube) => {
    const set = coverage.get(cubeKey(cube));
    if (!set) throw new Error(`Unknown implicant ${cubeKey(cube)}`);
    return set;
  };

  let current: Cube[] = minterms.map(m => {
    const cube = toCube(m, n);
    coverage.set(cubeKey(cube), new Set([m]));
    return cube;
  });

  while (true) {
    const groups = new Map<number, Cube[]>();
    for (const cube of current) {
      const ones = countOnes(cube);
      const group = groups.get(ones) ?? [];
      group.push(cube);
      groups.set(ones, group);
    }

    const created: Cube[] = [];
    const consumed = new Set<string>();
    for (const ones of [...groups.keys()].sort((a, b) => a - b)) {
      const lower = groups.get(ones) ?? [];
      const upper = groups.get(ones + 1) ?? [];
      for (const cube1 of upper) {
        for (const cube2 of lower) {
          const result = canCombine(cube1, cube2);
          if (!result.ok) continue;
          const key = cubeKey(result.out);
          if (!coverage.has(key)) {
            coverage.set(key, new Set([...coverageOf(cube1), ...coverageOf(cube2)]));
            created.push(result.out);
          }
          consumed.add(cubeKey(cube1));
          consumed.add(cubeKey(cube2));
        }
      }
    }

    if (consumed.size === 0) break;
    current = [...created, ...current.filter(c => !consumed.has(cubeKey(c)))];
  }

  return current.map(cube => ({
    pattern: cubeKey(cube),
    covers: [...coverageOf(cube)].sort((a, b) => a - b),
  }));
}

function canCombine(a: Cube, b: Cube): { ok: true, out: Cube } | { ok: false } {
  let diff = 0, pos = -1;
  for (let i = 0; i < a.length; i++) {
    const x = a[i], y = b[i];
    if (x === y) continue;
    if (x === '-' || y === '-') return { ok: false };
    diff++; pos = i;
    if (diff > 1) return { ok: false };
  }
  if (diff !== 1) return { ok: false };
  const out = a.slice(); out[pos] = '-';
  return { ok: true, out };
}

function countOnes(cube: Cube): number {
  return cube.filter(bit => bit === '1').length;
}

function toCube(minterm: number, n: number): Cube {
  const cube: Cube = [];
  for (let j = n - 1; j >= 0; j--) {
    cube.push((minterm >> j) & 1 ? '1' : '0');
  }
  return cube;
}

function cubeKey(c: Cube) {
  return c.join('');
}

export function toPattern(minterm: number, n: number): string {
  return cubeKey(toCube(minterm, n));
}

/**
 * Every minterm index a pattern stands for, ascending.
 */
export function patternMinterms(pattern: string): number[] {
  return [...pattern].reduce((acc: number[], bit) =>
    bit === '-' ?
      acc.flatMap(m => [m * 2, m * 2 + 1]) :
      acc.map(m => m * 2 + (bit === '1' ? 1 : 0))
    , [0]);
}

// --- cover selection
/**
 * Greedy cover: repeatedly take the minterm with the fewest candidates
 * (lowest index on ties) and pick its broadest remaining implicant
 * (earliest prime on ties).
 */
export function selectCover(primes: readonly PrimeImplicant[], minterms: readonly number[]): string[] {
  const remaining = new Map(primes.map(pi => [pi.pattern, new Set(pi.covers)] as const));
  const candidates = new Map<number, string[]>();
  for (const m of minterms) {
    const covering = primes.filter(pi => pi.covers.includes(m)).map(pi => pi.pattern);
    if (covering.length > 0) candidates.set(m, covering);
  }

  const selected: string[] = [];
  while (candidates.size > 0) {
    let fewest: string[] = [];
    let fewestCount = Infinity;
    for (const covering of candidates.values()) {
      if (covering.length < fewestCount) {
        fewestCount = covering.length;
        fewest = covering;
      }
    }

    let pick = '', widest = 0;
    for (const key of fewest) {
      const size = remaining.get(key)?.size ?? 0;
      if (size > widest) { widest = size; pick = key; }
    }
    const taken = remaining.get(pick);
    if (!taken) throw new Error('Cannot cover all minterms');

    selected.push(pick);
    remaining.delete(pick);
    for (const m of taken) {
      for (const set of remaining.values()) set.delete(m);
      candidates.delete(m);
    }
  }
  return selected;
}

// --- host expression output
export function buildEmitter<T>(cfg: ExprConfig<T>) {

  function product(pattern: string, variables: readonly string[]): T {
    const literals = [...pattern].flatMap((bit, index): T[] => {
      const name = variables[index];
      if (bit === '-' || name === undefined) return [];
      const atom = cfg.ctorVariable(name);
      return [bit === '1' ? atom : cfg.ctorNot(atom)];
    });
    return literals.reduce((acc: T, literal, index) =>
      index === 0 ? literal : cfg.ctorAnd(acc, literal), cfg.ctorLiteral(true));
  }

  function emit(cover: Cover, variables: readonly string[]): T {
    switch (cover.kind) {
      case 'zero':
        return cfg.ctorLiteral(false);
      case 'one':
        return cfg.ctorLiteral(true);
      case 'sum':
        return orderPatterns(cover.patterns, variables).reduce((acc: T, pattern, index) => {
          const right = product(pattern, variables);
          return index === 0 ? right : cfg.ctorOr(acc, right);
        }, cfg.ctorLiteral(false));
    }
  }

  return { emit };
}
