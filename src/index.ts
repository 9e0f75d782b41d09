export { describeError, type LogicError, type Result } from './errors';
export { validate, insertAnd } from './lexer';
export { toPostfix, collapseNots } from './postfix';
export { buildTree, evaluate, collectVariables, parse, type Bit, type Node, type Parsed } from './ast';
export { buildTruthTable, evaluateConstant, assignmentOf, type TruthTable } from './truth-table';
export {
  getPrimes,
  selectCover,
  minimize,
  buildEmitter,
  toPattern,
  patternMinterms,
  type Cover,
  type ExprConfig,
  type PrimeImplicant,
} from './qm';
export { renderProduct, renderCover } from './render';
export { analyze, simplify, type Analysis } from './simplify';
export { formatTable, formatMinterms, formatReport } from './format';
