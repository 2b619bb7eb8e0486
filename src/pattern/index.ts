export { PatternExpression } from './expression.js';
export { parsePattern } from './parser.js';
export { matchSpan, testToken } from './matcher.js';
export type {
  ItemNode,
  PatternNode,
  RepeatNode,
  SequenceNode,
  TokenTest,
  TypeRefNode,
} from './ast.js';
