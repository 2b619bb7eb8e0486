/**
 * Pattern Expression Parser
 *
 * Compiles the remaining tokens of a statement:
 *
 *   expr   := seq ('||' seq)*
 *   seq    := item+
 *   item   := '...' | '[' | ']' | '@' NAME '?'? | test repeat?
 *   test   := 'any' | STRING | eq(STRING) | eqi(STRING) | re(STRING)
 *           | a(NAME) | ai(NAME) | NAME ':' VALUE | NAME
 *           | '!' test | '<' test (',' test)* '>'
 *   repeat := '*' | '+' | '?' | '{' N (',' M?)? '}'
 */

import { TOKEN_TYPES, type Token } from '../token-types.js';
import {
  advance,
  atStatementEnd,
  check,
  current,
  describeToken,
  expectType,
  parseError,
  peek,
  type ParserState,
} from '../parser/state.js';
import type {
  ItemNode,
  PatternNode,
  RepeatNode,
  SequenceNode,
  TokenTest,
} from './ast.js';

const NAME_TYPES = [TOKEN_TYPES.WORD, TOKEN_TYPES.STRING, TOKEN_TYPES.DSTRING];

function invalid(state: ParserState, reason: string, token?: Token) {
  return parseError(state, 'MIXUP-P010', { reason }, token);
}

/** Parse a pattern from the current position to the end of the statement */
export function parsePattern(state: ParserState): PatternNode {
  if (atStatementEnd(state)) {
    throw invalid(state, 'missing pattern expression');
  }

  const alternatives: SequenceNode[] = [parseSequence(state)];
  while (check(state, TOKEN_TYPES.OR)) {
    advance(state); // consume ||
    alternatives.push(parseSequence(state));
  }
  return { alternatives };
}

function parseSequence(state: ParserState): SequenceNode {
  const start = current(state);
  const items: ItemNode[] = [];
  while (!atStatementEnd(state) && !check(state, TOKEN_TYPES.OR)) {
    items.push(parseItem(state));
  }
  if (items.length === 0) {
    throw invalid(state, 'empty pattern sequence');
  }

  // At most one bracket pair, opened before it is closed
  const opens = items.filter((item) => item.kind === 'Open').length;
  const closes = items.filter((item) => item.kind === 'Close').length;
  const openAt = items.findIndex((item) => item.kind === 'Open');
  const closeAt = items.findIndex((item) => item.kind === 'Close');
  if (opens !== closes || opens > 1 || openAt > closeAt) {
    throw invalid(state, "unbalanced '[' ']' in pattern", start);
  }

  return { items };
}

function parseItem(state: ParserState): ItemNode {
  const token = current(state);
  switch (token.type) {
    case TOKEN_TYPES.ELLIPSIS:
      advance(state);
      return { kind: 'Gap' };
    case TOKEN_TYPES.LBRACKET:
      advance(state);
      return { kind: 'Open' };
    case TOKEN_TYPES.RBRACKET:
      advance(state);
      return { kind: 'Close' };
    case TOKEN_TYPES.AT: {
      advance(state); // consume @
      const type = expectType(state, NAME_TYPES, 'type name after @').value;
      const optional = check(state, TOKEN_TYPES.QUESTION);
      if (optional) advance(state);
      return { kind: 'TypeRef', type, optional };
    }
    default: {
      const test = parseTest(state);
      return parseRepeat(state, test);
    }
  }
}

const TEST_FUNCTIONS = ['eq', 'eqi', 're', 'a', 'ai'] as const;
type TestFunction = (typeof TEST_FUNCTIONS)[number];

function isTestFunction(name: string): name is TestFunction {
  return TEST_FUNCTIONS.some((test) => test === name);
}

function parseTest(state: ParserState): TokenTest {
  const token = current(state);

  if (token.type === TOKEN_TYPES.BANG) {
    advance(state);
    return { kind: 'Not', test: parseTest(state) };
  }

  if (token.type === TOKEN_TYPES.LT) {
    advance(state);
    const tests = [parseTest(state)];
    while (check(state, TOKEN_TYPES.COMMA)) {
      advance(state);
      tests.push(parseTest(state));
    }
    expectType(state, [TOKEN_TYPES.GT], "'>'");
    return { kind: 'All', tests };
  }

  if (token.type === TOKEN_TYPES.STRING) {
    advance(state);
    return { kind: 'Eq', text: token.value, ignoreCase: false };
  }

  if (token.type !== TOKEN_TYPES.WORD) {
    throw invalid(
      state,
      `unexpected ${describeToken(token)} in pattern expression`
    );
  }

  const following = peek(state, 1).type;

  if (following === TOKEN_TYPES.LPAREN) {
    if (!isTestFunction(token.value)) {
      throw invalid(state, `unknown test '${token.value}'`);
    }
    advance(state); // consume name
    advance(state); // consume (
    const test = parseTestCall(state, token.value);
    expectType(state, [TOKEN_TYPES.RPAREN], "')'");
    return test;
  }

  if (following === TOKEN_TYPES.COLON) {
    advance(state); // consume key
    advance(state); // consume :
    const value = expectType(state, NAME_TYPES, 'property value').value;
    return { kind: 'PropEq', key: token.value, value };
  }

  advance(state);
  if (token.value === 'any') {
    return { kind: 'Any' };
  }
  return { kind: 'PropSet', key: token.value };
}

function parseTestCall(state: ParserState, fn: TestFunction): TokenTest {
  switch (fn) {
    case 'eq':
    case 'eqi': {
      const text = expectType(state, [TOKEN_TYPES.STRING], 'quoted text').value;
      return { kind: 'Eq', text, ignoreCase: fn === 'eqi' };
    }
    case 're': {
      const arg = expectType(state, [TOKEN_TYPES.STRING], 'quoted regex');
      try {
        return { kind: 'Regex', source: arg.value, regex: new RegExp(arg.value) };
      } catch (err) {
        throw parseError(
          state,
          'MIXUP-P011',
          {
            pattern: `'${arg.value}'`,
            reason: err instanceof Error ? err.message : String(err),
          },
          arg,
          err
        );
      }
    }
    case 'a':
    case 'ai': {
      const name = expectType(state, NAME_TYPES, 'dictionary name').value;
      return { kind: 'InDict', dictionary: name, ignoreCase: fn === 'ai' };
    }
  }
}

function parseRepeat(state: ParserState, test: TokenTest): RepeatNode {
  const token = current(state);
  switch (token.type) {
    case TOKEN_TYPES.STAR:
      advance(state);
      return { kind: 'Repeat', test, min: 0, max: Infinity };
    case TOKEN_TYPES.PLUS:
      advance(state);
      return { kind: 'Repeat', test, min: 1, max: Infinity };
    case TOKEN_TYPES.QUESTION:
      advance(state);
      return { kind: 'Repeat', test, min: 0, max: 1 };
    case TOKEN_TYPES.LBRACE: {
      advance(state); // consume {
      const min = parseCount(state);
      let max = min;
      if (check(state, TOKEN_TYPES.COMMA)) {
        advance(state);
        max = check(state, TOKEN_TYPES.WORD) ? parseCount(state) : Infinity;
      }
      expectType(state, [TOKEN_TYPES.RBRACE], "'}'");
      if (max < min) {
        throw invalid(state, `repeat bounds {${min},${max}} are reversed`, token);
      }
      return { kind: 'Repeat', test, min, max };
    }
    default:
      return { kind: 'Repeat', test, min: 1, max: 1 };
  }
}

function parseCount(state: ParserState): number {
  const token = expectType(state, [TOKEN_TYPES.WORD], 'repeat count');
  if (!/^\d+$/.test(token.value)) {
    throw invalid(state, `expected a repeat count, got '${token.value}'`, token);
  }
  return Number(token.value);
}
