/**
 * Parser State
 * Token navigation for the statement parser and the pattern compiler.
 *
 * The statement terminator `;` is never consumed by statement parsers:
 * `next()` reports it (and end of input) as null.
 */

import { ParseError } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';
import { TOKEN_TYPES, type Token } from '../token-types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Keyword of the statement being parsed (for error messages) */
  keyword: string;
}

export function createParserState(tokens: Token[]): ParserState {
  return { tokens, pos: 0, keyword: '' };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token =
    state.tokens[state.pos + offset] ?? state.tokens[state.tokens.length - 1];
  if (!token) throw new Error('No tokens available');
  return token;
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** True on the statement terminator or at end of input */
export function atStatementEnd(state: ParserState): boolean {
  return check(state, TOKEN_TYPES.SEMICOLON, TOKEN_TYPES.EOF);
}

/** @internal */
export function check(state: ParserState, ...types: string[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Quoted literals never count as operators or keywords */
export function isBare(token: Token): boolean {
  return token.type !== TOKEN_TYPES.STRING && token.type !== TOKEN_TYPES.DSTRING;
}

/** True when the current token is the bare text `text` */
export function checkText(state: ParserState, text: string): boolean {
  const token = current(state);
  return !atStatementEnd(state) && isBare(token) && token.value === text;
}

/**
 * The token source: returns the next token of the statement, or null at
 * the statement terminator / end of input. With `expected`, a token whose
 * text is not in the set is a parse failure.
 */
export function next(
  state: ParserState,
  expected?: readonly string[]
): Token | null {
  if (atStatementEnd(state)) return null;
  const token = current(state);
  if (expected && !(isBare(token) && expected.includes(token.value))) {
    throw parseError(state, 'MIXUP-P002', {
      expected: expected.map((e) => `'${e}'`).join(' or '),
      actual: describeToken(token),
    });
  }
  return advance(state);
}

/** Like next(), but the end of the statement is a parse failure */
export function expectNext(
  state: ParserState,
  expected: readonly string[] | undefined,
  description: string
): Token {
  const token = next(state, expected);
  if (!token) {
    throw parseError(state, 'MIXUP-P008', { expected: description });
  }
  return token;
}

/** Consume a token of one of `types`, naming `description` on failure */
export function expectType(
  state: ParserState,
  types: readonly string[],
  description: string
): Token {
  if (atStatementEnd(state)) {
    throw parseError(state, 'MIXUP-P008', { expected: description });
  }
  if (!check(state, ...types)) {
    throw parseError(state, 'MIXUP-P002', {
      expected: description,
      actual: describeToken(current(state)),
    });
  }
  return advance(state);
}

// ============================================================
// ERRORS
// ============================================================

/** Human-readable token for error messages */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.EOF:
      return 'end of input';
    case TOKEN_TYPES.STRING:
      return `'${token.value}'`;
    case TOKEN_TYPES.DSTRING:
      return `"${token.value}"`;
    default:
      return `'${token.value}'`;
  }
}

/**
 * Build a ParseError located at `token` (default: the current token) and
 * tagged with the statement keyword.
 */
export function parseError(
  state: ParserState,
  errorId: string,
  context: Record<string, unknown>,
  token: Token = current(state),
  cause?: unknown
): ParseError {
  const fullContext = { keyword: state.keyword, ...context };
  const template = ERROR_REGISTRY.get(errorId)?.messageTemplate ?? errorId;
  return new ParseError(
    errorId,
    renderMessage(template, fullContext),
    token.span.start,
    fullContext,
    cause
  );
}
