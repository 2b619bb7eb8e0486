/**
 * Token Readers
 * Functions to read specific token types from program text
 */

import { createError } from '../error-classes.js';
import { TOKEN_TYPES, type Token, type TokenType } from '../token-types.js';
import type { SourceLocation } from '../source-location.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  isWordChar,
  type LexerState,
  peek,
} from './state.js';

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, value, span: { start, end } };
}

/** Advance n times and return a token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  type: TokenType,
  value: string,
  start: SourceLocation
): Token {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(type, value, start, currentLocation(state));
}

export function readWord(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isWordChar(peek(state))) {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.WORD, value, start, currentLocation(state));
}

/**
 * Read a single-quoted literal. `\'` is unescaped to `'`; every other
 * backslash is kept so regex escapes reach the regex engine untouched.
 */
export function readSingleQuoted(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening '

  let value = '';
  while (peek(state) !== "'") {
    if (isAtEnd(state) || peek(state) === '\n') {
      throw createError('MIXUP-L001', { quote: 'single' }, start);
    }
    if (peek(state) === '\\' && peek(state, 1) === "'") {
      advance(state); // consume backslash
      value += advance(state);
    } else {
      value += advance(state);
    }
  }
  advance(state); // consume closing '

  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

/** Read a double-quoted literal (file references, quoted names) */
export function readDoubleQuoted(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (peek(state) !== '"') {
    if (isAtEnd(state) || peek(state) === '\n') {
      throw createError('MIXUP-L001', { quote: 'double' }, start);
    }
    value += advance(state);
  }
  advance(state); // consume closing "

  return makeToken(TOKEN_TYPES.DSTRING, value, start, currentLocation(state));
}
