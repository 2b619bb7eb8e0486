/**
 * Tokenizer
 * Turns comment-free program text into a flat token list
 */

import { TOKEN_TYPES, type Token } from '../token-types.js';
import {
  SINGLE_CHAR_OPERATORS,
  THREE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import {
  advanceAndMakeToken,
  makeToken,
  readDoubleQuoted,
  readSingleQuoted,
  readWord,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  isWhitespace,
  isWordChar,
  type LexerState,
  peek,
  peekString,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

export function nextToken(state: LexerState): Token {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === "'") {
    return readSingleQuoted(state);
  }

  if (ch === '"') {
    return readDoubleQuoted(state);
  }

  if (isWordChar(ch)) {
    return readWord(state);
  }

  const threeChar = peekString(state, 3);
  const threeCharType = THREE_CHAR_OPERATORS[threeChar];
  if (threeCharType) {
    return advanceAndMakeToken(state, 3, threeCharType, threeChar, start);
  }

  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  // Free-form punctuation is legal inside dictionaries and tries
  return advanceAndMakeToken(state, 1, TOKEN_TYPES.SYMBOL, ch, start);
}

/**
 * Tokenize program text. Comments must already be stripped.
 * The returned list always ends with an EOF token.
 */
export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
