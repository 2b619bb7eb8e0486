/**
 * Parser Helpers
 * Name and file-reference readers, plus literal quoting for serialization
 * @internal This module contains internal parser utilities
 */

import { TOKEN_TYPES, type Token } from '../token-types.js';
import {
  advance,
  atStatementEnd,
  current,
  expectType,
  type ParserState,
} from './state.js';

const NAME_TOKENS = [TOKEN_TYPES.WORD, TOKEN_TYPES.STRING, TOKEN_TYPES.DSTRING];

/**
 * Read a type, level or dictionary name. Quoted names are accepted and
 * arrive quote-stripped.
 * @internal
 */
export function readName(state: ParserState, description: string): string {
  return expectType(state, NAME_TOKENS, description).value;
}

function isAdjacent(previous: Token, token: Token): boolean {
  return previous.span.end.offset === token.span.start.offset;
}

/**
 * Read a file name: one quoted literal, or a run of bare tokens written
 * without spaces between them (`lib/names.txt`).
 * @internal
 */
export function readFileName(state: ParserState, description: string): string {
  const first = expectType(
    state,
    [
      TOKEN_TYPES.WORD,
      TOKEN_TYPES.STRING,
      TOKEN_TYPES.DSTRING,
      TOKEN_TYPES.DOT,
      TOKEN_TYPES.SYMBOL,
      TOKEN_TYPES.MINUS,
      TOKEN_TYPES.TILDE,
    ],
    description
  );
  if (first.type === TOKEN_TYPES.STRING || first.type === TOKEN_TYPES.DSTRING) {
    return first.value;
  }

  let name = first.value;
  let previous = first;
  while (!atStatementEnd(state)) {
    const token = current(state);
    if (
      !isAdjacent(previous, token) ||
      token.type === TOKEN_TYPES.COMMA ||
      token.type === TOKEN_TYPES.STRING ||
      token.type === TOKEN_TYPES.DSTRING
    ) {
      break;
    }
    name += advance(state).value;
    previous = token;
  }
  return name;
}

// ============================================================
// SERIALIZATION
// ============================================================

const BARE_NAME = /^[A-Za-z0-9_]+$/;

/** Single-quoted literal with `'` escaped, as the lexer reads it back */
export function quoteLiteral(text: string): string {
  return `'${text.replace(/'/g, "\\'")}'`;
}

/**
 * A name as program text: bare when it is a single word, otherwise
 * double-quoted (or single-quoted when it contains `"`).
 */
export function formatName(name: string): string {
  if (BARE_NAME.test(name)) return name;
  return name.includes('"') ? quoteLiteral(name) : `"${name}"`;
}
