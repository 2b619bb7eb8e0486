/**
 * Lexer State
 * Tracks position in program text during tokenization
 */

import type { SourceLocation } from '../source-location.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return { source, pos: 0, line: 1, column: 1 };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source.charAt(state.pos + offset);
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

/** Consume one character, keeping line and column current */
export function advance(state: LexerState): string {
  const ch = state.source.charAt(state.pos);
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

// ============================================================
// CHARACTER CLASSES
// ============================================================

export function isWordChar(ch: string): boolean {
  return (
    (ch >= 'a' && ch <= 'z') ||
    (ch >= 'A' && ch <= 'Z') ||
    (ch >= '0' && ch <= '9') ||
    ch === '_'
  );
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n' || ch === '\f';
}
