/**
 * Operator Lookup Tables
 */

import { TOKEN_TYPES, type TokenType } from '../token-types.js';

/** Three-character operator lookup table */
export const THREE_CHAR_OPERATORS: Record<string, TokenType> = {
  '...': TOKEN_TYPES.ELLIPSIS,
};

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '||': TOKEN_TYPES.OR,
  '&&': TOKEN_TYPES.AND,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  ';': TOKEN_TYPES.SEMICOLON,
  ',': TOKEN_TYPES.COMMA,
  ':': TOKEN_TYPES.COLON,
  '=': TOKEN_TYPES.ASSIGN,
  '-': TOKEN_TYPES.MINUS,
  '~': TOKEN_TYPES.TILDE,
  '+': TOKEN_TYPES.PLUS,
  '.': TOKEN_TYPES.DOT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '@': TOKEN_TYPES.AT,
  '!': TOKEN_TYPES.BANG,
  '?': TOKEN_TYPES.QUESTION,
  '*': TOKEN_TYPES.STAR,
  '|': TOKEN_TYPES.PIPE_BAR,
  '&': TOKEN_TYPES.AMPERSAND,
};
