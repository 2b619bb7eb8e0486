import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  WORD: 'WORD', // letters, digits and underscores (identifiers and numbers)
  STRING: 'STRING', // 'single quoted'
  DSTRING: 'DSTRING', // "double quoted" (file references, quoted names)

  // Statement structure
  SEMICOLON: 'SEMICOLON', // ;
  COMMA: 'COMMA', // ,
  COLON: 'COLON', // :
  ASSIGN: 'ASSIGN', // =

  // Generator markers
  MINUS: 'MINUS', // -
  TILDE: 'TILDE', // ~

  // Pattern operators
  PLUS: 'PLUS', // +
  DOT: 'DOT', // .
  ELLIPSIS: 'ELLIPSIS', // ...
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LT: 'LT', // <
  GT: 'GT', // >
  AT: 'AT', // @
  BANG: 'BANG', // !
  QUESTION: 'QUESTION', // ?
  STAR: 'STAR', // *
  OR: 'OR', // ||
  AND: 'AND', // &&
  PIPE_BAR: 'PIPE_BAR', // |
  AMPERSAND: 'AMPERSAND', // &

  // Any other printable character
  SYMBOL: 'SYMBOL',

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Token text; quoted literals carry their unquoted, unescaped content */
  readonly value: string;
  readonly span: SourceSpan;
}
