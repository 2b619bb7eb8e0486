/**
 * Mixup Lexer
 */

export { stripComments } from './comments.js';
export { nextToken, tokenize } from './tokenizer.js';
export { createLexerState, type LexerState } from './state.js';
