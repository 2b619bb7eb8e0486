/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ResourceResolver } from '../resources.js';
import type { Tokenizer } from '../text/tokenizer.js';
import type { Token } from '../token-types.js';
import type { Statement } from '../types.js';
import type { Program } from './program.js';
import { type ParserState, createParserState } from './state.js';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/** What a statement parser returns; the dispatcher adds keyword and span */
export type StatementBody = DistributiveOmit<Statement, 'keyword' | 'span'>;

export interface ParserOptions {
  /** Resolves word-list and phrase-list file references */
  readonly resolver: ResourceResolver;
  /** Splits trie phrases into tokens, as the base level does */
  readonly tokenizer: Tokenizer;
}

/**
 * Parser that turns program tokens into a Program.
 *
 * Methods are organized across multiple files:
 * - parser-program.ts: program loop and keyword dispatch
 * - parser-statements.ts: declarations, levels, labeling statements
 * - parser-lists.ts: dictionary and trie bodies
 * - parser-generators.ts: scope and generator bodies
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(stripComments(source)), options);
 * const program = parser.parse();
 * ```
 */
export class Parser {
  /** Token position and the keyword of the statement being parsed */
  state: ParserState;
  readonly options: ParserOptions;

  constructor(tokens: Token[], options: ParserOptions) {
    this.state = createParserState(tokens);
    this.options = options;
  }

  parse(): Program {
    return this.parseProgram();
  }
}
