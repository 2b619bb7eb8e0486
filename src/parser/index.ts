/**
 * Mixup Parser
 * Main entry point and re-exports
 */

import { stripComments, tokenize } from '../lexer/index.js';
import { createResourceResolver, type ResourceResolver } from '../resources.js';
import { Tokenizer } from '../text/tokenizer.js';
import { Parser, type ParserOptions } from './parser.js';
import type { Program } from './program.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-program.js';
import './parser-statements.js';
import './parser-lists.js';
import './parser-generators.js';

export interface ParseOptions {
  /** Resolver for file references; defaults to the working directory */
  resolver?: ResourceResolver | undefined;
  /** Tokenizer for trie phrases; defaults to the base tokenizer */
  tokenizer?: Tokenizer | undefined;
}

function parserOptions(options: ParseOptions): ParserOptions {
  return {
    resolver: options.resolver ?? createResourceResolver(),
    tokenizer: options.tokenizer ?? new Tokenizer(),
  };
}

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse a program: `//` comments are stripped, then statements are read
 * up to each `;`.
 *
 * Throws LexerError or ParseError on the first malformed statement.
 *
 * @example
 * ```typescript
 * const program = parseProgram("defSpanType name = : 'Bob';");
 * ```
 */
export function parseProgram(
  source: string,
  options: ParseOptions = {}
): Program {
  const tokens = tokenize(stripComments(source));
  return new Parser(tokens, parserOptions(options)).parse();
}

/** Parse statements given one per array element, without terminators */
export function parseStatements(
  statements: readonly string[],
  options: ParseOptions = {}
): Program {
  return parseProgram(
    statements.map((statement) => `${statement};\n`).join(''),
    options
  );
}

/**
 * Read and parse a program file. File references inside it resolve
 * against the program's own directory before the search paths.
 */
export function loadProgram(file: string, options: ParseOptions = {}): Program {
  const resolver = options.resolver ?? createResourceResolver();
  const resolved = resolver.resolve(file) ?? file;
  const source = resolver.readText(resolved);
  return parseProgram(source, {
    ...options,
    resolver: resolver.relativeTo(resolved),
  });
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { createParserState, type ParserState } from './state.js';
export { Parser, type ParserOptions, type StatementBody } from './parser.js';
export { Program } from './program.js';
export { formatStatement } from './format.js';
