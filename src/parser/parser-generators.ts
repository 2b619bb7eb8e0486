/**
 * Parser Extension: Generators
 * Scope detection and the `:`, `-`, `~ re`, `~ trie` generator bodies
 */

import { Parser } from './parser.js';
import type { Generator, RegexGenerator, Scope } from '../types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { PatternExpression } from '../pattern/expression.js';
import {
  advance,
  atStatementEnd,
  check,
  current,
  describeToken,
  expectNext,
  expectType,
  parseError,
} from './state.js';
import { readName } from './helpers.js';

const GENERATOR_START = [':', '-', '~'];

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseGenerator(): { scope: Scope; generator: Generator };
    parseRegexGenerator(): RegexGenerator;
  }
}

/**
 * `[TYPE] : EXPR`, `[TYPE] - EXPR`, `[TYPE] ~ re 'REGEX', N` or
 * `[TYPE] ~ trie ...`. Without TYPE the generator runs over whole documents.
 */
Parser.prototype.parseGenerator = function (this: Parser) {
  let scope: Scope = { kind: 'Top' };
  if (
    !atStatementEnd(this.state) &&
    !check(this.state, TOKEN_TYPES.COLON, TOKEN_TYPES.MINUS, TOKEN_TYPES.TILDE)
  ) {
    scope = { kind: 'Named', type: readName(this.state, 'scope type') };
  }

  const marker = expectNext(
    this.state,
    GENERATOR_START,
    "':', '-' or '~'"
  ).value;

  let generator: Generator;
  if (marker === ':') {
    generator = { kind: 'Match', expr: PatternExpression.parse(this.state) };
  } else if (marker === '-') {
    generator = { kind: 'Filter', expr: PatternExpression.parse(this.state) };
  } else {
    const kind = expectNext(this.state, undefined, "'re' or 'trie'");
    if (kind.value === 're') {
      generator = this.parseRegexGenerator();
    } else if (kind.value === 'trie') {
      generator = { kind: 'TrieExtract', trie: this.parseTrie() };
    } else {
      throw parseError(
        this.state,
        'MIXUP-P003',
        { reason: `expected 're' or 'trie', got ${describeToken(kind)}` },
        kind
      );
    }
  }

  return { scope, generator };
};

/** `'REGEX', GROUP` after `~ re` */
Parser.prototype.parseRegexGenerator = function (
  this: Parser
): RegexGenerator {
  const literal = expectType(
    this.state,
    [TOKEN_TYPES.STRING, TOKEN_TYPES.DSTRING],
    'quoted regex'
  );
  try {
    new RegExp(literal.value, 'gd');
  } catch (err) {
    throw parseError(
      this.state,
      'MIXUP-P011',
      {
        pattern: `'${literal.value}'`,
        reason: err instanceof Error ? err.message : String(err),
      },
      literal,
      err
    );
  }

  if (!check(this.state, TOKEN_TYPES.COMMA)) {
    throw parseError(this.state, 'MIXUP-P004', {
      actual: atStatementEnd(this.state)
        ? 'end of statement'
        : describeToken(current(this.state)),
    });
  }
  advance(this.state); // consume ,

  const group = expectNext(this.state, undefined, 'regex group number');
  if (group.type !== TOKEN_TYPES.WORD || !/^\d+$/.test(group.value)) {
    throw parseError(
      this.state,
      'MIXUP-P005',
      { actual: describeToken(group) },
      group
    );
  }

  return {
    kind: 'RegexExtract',
    pattern: literal.value,
    group: Number(group.value),
  };
};
