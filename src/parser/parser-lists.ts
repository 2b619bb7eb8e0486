/**
 * Parser Extension: Word and Phrase Lists
 * `defDict` bodies and `~ trie` bodies, with file references
 */

import { Parser } from './parser.js';
import type { DefDictStatement, DictEntry } from '../types.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { Trie } from '../text/trie.js';
import {
  advance,
  atStatementEnd,
  check,
  current,
  describeToken,
  expectNext,
  isBare,
  parseError,
} from './state.js';
import { readName } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseDefDict(): Omit<DefDictStatement, 'keyword' | 'span'>;
    parseTrie(): Trie;
    readResourceLines(file: Token): string[];
  }
}

// ============================================================
// DICTIONARIES
// ============================================================

/** `defDict [+case] NAME = W1, W2, "file", ...` */
Parser.prototype.parseDefDict = function (this: Parser) {
  let caseSensitive = false;
  if (check(this.state, TOKEN_TYPES.PLUS)) {
    advance(this.state); // consume +
    const modifier = current(this.state);
    if (
      atStatementEnd(this.state) ||
      !isBare(modifier) ||
      modifier.value !== 'case'
    ) {
      throw parseError(this.state, 'MIXUP-P007', {
        reason: `expected 'case' after '+', got ${describeToken(modifier)}`,
      });
    }
    advance(this.state);
    caseSensitive = true;
  }

  const name = readName(this.state, 'dictionary name');
  expectNext(this.state, ['='], "'='");

  const normalize = (word: string): string =>
    caseSensitive ? word : word.toLowerCase();
  const words = new Set<string>();
  const entries: DictEntry[] = [];

  while (true) {
    const token = expectNext(this.state, undefined, 'word');
    if (token.type === TOKEN_TYPES.DSTRING) {
      for (const line of this.readResourceLines(token)) {
        const word = line.trim();
        if (word !== '') words.add(normalize(word));
      }
      entries.push({ kind: 'File', file: token.value });
    } else {
      const word = normalize(token.value);
      words.add(word);
      entries.push({ kind: 'Word', word });
    }

    if (atStatementEnd(this.state)) break;
    if (!check(this.state, TOKEN_TYPES.COMMA)) {
      throw parseError(this.state, 'MIXUP-P004', {
        actual: describeToken(current(this.state)),
      });
    }
    advance(this.state); // consume ,
  }

  return {
    kind: 'DefDict' as const,
    name,
    words,
    entries,
    caseSensitive,
  };
};

// ============================================================
// TRIES
// ============================================================

/**
 * `~ trie PHRASE, PHRASE, ...`: each phrase is the run of tokens up to the
 * next comma, joined with spaces. A phrase that is a single double-quoted
 * token names a file with one phrase per line.
 */
Parser.prototype.parseTrie = function (this: Parser): Trie {
  const runs: Token[][] = [[]];
  while (!atStatementEnd(this.state)) {
    const token = advance(this.state);
    if (token.type === TOKEN_TYPES.COMMA) {
      runs.push([]);
    } else {
      runs[runs.length - 1]?.push(token);
    }
  }

  const { tokenizer } = this.options;
  const trie = new Trie();
  runs.forEach((run, ordinal) => {
    const [only] = run;
    if (run.length === 1 && only?.type === TOKEN_TYPES.DSTRING) {
      this.readResourceLines(only).forEach((line, i) => {
        trie.addPhrase(
          `${only.value}.line.${i + 1}`,
          tokenizer.splitIntoTokens(line)
        );
      });
    } else {
      const phrase = run.map((token) => token.value).join(' ');
      trie.addPhrase(`phrase#${ordinal}`, tokenizer.splitIntoTokens(phrase));
    }
  });
  return trie;
};

// ============================================================
// FILE REFERENCES
// ============================================================

/** Lines of a referenced file; I/O failures become parse errors */
Parser.prototype.readResourceLines = function (
  this: Parser,
  file: Token
): string[] {
  try {
    return this.options.resolver.readLines(file.value);
  } catch (err) {
    throw parseError(
      this.state,
      'MIXUP-P006',
      {
        file: file.value,
        reason: err instanceof Error ? err.message : String(err),
      },
      file,
      err
    );
  }
};
