/**
 * Tokenization Levels
 *
 * A level re-tokenizes the documents of another level. The text never
 * changes; only token boundaries do.
 */

import { createError } from '../error-classes.js';
import type { LevelStrategy } from '../types.js';
import { TextDocument } from '../text/document.js';
import { TextBase } from '../text/text-base.js';
import { Tokenizer, type TokenRange } from '../text/tokenizer.js';
import type { TextLabels } from './text-labels.js';

/** Token ranges of one document after applying `strategy` */
type Retokenizer = (doc: TextDocument, source: TextLabels) => TokenRange[];

/** Tokens are the matches of `pattern` over the whole document text */
function byRegex(pattern: string): Retokenizer {
  const tokenizer = new Tokenizer(pattern);
  return (doc) => tokenizer.tokenRanges(doc.text);
}

/** Each existing token is cut at every match of `pattern` */
function bySplit(pattern: string): Retokenizer {
  return (doc) => {
    const ranges: TokenRange[] = [];
    for (const token of doc.tokens) {
      const separator = new RegExp(pattern, 'g');
      let pieceStart = 0;
      let match: RegExpExecArray | null;
      while ((match = separator.exec(token.text)) !== null) {
        if (match[0].length === 0) {
          separator.lastIndex++;
          continue;
        }
        if (match.index > pieceStart) {
          ranges.push([token.lo + pieceStart, token.lo + match.index]);
        }
        pieceStart = match.index + match[0].length;
      }
      if (pieceStart < token.text.length) {
        ranges.push([token.lo + pieceStart, token.hi]);
      }
    }
    return ranges;
  };
}

/** Keep only the tokens lying inside an instance of type `pattern` */
function byFilter(type: string): Retokenizer {
  return (doc, source) => {
    const keep = new Set<number>();
    for (const span of source.instancesOf(type)) {
      if (span.document !== doc) continue;
      for (let i = span.lo; i < span.hi; i++) keep.add(i);
    }
    return doc.tokens
      .filter((token) => keep.has(token.index))
      .map((token): TokenRange => [token.lo, token.hi]);
  };
}

/**
 * Each instance of type `pattern` becomes a single token. Instances are
 * taken left to right, longest first, skipping overlaps.
 */
function byPseudotoken(type: string): Retokenizer {
  return (doc, source) => {
    const ranges: TokenRange[] = [];
    let i = 0;
    while (i < doc.size) {
      const starting = source.instancesStartingAt(type, doc, i);
      const longest = starting.reduce<number>(
        (hi, span) => Math.max(hi, span.hi),
        i
      );
      if (longest > i) {
        ranges.push([doc.token(i).lo, doc.token(longest - 1).hi]);
        i = longest;
      } else {
        const token = doc.token(i);
        ranges.push([token.lo, token.hi]);
        i++;
      }
    }
    return ranges;
  };
}

function retokenizerFor(
  strategy: LevelStrategy,
  pattern: string,
  source: TextLabels
): Retokenizer {
  switch (strategy) {
    case 'regex':
      return byRegex(pattern);
    case 'split':
      return bySplit(pattern);
    case 'filter':
    case 'pseudotoken':
      if (!source.isType(pattern)) {
        throw createError('MIXUP-R001', { type: pattern });
      }
      return strategy === 'filter' ? byFilter(pattern) : byPseudotoken(pattern);
  }
}

/** Re-tokenize every document of `source` into a new text base */
export function retokenize(
  source: TextLabels,
  strategy: LevelStrategy,
  pattern: string
): TextBase {
  const retokenizer = retokenizerFor(strategy, pattern, source);
  return new TextBase(
    source.textBase
      .documents()
      .map((doc) => new TextDocument(doc.id, doc.text, retokenizer(doc, source)))
  );
}
