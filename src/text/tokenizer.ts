/**
 * Text Tokenizer
 * Splits document text into character-ranged tokens with a regex
 */

/** Digit runs, letter runs, and every other non-space character on its own */
export const DEFAULT_TOKEN_PATTERN = '[0-9]+|[A-Za-z]+|[^\\sA-Za-z0-9]';

/** Character range of one token: [lo, hi) */
export type TokenRange = readonly [lo: number, hi: number];

export class Tokenizer {
  readonly pattern: string;

  constructor(pattern: string = DEFAULT_TOKEN_PATTERN) {
    // Fail early on a bad pattern rather than on first use
    new RegExp(pattern, 'g');
    this.pattern = pattern;
  }

  /** Every non-empty match of the pattern, in order */
  tokenRanges(text: string): TokenRange[] {
    const regex = new RegExp(this.pattern, 'g');
    const ranges: TokenRange[] = [];
    let match: RegExpExecArray | null;

    while ((match = regex.exec(text)) !== null) {
      if (match[0].length === 0) {
        regex.lastIndex++;
        continue;
      }
      ranges.push([match.index, match.index + match[0].length]);
    }

    return ranges;
  }

  splitIntoTokens(text: string): string[] {
    return this.tokenRanges(text).map(([lo, hi]) => text.slice(lo, hi));
  }
}
