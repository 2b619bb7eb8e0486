/**
 * Text Documents
 * A document is its text plus the tokens of one tokenization level.
 */

import type { TokenRange } from './tokenizer.js';

export interface TextToken {
  readonly document: TextDocument;
  /** Position among the document's tokens */
  readonly index: number;
  /** Character offsets into the document text: [lo, hi) */
  readonly lo: number;
  readonly hi: number;
  readonly text: string;
}

export class TextDocument {
  readonly id: string;
  readonly text: string;
  readonly tokens: readonly TextToken[];

  constructor(id: string, text: string, ranges: readonly TokenRange[]) {
    this.id = id;
    this.text = text;
    this.tokens = ranges.map(([lo, hi], index) => ({
      document: this,
      index,
      lo,
      hi,
      text: text.slice(lo, hi),
    }));
  }

  get size(): number {
    return this.tokens.length;
  }

  token(index: number): TextToken {
    const token = this.tokens[index];
    if (!token) {
      throw new RangeError(
        `Token index ${index} out of range for document '${this.id}'`
      );
    }
    return token;
  }
}

/** Key identifying a token across label maps */
export function tokenKey(token: TextToken): string {
  return `${token.document.id}#${token.index}`;
}
