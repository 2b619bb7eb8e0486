/**
 * Spans
 * A contiguous run of tokens within one document: token indexes [lo, hi)
 */

import type { TextDocument, TextToken } from './document.js';

export class Span {
  readonly document: TextDocument;
  readonly lo: number;
  readonly hi: number;

  constructor(document: TextDocument, lo: number, hi: number) {
    if (lo < 0 || hi < lo || hi > document.size) {
      throw new RangeError(
        `Invalid span [${lo}, ${hi}) for document '${document.id}' of ${document.size} tokens`
      );
    }
    this.document = document;
    this.lo = lo;
    this.hi = hi;
  }

  /** The span covering a whole document */
  static of(document: TextDocument): Span {
    return new Span(document, 0, document.size);
  }

  get documentId(): string {
    return this.document.id;
  }

  get size(): number {
    return this.hi - this.lo;
  }

  /** Stable identity used by label maps */
  get key(): string {
    return `${this.document.id}:${this.lo}:${this.hi}`;
  }

  /** i-th token of the span */
  token(i: number): TextToken {
    if (i < 0 || i >= this.size) {
      throw new RangeError(`Token ${i} out of range for span of ${this.size}`);
    }
    return this.document.token(this.lo + i);
  }

  tokens(): TextToken[] {
    return this.document.tokens.slice(this.lo, this.hi);
  }

  /** Character offset where the span starts in the document text */
  get charLo(): number {
    const first = this.document.tokens[this.lo];
    return first ? first.lo : this.document.text.length;
  }

  /** Character offset where the span ends in the document text */
  get charHi(): number {
    const last = this.size > 0 ? this.document.tokens[this.hi - 1] : undefined;
    return last ? last.hi : this.charLo;
  }

  asString(): string {
    return this.document.text.slice(this.charLo, this.charHi);
  }

  subSpan(start: number, length: number): Span {
    if (start < 0 || length < 0 || start + length > this.size) {
      throw new RangeError(
        `Sub-span (${start}, ${length}) out of range for span of ${this.size}`
      );
    }
    return new Span(this.document, this.lo + start, this.lo + start + length);
  }

  contains(other: Span): boolean {
    return (
      other.document === this.document &&
      other.lo >= this.lo &&
      other.hi <= this.hi
    );
  }

  /**
   * The tokens of this span lying entirely inside the document character
   * range [charLo, charHi), or null when there is none.
   */
  tokensWithinChars(charLo: number, charHi: number): Span | null {
    let first = -1;
    let last = -1;
    for (let i = this.lo; i < this.hi; i++) {
      const token = this.document.token(i);
      if (token.lo >= charLo && token.hi <= charHi) {
        if (first < 0) first = i;
        last = i;
      }
    }
    return first < 0 ? null : new Span(this.document, first, last + 1);
  }

  /**
   * Like tokensWithinChars, with offsets relative to asString().
   * Regex matches over the span text map back through here.
   */
  charIndexProperSubSpan(lo: number, hi: number): Span | null {
    const base = this.charLo;
    return this.tokensWithinChars(base + lo, base + hi);
  }

  /** Natural order: document id, then start token, then end token */
  compareTo(other: Span): number {
    if (this.document.id !== other.document.id) {
      return this.document.id < other.document.id ? -1 : 1;
    }
    return this.lo - other.lo || this.hi - other.hi;
  }

  equals(other: Span): boolean {
    return this.compareTo(other) === 0;
  }

  toString(): string {
    return `[${this.document.id} ${this.lo}:${this.hi} '${this.asString()}']`;
  }
}

export function compareSpans(a: Span, b: Span): number {
  return a.compareTo(b);
}

/** Sorted, duplicate-free copy of a span collection */
export function sortedUnique(spans: Iterable<Span>): Span[] {
  const byKey = new Map<string, Span>();
  for (const span of spans) byKey.set(span.key, span);
  return [...byKey.values()].sort(compareSpans);
}
