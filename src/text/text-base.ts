/**
 * Text Base
 * The documents of one tokenization level, in insertion order
 */

import { TextDocument } from './document.js';
import { Span } from './span.js';
import { Tokenizer } from './tokenizer.js';

export class TextBase {
  private readonly byId = new Map<string, TextDocument>();

  constructor(documents: Iterable<TextDocument> = []) {
    for (const doc of documents) {
      this.add(doc);
    }
  }

  /**
   * Tokenize raw texts keyed by document id.
   * Pass Object.entries(record) to build from a plain object.
   */
  static fromTexts(
    texts: Iterable<readonly [id: string, text: string]>,
    tokenizer: Tokenizer = new Tokenizer()
  ): TextBase {
    const base = new TextBase();
    for (const [id, text] of texts) {
      base.add(new TextDocument(id, text, tokenizer.tokenRanges(text)));
    }
    return base;
  }

  add(document: TextDocument): void {
    this.byId.set(document.id, document);
  }

  get size(): number {
    return this.byId.size;
  }

  documents(): TextDocument[] {
    return [...this.byId.values()];
  }

  document(id: string): TextDocument | undefined {
    return this.byId.get(id);
  }

  /** One span per document covering all of its tokens, in document order */
  documentSpans(): Span[] {
    return this.documents().map((doc) => Span.of(doc));
  }
}
