/**
 * Phrase Trie
 * Maps token sequences to keys; lookup finds every phrase occurrence
 * inside a span.
 */

import { Span } from './span.js';

interface TrieNode {
  readonly children: Map<string, TrieNode>;
  /** Keys of the phrases ending at this node */
  readonly keys: string[];
}

export interface TriePhrase {
  readonly key: string;
  readonly tokens: readonly string[];
}

function createNode(): TrieNode {
  return { children: new Map(), keys: [] };
}

export class Trie {
  private readonly root: TrieNode = createNode();
  private readonly phraseList: TriePhrase[] = [];

  /** Add a phrase; empty token sequences are ignored */
  addPhrase(key: string, tokens: readonly string[]): void {
    if (tokens.length === 0) return;

    let node = this.root;
    for (const token of tokens) {
      let child = node.children.get(token);
      if (!child) {
        child = createNode();
        node.children.set(token, child);
      }
      node = child;
    }
    node.keys.push(key);
    this.phraseList.push({ key, tokens: [...tokens] });
  }

  get size(): number {
    return this.phraseList.length;
  }

  phrases(): readonly TriePhrase[] {
    return this.phraseList;
  }

  /**
   * Every sub-span of `span` whose token texts equal some phrase, ordered
   * by start token and then length. Token comparison is case-sensitive.
   */
  lookup(span: Span): Span[] {
    const found: Span[] = [];
    for (let start = span.lo; start < span.hi; start++) {
      let node: TrieNode | undefined = this.root;
      for (let end = start; end < span.hi && node; end++) {
        node = node.children.get(span.document.token(end).text);
        if (node && node.keys.length > 0) {
          found.push(new Span(span.document, start, end + 1));
        }
      }
    }
    return found;
  }
}
