/**
 * Text Model
 */

export { TextDocument, tokenKey, type TextToken } from './document.js';
export { Span, compareSpans, sortedUnique } from './span.js';
export { TextBase } from './text-base.js';
export {
  DEFAULT_TOKEN_PATTERN,
  Tokenizer,
  type TokenRange,
} from './tokenizer.js';
export { Trie, type TriePhrase } from './trie.js';
export { LABELS_EXTENSION, loadTexts, type LoadedTexts } from './loader.js';
