/**
 * Text Labels
 *
 * Type membership and properties for the documents of one tokenization
 * level. Monotonic: labels, properties and type declarations are only
 * ever added or overwritten, never removed.
 */

import { createError } from '../error-classes.js';
import { tokenKey, type TextDocument, type TextToken } from '../text/document.js';
import { compareSpans, type Span } from '../text/span.js';
import type { TextBase } from '../text/text-base.js';

/** Dictionary lookup shared by every level of a label store */
export interface DictionarySource {
  dictionary(name: string): ReadonlySet<string> | undefined;
}

interface TypeInstances {
  readonly byKey: Map<string, Span>;
  /** document id -> start token -> spans starting there */
  readonly byStart: Map<string, Map<number, Span[]>>;
}

export class TextLabels {
  readonly textBase: TextBase;
  readonly levelName: string;
  private readonly dictionaries: DictionarySource;
  private readonly typeInstances = new Map<string, TypeInstances>();
  private readonly spanProperties = new Map<
    string,
    { readonly span: Span; readonly props: Map<string, string> }
  >();
  private readonly tokenProperties = new Map<string, Map<string, string>>();

  constructor(
    textBase: TextBase,
    dictionaries: DictionarySource,
    levelName: string
  ) {
    this.textBase = textBase;
    this.dictionaries = dictionaries;
    this.levelName = levelName;
  }

  // ============================================================
  // TYPES
  // ============================================================

  /** Register a type with no instances (no-op when already declared) */
  declareType(type: string): void {
    if (!this.typeInstances.has(type)) {
      this.typeInstances.set(type, { byKey: new Map(), byStart: new Map() });
    }
  }

  /** Add a span to a type's instances, declaring the type if needed */
  addToType(span: Span, type: string): void {
    this.declareType(type);
    const instances = this.typeInstances.get(type);
    if (!instances || instances.byKey.has(span.key)) return;

    instances.byKey.set(span.key, span);
    let starts = instances.byStart.get(span.documentId);
    if (!starts) {
      starts = new Map();
      instances.byStart.set(span.documentId, starts);
    }
    const atStart = starts.get(span.lo);
    if (atStart) {
      atStart.push(span);
    } else {
      starts.set(span.lo, [span]);
    }
  }

  isType(type: string): boolean {
    return this.typeInstances.has(type);
  }

  hasType(span: Span, type: string): boolean {
    return this.typeInstances.get(type)?.byKey.has(span.key) ?? false;
  }

  /** Number of instances; 0 for undeclared types */
  instanceCount(type: string): number {
    return this.typeInstances.get(type)?.byKey.size ?? 0;
  }

  /** Sorted snapshot of a type's instances; empty for undeclared types */
  instancesOf(type: string): Span[] {
    const instances = this.typeInstances.get(type);
    if (!instances) return [];
    return [...instances.byKey.values()].sort(compareSpans);
  }

  /** Instances of `type` in `document` that start at token `index` */
  instancesStartingAt(
    type: string,
    document: TextDocument,
    index: number
  ): readonly Span[] {
    return (
      this.typeInstances.get(type)?.byStart.get(document.id)?.get(index) ?? []
    );
  }

  /** Declared type names, sorted */
  types(): string[] {
    return [...this.typeInstances.keys()].sort();
  }

  documentSpans(): Span[] {
    return this.textBase.documentSpans();
  }

  // ============================================================
  // PROPERTIES
  // ============================================================

  setSpanProperty(span: Span, key: string, value: string): void {
    let entry = this.spanProperties.get(span.key);
    if (!entry) {
      entry = { span, props: new Map() };
      this.spanProperties.set(span.key, entry);
    }
    entry.props.set(key, value);
  }

  getSpanProperty(span: Span, key: string): string | undefined {
    return this.spanProperties.get(span.key)?.props.get(key);
  }

  setTokenProperty(token: TextToken, key: string, value: string): void {
    const id = tokenKey(token);
    let props = this.tokenProperties.get(id);
    if (!props) {
      props = new Map();
      this.tokenProperties.set(id, props);
    }
    props.set(key, value);
  }

  getTokenProperty(token: TextToken, key: string): string | undefined {
    return this.tokenProperties.get(tokenKey(token))?.get(key);
  }

  /** Spans carrying `key`, sorted, with their values */
  spansWithProperty(key: string): Array<{ span: Span; value: string }> {
    const found: Array<{ span: Span; value: string }> = [];
    for (const { span, props } of this.spanProperties.values()) {
      const value = props.get(key);
      if (value !== undefined) found.push({ span, value });
    }
    return found.sort((a, b) => compareSpans(a.span, b.span));
  }

  // ============================================================
  // DICTIONARIES
  // ============================================================

  /** Membership test; throws RuntimeReferenceError for unknown dictionaries */
  inDictionary(name: string, word: string): boolean {
    const words = this.dictionaries.dictionary(name);
    if (!words) {
      throw createError('MIXUP-R005', { name });
    }
    return words.has(word);
  }
}
