/**
 * Multi-Level Label Store
 *
 * Owns one TextLabels per tokenization level plus the state every level
 * shares: dictionaries and provide/require bookkeeping. The base level is
 * named `original`. Nothing is ever removed.
 */

import { createError } from '../error-classes.js';
import { BASE_LEVEL, type LevelStrategy } from '../types.js';
import { Span } from '../text/span.js';
import type { TextBase } from '../text/text-base.js';
import { retokenize } from './levels.js';
import { TextLabels, type DictionarySource } from './text-labels.js';

export class MultiLevelLabels implements DictionarySource {
  private readonly levelsByName = new Map<string, TextLabels>();
  private readonly dictionaries = new Map<string, ReadonlySet<string>>();
  private readonly annotatedTypes = new Set<string>();

  constructor(textBase: TextBase) {
    this.levelsByName.set(
      BASE_LEVEL,
      new TextLabels(textBase, this, BASE_LEVEL)
    );
  }

  /** Labels of the base level */
  get base(): TextLabels {
    return this.level(BASE_LEVEL);
  }

  // ============================================================
  // LEVELS
  // ============================================================

  /** Labels of a level; throws RuntimeReferenceError for unknown levels */
  level(name: string): TextLabels {
    const labels = this.levelsByName.get(name);
    if (!labels) {
      throw createError('MIXUP-R002', { level: name });
    }
    return labels;
  }

  hasLevel(name: string): boolean {
    return this.levelsByName.has(name);
  }

  levelNames(): string[] {
    return [...this.levelsByName.keys()];
  }

  /**
   * Create level `name` by re-tokenizing `fromLevel` with the given
   * strategy. The new level starts with no labels. Existing levels,
   * `original` included, cannot be redefined (MIXUP-R006).
   */
  createLevel(
    name: string,
    strategy: LevelStrategy,
    pattern: string,
    fromLevel: string = BASE_LEVEL
  ): TextLabels {
    if (this.levelsByName.has(name)) {
      throw createError('MIXUP-R006', { level: name });
    }
    const textBase = retokenize(this.level(fromLevel), strategy, pattern);
    const labels = new TextLabels(textBase, this, name);
    this.levelsByName.set(name, labels);
    return labels;
  }

  /**
   * Copy the instances of `sourceType` on `sourceLevel` into `intoLevel`
   * as `destType`. Spans are mapped by character range onto the tokens of
   * the destination level that lie inside it; spans covering no whole
   * token are dropped. `destType` is declared either way.
   */
  importFromLevel(
    sourceLevel: string,
    sourceType: string,
    destType: string,
    intoLevel: string
  ): void {
    const source = this.level(sourceLevel);
    const target = this.level(intoLevel);
    if (!source.isType(sourceType)) {
      throw createError('MIXUP-R001', { type: sourceType });
    }

    target.declareType(destType);
    for (const span of source.instancesOf(sourceType)) {
      const doc = target.textBase.document(span.documentId);
      if (!doc) continue;
      const mapped = Span.of(doc).tokensWithinChars(span.charLo, span.charHi);
      if (mapped) target.addToType(mapped, destType);
    }
  }

  // ============================================================
  // DICTIONARIES
  // ============================================================

  defineDictionary(name: string, words: Iterable<string>): void {
    this.dictionaries.set(name, new Set(words));
  }

  dictionary(name: string): ReadonlySet<string> | undefined {
    return this.dictionaries.get(name);
  }

  // ============================================================
  // PROVIDE / REQUIRE BOOKKEEPING
  // ============================================================

  /** Record that `type` has been provided by some annotator or program */
  setAnnotatedBy(type: string): void {
    this.annotatedTypes.add(type);
  }

  isAnnotatedBy(type: string): boolean {
    return this.annotatedTypes.has(type);
  }

  annotated(): string[] {
    return [...this.annotatedTypes].sort();
  }
}
