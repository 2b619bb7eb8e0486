/**
 * Generators and Label Extension
 *
 * Runs a labeling statement's generator over its input spans and applies
 * the statement's effect to every output span.
 */

import { createError } from '../../error-classes.js';
import type { TextLabels } from '../../labels/text-labels.js';
import { sortedUnique, type Span } from '../../text/span.js';
import type {
  Generator as SpanGenerator,
  LabelEffect,
  LabelingStatement,
  Scope,
} from '../../types.js';

/**
 * Input spans of a generator: every document, or the instances of a
 * declared type. Returns a snapshot, so labels added while the generator
 * runs never extend its own input.
 */
export function resolveScope(labels: TextLabels, scope: Scope): Span[] {
  if (scope.kind === 'Top') {
    return labels.documentSpans();
  }
  if (!labels.isType(scope.type)) {
    throw createError('MIXUP-R001', { type: scope.type });
  }
  return labels.instancesOf(scope.type);
}

/** Apply one effect to one span */
export function extendLabels(
  labels: TextLabels,
  effect: LabelEffect,
  span: Span
): void {
  switch (effect.kind) {
    case 'SpanType':
      labels.addToType(span, effect.type);
      return;
    case 'SpanProperty':
      labels.setSpanProperty(span, effect.key, effect.value);
      return;
    case 'TokenProperty':
      for (const token of span.tokens()) {
        labels.setTokenProperty(token, effect.key, effect.value);
      }
      return;
  }
}

/**
 * Output spans of a generator, produced lazily: Match extractions from
 * one input span are computed after the labels added for earlier spans.
 */
export function* generateSpans(
  labels: TextLabels,
  generator: SpanGenerator,
  inputs: readonly Span[]
): IterableIterator<Span> {
  switch (generator.kind) {
    case 'Match':
      yield* generator.expr.extract(labels, inputs);
      return;

    case 'Filter': {
      // Decide every input before labeling any of them, so the filter's
      // own output cannot change its predicate.
      const rejected = inputs.filter(
        (span) => !generator.expr.hasExtraction(labels, span)
      );
      yield* sortedUnique(rejected);
      return;
    }

    case 'RegexExtract': {
      const regex = new RegExp(generator.pattern, 'gd');
      for (const span of inputs) {
        for (const match of span.asString().matchAll(regex)) {
          const range = match.indices?.[generator.group];
          // Group did not take part in the match
          if (range === undefined) continue;
          const aligned = span.charIndexProperSubSpan(range[0], range[1]);
          if (aligned !== null) yield aligned;
        }
      }
      return;
    }

    case 'TrieExtract':
      for (const span of inputs) {
        yield* generator.trie.lookup(span);
      }
      return;
  }
}

/** Evaluate a labeling statement against one level */
export function runLabeling(
  labels: TextLabels,
  statement: LabelingStatement
): number {
  const { effect, scope, generator } = statement;
  const inputs = resolveScope(labels, scope);

  // The type exists afterwards even when nothing was generated
  if (effect.kind === 'SpanType') {
    labels.declareType(effect.type);
  }

  let count = 0;
  for (const span of generateSpans(labels, generator, inputs)) {
    extendLabels(labels, effect, span);
    count++;
  }
  return count;
}
