/**
 * Pattern Matcher
 *
 * Depth-first search over (item, token position, bracket positions). A
 * sequence matches when its items consume the whole input span; every
 * distinct bracketed region reached that way is an extraction.
 */

import type { TextLabels } from '../labels/text-labels.js';
import type { TextToken } from '../text/document.js';
import { Span } from '../text/span.js';
import type { ItemNode, PatternNode, SequenceNode, TokenTest } from './ast.js';

/** Evaluate a single token test */
export function testToken(
  test: TokenTest,
  token: TextToken,
  labels: TextLabels
): boolean {
  switch (test.kind) {
    case 'Any':
      return true;
    case 'Eq':
      return test.ignoreCase
        ? token.text.toLowerCase() === test.text.toLowerCase()
        : token.text === test.text;
    case 'Regex':
      return test.regex.test(token.text);
    case 'InDict':
      return labels.inDictionary(
        test.dictionary,
        test.ignoreCase ? token.text.toLowerCase() : token.text
      );
    case 'PropEq':
      return labels.getTokenProperty(token, test.key) === test.value;
    case 'PropSet':
      return labels.getTokenProperty(token, test.key) !== undefined;
    case 'Not':
      return !testToken(test.test, token, labels);
    case 'All':
      return test.tests.every((t) => testToken(t, token, labels));
  }
}

/** Extracted regions of one sequence over one span, as [lo, hi) token pairs */
function matchSequence(
  sequence: SequenceNode,
  span: Span,
  labels: TextLabels,
  regions: Map<string, readonly [number, number]>
): void {
  const { items } = sequence;
  const hasBrackets = items.some((item) => item.kind === 'Open');
  const visited = new Set<string>();

  const visit = (i: number, pos: number, open: number, close: number): void => {
    const stateKey = `${i}:${pos}:${open}:${close}`;
    if (visited.has(stateKey)) return;
    visited.add(stateKey);

    const item: ItemNode | undefined = items[i];
    if (item === undefined) {
      if (pos !== span.hi) return;
      const region: readonly [number, number] = hasBrackets
        ? [open, close]
        : [span.lo, span.hi];
      regions.set(`${region[0]}:${region[1]}`, region);
      return;
    }

    switch (item.kind) {
      case 'Open':
        visit(i + 1, pos, pos, close);
        return;
      case 'Close':
        visit(i + 1, pos, open, pos);
        return;
      case 'Gap':
        for (let end = pos; end <= span.hi; end++) {
          visit(i + 1, end, open, close);
        }
        return;
      case 'TypeRef':
        if (item.optional) visit(i + 1, pos, open, close);
        for (const instance of labels.instancesStartingAt(
          item.type,
          span.document,
          pos
        )) {
          if (instance.hi <= span.hi) visit(i + 1, instance.hi, open, close);
        }
        return;
      case 'Repeat': {
        let end = pos;
        let count = 0;
        while (true) {
          if (count >= item.min) visit(i + 1, end, open, close);
          if (count >= item.max || end >= span.hi) return;
          if (!testToken(item.test, span.document.token(end), labels)) return;
          end++;
          count++;
        }
      }
    }
  };

  visit(0, span.lo, span.lo, span.lo);
}

/**
 * Every distinct non-empty region the pattern extracts from `span`, in
 * span order.
 */
export function matchSpan(
  pattern: PatternNode,
  span: Span,
  labels: TextLabels
): Span[] {
  const regions = new Map<string, readonly [number, number]>();
  for (const sequence of pattern.alternatives) {
    matchSequence(sequence, span, labels, regions);
  }
  return [...regions.values()]
    .filter(([lo, hi]) => hi > lo)
    .sort((a, b) => a[0] - b[0] || a[1] - b[1])
    .map(([lo, hi]) => new Span(span.document, lo, hi));
}
