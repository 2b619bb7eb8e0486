/**
 * Pattern Expressions
 * Compiled form of the `: EXPR` and `- EXPR` generator bodies.
 */

import type { TextLabels } from '../labels/text-labels.js';
import { formatName, quoteLiteral } from '../parser/helpers.js';
import type { ParserState } from '../parser/state.js';
import type { Span } from '../text/span.js';
import type { ItemNode, PatternNode, TokenTest } from './ast.js';
import { matchSpan } from './matcher.js';
import { parsePattern } from './parser.js';

export class PatternExpression {
  readonly node: PatternNode;

  constructor(node: PatternNode) {
    this.node = node;
  }

  /** Compile the remaining tokens of the current statement */
  static parse(state: ParserState): PatternExpression {
    return new PatternExpression(parsePattern(state));
  }

  /**
   * Lazily extract from each input span in turn. Labels added by the
   * caller between yields are visible to the spans that follow.
   */
  *extract(labels: TextLabels, spans: Iterable<Span>): Generator<Span> {
    for (const span of spans) {
      yield* matchSpan(this.node, span, labels);
    }
  }

  /** True when at least one region is extracted from `span` */
  hasExtraction(labels: TextLabels, span: Span): boolean {
    return matchSpan(this.node, span, labels).length > 0;
  }

  toString(): string {
    return this.node.alternatives
      .map((sequence) => sequence.items.map(formatItem).join(' '))
      .join(' || ');
  }
}

function formatItem(item: ItemNode): string {
  switch (item.kind) {
    case 'Gap':
      return '...';
    case 'Open':
      return '[';
    case 'Close':
      return ']';
    case 'TypeRef':
      return `@${formatName(item.type)}${item.optional ? '?' : ''}`;
    case 'Repeat':
      return formatTest(item.test) + formatRepeat(item.min, item.max);
  }
}

function formatRepeat(min: number, max: number): string {
  if (min === 1 && max === 1) return '';
  if (min === 0 && max === Infinity) return '*';
  if (min === 1 && max === Infinity) return '+';
  if (min === 0 && max === 1) return '?';
  if (max === Infinity) return `{${min},}`;
  return min === max ? `{${min}}` : `{${min},${max}}`;
}

function formatTest(test: TokenTest): string {
  switch (test.kind) {
    case 'Any':
      return 'any';
    case 'Eq':
      return test.ignoreCase
        ? `eqi(${quoteLiteral(test.text)})`
        : quoteLiteral(test.text);
    case 'Regex':
      return `re(${quoteLiteral(test.source)})`;
    case 'InDict':
      return `${test.ignoreCase ? 'ai' : 'a'}(${formatName(test.dictionary)})`;
    case 'PropEq':
      return `${test.key}:${formatName(test.value)}`;
    case 'PropSet':
      return test.key;
    case 'Not':
      return `!${formatTest(test.test)}`;
    case 'All':
      return `<${test.tests.map(formatTest).join(', ')}>`;
  }
}
