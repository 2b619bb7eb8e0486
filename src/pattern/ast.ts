/**
 * Pattern Expression Nodes
 *
 * A pattern is one or more alternative sequences. A sequence must consume
 * every token of the span it is matched against; `[` and `]` mark the part
 * that is extracted.
 */

export interface PatternNode {
  readonly alternatives: readonly SequenceNode[];
}

export interface SequenceNode {
  readonly items: readonly ItemNode[];
}

export type ItemNode =
  | { readonly kind: 'Gap' }
  | { readonly kind: 'Open' }
  | { readonly kind: 'Close' }
  | TypeRefNode
  | RepeatNode;

/** `@type` consumes exactly one instance of `type` */
export interface TypeRefNode {
  readonly kind: 'TypeRef';
  readonly type: string;
  readonly optional: boolean;
}

/** A token test matched between `min` and `max` times */
export interface RepeatNode {
  readonly kind: 'Repeat';
  readonly test: TokenTest;
  readonly min: number;
  /** Infinity for unbounded repetition */
  readonly max: number;
}

export type TokenTest =
  | { readonly kind: 'Any' }
  | { readonly kind: 'Eq'; readonly text: string; readonly ignoreCase: boolean }
  | { readonly kind: 'Regex'; readonly source: string; readonly regex: RegExp }
  | {
      readonly kind: 'InDict';
      readonly dictionary: string;
      readonly ignoreCase: boolean;
    }
  | { readonly kind: 'PropEq'; readonly key: string; readonly value: string }
  | { readonly kind: 'PropSet'; readonly key: string }
  | { readonly kind: 'Not'; readonly test: TokenTest }
  | { readonly kind: 'All'; readonly tests: readonly TokenTest[] };
