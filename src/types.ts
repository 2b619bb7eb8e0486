/**
 * Mixup Statement Types
 *
 * A program is an ordered list of statements; statements and generators
 * are discriminated unions keyed by `kind`.
 */

import type { SourceSpan } from './source-location.js';
import type { PatternExpression } from './pattern/expression.js';
import type { Trie } from './text/trie.js';

export type { SourceLocation, SourceSpan } from './source-location.js';
export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';
export {
  MixupError,
  LexerError,
  ParseError,
  RuntimeError,
  RuntimeReferenceError,
  ResourceLoadError,
  createError,
  type MixupErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';

// ============================================================
// KEYWORDS
// ============================================================

export const STATEMENT_KEYWORDS = [
  'defTokenProp',
  'defSpanProp',
  'defSpanType',
  'defDict',
  'declareSpanType',
  'provide',
  'require',
  'annotateWith',
  'defLevel',
  'onLevel',
  'offLevel',
  'importFromLevel',
] as const;

export type StatementKeyword = (typeof STATEMENT_KEYWORDS)[number];

export function isStatementKeyword(value: string): value is StatementKeyword {
  return STATEMENT_KEYWORDS.some((keyword) => keyword === value);
}

/** Name of the level every evaluation starts on */
export const BASE_LEVEL = 'original';

export const LEVEL_STRATEGIES = [
  'regex',
  'split',
  'filter',
  'pseudotoken',
] as const;

export type LevelStrategy = (typeof LEVEL_STRATEGIES)[number];

// ============================================================
// SCOPES, EFFECTS, GENERATORS
// ============================================================

/** Input of a generator: all document spans, or the instances of a type */
export type Scope = { readonly kind: 'Top' } | NamedScope;

export interface NamedScope {
  readonly kind: 'Named';
  readonly type: string;
}

/** What a labeling statement does with each generated span */
export type LabelEffect = SpanTypeEffect | SpanPropertyEffect | TokenPropertyEffect;

export interface SpanTypeEffect {
  readonly kind: 'SpanType';
  readonly type: string;
}

export interface SpanPropertyEffect {
  readonly kind: 'SpanProperty';
  readonly key: string;
  readonly value: string;
}

export interface TokenPropertyEffect {
  readonly kind: 'TokenProperty';
  readonly key: string;
  readonly value: string;
}

export type Generator =
  | MatchGenerator
  | FilterGenerator
  | RegexGenerator
  | TrieGenerator;

export interface MatchGenerator {
  readonly kind: 'Match';
  readonly expr: PatternExpression;
}

/** Spans of the input on which `expr` extracts nothing */
export interface FilterGenerator {
  readonly kind: 'Filter';
  readonly expr: PatternExpression;
}

export interface RegexGenerator {
  readonly kind: 'RegexExtract';
  readonly pattern: string;
  readonly group: number;
}

export interface TrieGenerator {
  readonly kind: 'TrieExtract';
  readonly trie: Trie;
}

// ============================================================
// STATEMENTS
// ============================================================

interface StatementBase {
  readonly keyword: StatementKeyword;
  readonly span: SourceSpan;
}

export interface DeclareStatement extends StatementBase {
  readonly kind: 'Declare';
  readonly type: string;
}

export interface ProvideStatement extends StatementBase {
  readonly kind: 'Provide';
  readonly annotationType: string;
}

export interface RequireStatement extends StatementBase {
  readonly kind: 'Require';
  readonly annotationType: string;
  /** Fallback annotation source; null means `<type>.mixup` */
  readonly file: string | null;
}

export interface AnnotateWithStatement extends StatementBase {
  readonly kind: 'AnnotateWith';
  readonly file: string;
}

/** One item of a defDict list, as written */
export type DictEntry =
  | { readonly kind: 'Word'; readonly word: string }
  | { readonly kind: 'File'; readonly file: string };

export interface DefDictStatement extends StatementBase {
  readonly kind: 'DefDict';
  readonly name: string;
  /** Every word, file contents included, normalized for case */
  readonly words: ReadonlySet<string>;
  /** The list as written; serialization keeps file references */
  readonly entries: readonly DictEntry[];
  readonly caseSensitive: boolean;
}

export interface DefLevelStatement extends StatementBase {
  readonly kind: 'DefLevel';
  readonly name: string;
  readonly strategy: LevelStrategy;
  readonly pattern: string;
}

export interface OnLevelStatement extends StatementBase {
  readonly kind: 'OnLevel';
  readonly name: string;
}

export interface OffLevelStatement extends StatementBase {
  readonly kind: 'OffLevel';
}

export interface ImportFromLevelStatement extends StatementBase {
  readonly kind: 'ImportFromLevel';
  readonly sourceLevel: string;
  readonly sourceType: string;
  readonly destType: string;
}

export interface LabelingStatement extends StatementBase {
  readonly kind: 'Labeling';
  readonly effect: LabelEffect;
  readonly scope: Scope;
  readonly generator: Generator;
}

export type Statement =
  | DeclareStatement
  | ProvideStatement
  | RequireStatement
  | AnnotateWithStatement
  | DefDictStatement
  | DefLevelStatement
  | OnLevelStatement
  | OffLevelStatement
  | ImportFromLevelStatement
  | LabelingStatement;

export type StatementKind = Statement['kind'];
