/**
 * Parser Extension: Statements
 * Declarations, provide/require, annotators, levels and labeling heads
 */

import { Parser } from './parser.js';
import type {
  AnnotateWithStatement,
  DeclareStatement,
  DefLevelStatement,
  ImportFromLevelStatement,
  LabelEffect,
  LabelingStatement,
  LevelStrategy,
  OffLevelStatement,
  OnLevelStatement,
  ProvideStatement,
  RequireStatement,
} from '../types.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  atStatementEnd,
  check,
  current,
  describeToken,
  expectNext,
  expectType,
  parseError,
} from './state.js';
import { readFileName, readName } from './helpers.js';

type Body<T> = Omit<T, 'keyword' | 'span'>;

type LabelingKeyword = 'defSpanType' | 'defSpanProp' | 'defTokenProp';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseDeclare(): Body<DeclareStatement>;
    parseProvide(): Body<ProvideStatement>;
    parseRequire(): Body<RequireStatement>;
    parseAnnotateWith(): Body<AnnotateWithStatement>;
    parseDefLevel(): Body<DefLevelStatement>;
    parseOnLevel(): Body<OnLevelStatement>;
    parseOffLevel(): Body<OffLevelStatement>;
    parseImportFromLevel(): Body<ImportFromLevelStatement>;
    parseLabeling(keyword: LabelingKeyword): Body<LabelingStatement>;
  }
}

// ============================================================
// DECLARATIONS
// ============================================================

Parser.prototype.parseDeclare = function (this: Parser) {
  return { kind: 'Declare' as const, type: readName(this.state, 'type name') };
};

Parser.prototype.parseProvide = function (this: Parser) {
  return {
    kind: 'Provide' as const,
    annotationType: readName(this.state, 'type name'),
  };
};

/** `require TYPE[, FILE]` */
Parser.prototype.parseRequire = function (this: Parser) {
  const annotationType = readName(this.state, 'type name');
  let file: string | null = null;

  if (!atStatementEnd(this.state)) {
    if (!check(this.state, TOKEN_TYPES.COMMA)) {
      throw parseError(this.state, 'MIXUP-P004', {
        actual: describeToken(current(this.state)),
      });
    }
    advance(this.state); // consume ,
    file = readFileName(this.state, 'file name');
  }

  return { kind: 'Require' as const, annotationType, file };
};

Parser.prototype.parseAnnotateWith = function (this: Parser) {
  return {
    kind: 'AnnotateWith' as const,
    file: readFileName(this.state, 'annotator file name'),
  };
};

// ============================================================
// LEVELS
// ============================================================

const STRATEGY_NAMES: ReadonlyMap<string, LevelStrategy> = new Map<
  string,
  LevelStrategy
>([
  ['regex', 'regex'],
  ['re', 'regex'],
  ['split', 'split'],
  ['filter', 'filter'],
  ['pseudotoken', 'pseudotoken'],
]);

/** `defLevel NAME = STRATEGY PATTERN` */
Parser.prototype.parseDefLevel = function (this: Parser) {
  const name = readName(this.state, 'level name');
  expectNext(this.state, ['='], "'='");

  const strategyToken = expectNext(this.state, undefined, 'level strategy');
  const strategy = STRATEGY_NAMES.get(strategyToken.value);
  if (strategy === undefined) {
    throw parseError(
      this.state,
      'MIXUP-P002',
      {
        expected: [...STRATEGY_NAMES.keys()].map((s) => `'${s}'`).join(' or '),
        actual: describeToken(strategyToken),
      },
      strategyToken
    );
  }

  const patternToken = expectType(
    this.state,
    [TOKEN_TYPES.STRING, TOKEN_TYPES.DSTRING, TOKEN_TYPES.WORD],
    'level pattern'
  );
  const pattern = patternToken.value;

  // filter and pseudotoken name a type; the others are regexes
  if (strategy === 'regex' || strategy === 'split') {
    try {
      new RegExp(pattern, 'g');
    } catch (err) {
      throw parseError(
        this.state,
        'MIXUP-P011',
        {
          pattern: `'${pattern}'`,
          reason: err instanceof Error ? err.message : String(err),
        },
        patternToken,
        err
      );
    }
  }

  return { kind: 'DefLevel' as const, name, strategy, pattern };
};

Parser.prototype.parseOnLevel = function (this: Parser) {
  return { kind: 'OnLevel' as const, name: readName(this.state, 'level name') };
};

/** `offLevel [NAME]`: the name is read and ignored */
Parser.prototype.parseOffLevel = function (this: Parser) {
  if (!atStatementEnd(this.state)) {
    readName(this.state, 'level name');
  }
  return { kind: 'OffLevel' as const };
};

/** `importFromLevel LEVEL NEWTYPE = OLDTYPE` */
Parser.prototype.parseImportFromLevel = function (this: Parser) {
  const sourceLevel = readName(this.state, 'level name');
  const destType = readName(this.state, 'new type name');
  expectNext(this.state, ['='], "'='");
  const sourceType = readName(this.state, 'imported type name');
  return {
    kind: 'ImportFromLevel' as const,
    sourceLevel,
    sourceType,
    destType,
  };
};

// ============================================================
// LABELING STATEMENTS
// ============================================================

/**
 * `defSpanType TYPE = [TYPE] GEN` or
 * `defSpanProp|defTokenProp PROP:VALUE = [TYPE] GEN`
 */
Parser.prototype.parseLabeling = function (
  this: Parser,
  keyword: LabelingKeyword
) {
  const name = readName(this.state, 'property or type name');
  const isProperty = keyword !== 'defSpanType';
  let effect: LabelEffect;

  if (check(this.state, TOKEN_TYPES.COLON)) {
    if (!isProperty) {
      throw parseError(this.state, 'MIXUP-P003', {
        reason: "can't define properties here",
      });
    }
    advance(this.state); // consume :
    const value = readName(this.state, 'property value');
    expectNext(this.state, ['='], "'='");
    effect =
      keyword === 'defSpanProp'
        ? { kind: 'SpanProperty', key: name, value }
        : { kind: 'TokenProperty', key: name, value };
  } else {
    const token = expectNext(this.state, [':', '='], "':' or '='");
    if (isProperty) {
      throw parseError(
        this.state,
        'MIXUP-P003',
        { reason: 'illegal keyword usage, expected PROP:VALUE =' },
        token
      );
    }
    effect = { kind: 'SpanType', type: name };
  }

  const { scope, generator } = this.parseGenerator();
  return { kind: 'Labeling' as const, effect, scope, generator };
};
