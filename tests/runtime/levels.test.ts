/**
 * Mixup Runtime Tests: tokenization levels
 */

import { describe, expect, it } from 'vitest';
import {
  createEvaluationContext,
  evaluate,
  parseProgram,
  RuntimeError,
  RuntimeReferenceError,
} from '../../src/index.js';
import {
  currentLabels,
  instanceTexts,
  labelsFor,
  run,
} from '../helpers/labels.js';

const EACH_TOKEN = 'defSpanType tok = : ... [ any ] ...;';

/** Tokens of the level the program ends on */
function tokensAfter(source: string, text: string): string[] {
  return instanceTexts(
    currentLabels(run(`${source}\n${EACH_TOKEN}`, { doc: text })),
    'tok'
  );
}

describe('Mixup Runtime: levels', () => {
  describe('onLevel and offLevel', () => {
    it('keeps labels of each level apart', () => {
      const ctx = run(
        [
          "defLevel chunks = regex '\\S+';",
          'onLevel chunks;',
          EACH_TOKEN,
          'offLevel;',
        ].join('\n'),
        { doc: 'New-York city' }
      );
      expect(ctx.currentLevel).toBe('original');
      expect(instanceTexts(ctx.labels.level('chunks'), 'tok')).toEqual([
        'New-York',
        'city',
      ]);
      expect(ctx.labels.base.isType('tok')).toBe(false);
      expect(ctx.labels.levelNames()).toEqual(['original', 'chunks']);
    });

    it('stays on a level until offLevel', () => {
      const ctx = run(
        "defLevel chunks = regex '\\S+'; onLevel chunks; declareSpanType t;",
        { doc: 'a b' }
      );
      expect(ctx.currentLevel).toBe('chunks');
      expect(ctx.labels.level('chunks').isType('t')).toBe(true);
      expect(ctx.labels.base.isType('t')).toBe(false);
    });

    it('accepts a level name after offLevel', () => {
      const ctx = run(
        "defLevel chunks = regex '\\S+'; onLevel chunks; offLevel chunks;",
        { doc: 'a' }
      );
      expect(ctx.currentLevel).toBe('original');
    });

    it('fails on an unknown level', () => {
      expect(() => run('onLevel nowhere;', { doc: 'a' })).toThrow(
        RuntimeReferenceError
      );
      expect(() => run('onLevel nowhere;', { doc: 'a' })).toThrow(
        "no level 'nowhere' defined"
      );
    });

    it('never redefines the base level', () => {
      const labels = labelsFor({ doc: 'a b c' });
      const ctx = createEvaluationContext(labels);
      evaluate(parseProgram("defSpanType x = : ... [ 'b' ] ...;"), ctx);

      const redefine = parseProgram("defLevel original = regex '[a-z]+';");
      expect(() => evaluate(redefine, ctx)).toThrow(RuntimeError);
      expect(() => evaluate(redefine, ctx)).toThrow(
        "level 'original' already defined"
      );
      expect(instanceTexts(labels.base, 'x')).toEqual(['b']);
    });

    it('keeps the labels of a level when it is defined again', () => {
      const labels = labelsFor({ doc: 'a b' });
      const ctx = createEvaluationContext(labels);
      evaluate(
        parseProgram(
          "defLevel L = regex '\\S+'; onLevel L; defSpanType y = : [ any ] ...;"
        ),
        ctx
      );

      expect(() =>
        evaluate(parseProgram("defLevel L = split ' ';"), ctx)
      ).toThrow("level 'L' already defined");
      expect(instanceTexts(labels.level('L'), 'y')).toEqual(['a']);
      expect(labels.levelNames()).toEqual(['original', 'L']);
    });

    it('shares dictionaries across levels', () => {
      expect(
        instanceTexts(
          currentLabels(
            run(
              [
                'defDict d = york;',
                "defLevel chunks = regex '\\S+';",
                'onLevel chunks;',
                'defSpanType x = : ... [ ai(d) ] ...;',
              ].join('\n'),
              { doc: 'New York' }
            )
          ),
          'x'
        )
      ).toEqual(['York']);
    });
  });

  describe('strategies', () => {
    it('regex: tokens are the matches over the whole text', () => {
      expect(
        tokensAfter("defLevel L = re '[a-z]+'; onLevel L;", 'ab1 cd')
      ).toEqual(['ab', 'cd']);
    });

    it('split: existing tokens are cut at each match', () => {
      expect(
        tokensAfter("defLevel L = split '[aeiou]'; onLevel L;", 'banana')
      ).toEqual(['b', 'n', 'n']);
    });

    it('filter: only tokens inside the type remain', () => {
      const ctx = run(
        [
          "defSpanType cap = : ... [ re('^[A-Z]') ] ...;",
          'defLevel caps = filter cap;',
          'onLevel caps;',
          EACH_TOKEN,
          'defSpanType all = : any+;',
        ].join('\n'),
        { doc: 'Ann met Bob' }
      );
      const labels = currentLabels(ctx);
      expect(instanceTexts(labels, 'tok')).toEqual(['Ann', 'Bob']);
      expect(instanceTexts(labels, 'all')).toEqual(['Ann met Bob']);
    });

    it('pseudotoken: each instance becomes one token', () => {
      expect(
        tokensAfter(
          [
            'defSpanType city = ~ trie new york;',
            'defLevel p = pseudotoken city;',
            'onLevel p;',
          ].join('\n'),
          'in new york now'
        )
      ).toEqual(['in', 'new york', 'now']);
    });

    it('derives a new level from the current one', () => {
      const source = (onCaps: string) =>
        [
          "defSpanType cap = : ... [ re('^[A-Z]') ] ...;",
          'defLevel caps = filter cap;',
          onCaps,
          "defLevel s = split 'n';",
          'onLevel s;',
        ].join('\n');
      expect(tokensAfter(source('onLevel caps;'), 'Ann met Bob')).toEqual([
        'A',
        'Bob',
      ]);
      expect(tokensAfter(source(''), 'Ann met Bob')).toEqual([
        'A',
        'met',
        'Bob',
      ]);
    });

    it('fails when filtering on an undeclared type', () => {
      expect(() =>
        run('defLevel L = filter nope;', { doc: 'a' })
      ).toThrow("no type 'nope' defined");
    });
  });

  describe('importFromLevel', () => {
    it('maps instances onto the tokens of the current level', () => {
      const ctx = run(
        [
          "defLevel chunks = regex '\\S+';",
          'onLevel chunks;',
          EACH_TOKEN,
          'offLevel;',
          'importFromLevel chunks word = tok;',
        ].join('\n'),
        { doc: 'New-York city' }
      );
      const spans = ctx.labels.base.instancesOf('word');
      expect(spans.map((span) => span.asString())).toEqual([
        'New-York',
        'city',
      ]);
      expect(spans.map((span) => [span.lo, span.hi])).toEqual([
        [0, 3],
        [3, 4],
      ]);
    });

    it('drops instances covering no whole token', () => {
      const ctx = run(
        [
          "defSpanType part = : ... [ any ] ...;",
          "defLevel L = regex 'ew';",
          'onLevel L;',
          'importFromLevel original p = part;',
        ].join('\n'),
        { doc: 'New-York' }
      );
      expect(instanceTexts(currentLabels(ctx), 'p')).toEqual(['ew']);
    });

    it('declares the new type even when nothing maps', () => {
      const ctx = run(
        [
          'declareSpanType empty;',
          "defLevel L = regex '\\S+';",
          'onLevel L;',
          'importFromLevel original e = empty;',
        ].join('\n'),
        { doc: 'a' }
      );
      expect(currentLabels(ctx).isType('e')).toBe(true);
    });

    it('fails on an unknown source level or type', () => {
      expect(() =>
        run('importFromLevel nowhere a = b;', { doc: 'x' })
      ).toThrow("no level 'nowhere' defined");
      expect(() =>
        run('importFromLevel original a = b;', { doc: 'x' })
      ).toThrow("no type 'b' defined");
    });
  });
});
