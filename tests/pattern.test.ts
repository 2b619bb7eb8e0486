/**
 * Mixup Pattern Language Tests
 */

import { describe, expect, it } from 'vitest';
import {
  ParseError,
  PatternExpression,
  RuntimeReferenceError,
  parseProgram,
} from '../src/index.js';
import { currentLabels, instanceTexts, labelsFor, run } from './helpers/labels.js';

/** Instances of `type` after running `source` over one document */
function extract(source: string, text: string, type = 'x'): string[] {
  return instanceTexts(currentLabels(run(source, { doc: text })), type);
}

function patternOf(source: string): PatternExpression {
  const [statement] = parseProgram(source).statements;
  if (
    statement?.kind !== 'Labeling' ||
    statement.generator.kind !== 'Match'
  ) {
    throw new Error('expected a match statement');
  }
  return statement.generator.expr;
}

describe('Mixup Pattern Language', () => {
  describe('sequences', () => {
    it('extracts the bracketed region', () => {
      expect(
        extract("defSpanType x = : ... [ 'Bob' ] ...;", 'Hi Bob and Bob')
      ).toEqual(['Bob', 'Bob']);
    });

    it('extracts the whole input span without brackets', () => {
      expect(extract('defSpanType x = : any+;', 'a b')).toEqual(['a b']);
    });

    it('must consume the whole input span', () => {
      const labels = currentLabels(
        run("defSpanType x = : 'a';", { doc: 'a b' })
      );
      expect(labels.instancesOf('x')).toEqual([]);
      expect(labels.isType('x')).toBe(true);
    });

    it('yields every distinct region, ordered by start then end', () => {
      expect(extract('defSpanType x = : ... [ any+ ] ...;', 'a b c')).toEqual([
        'a',
        'a b',
        'a b c',
        'b',
        'b c',
        'c',
      ]);
    });

    it('honors bounded repeats', () => {
      expect(
        extract(
          "defSpanType x = : ... [ re('^[0-9]+$'){2} ] ...;",
          'call 555 1234 now'
        )
      ).toEqual(['555 1234']);
    });

    it('unions the regions of alternatives', () => {
      expect(
        extract("defSpanType x = : ... [ 'x' ] ... || ... [ 'y' ] ...;", 'x y')
      ).toEqual(['x', 'y']);
    });
  });

  describe('token tests', () => {
    it('compares text exactly or ignoring case', () => {
      expect(
        extract("defSpanType x = : ... [ eq('Bob') ] ...;", 'bob Bob')
      ).toEqual(['Bob']);
      expect(
        extract("defSpanType x = : ... [ eqi('BOB') ] ...;", 'bob Bob')
      ).toEqual(['bob', 'Bob']);
    });

    it('combines tests with < > and !', () => {
      expect(
        extract(
          "defSpanType x = : ... [ <re('^[a-z]+$'), !'the'> ] ...;",
          'the cat sat'
        )
      ).toEqual(['cat', 'sat']);
    });

    it('looks words up in dictionaries', () => {
      const text = 'Bob met BOB';
      expect(
        extract('defDict d = bob; defSpanType x = : ... [ ai(d) ] ...;', text)
      ).toEqual(['Bob', 'BOB']);
      expect(
        extract('defDict d = bob; defSpanType x = : ... [ a(d) ] ...;', text)
      ).toEqual([]);
      expect(
        extract(
          'defDict +case d = Bob; defSpanType x = : ... [ a(d) ] ...;',
          text
        )
      ).toEqual(['Bob']);
    });

    it('fails on an undefined dictionary', () => {
      expect(() =>
        run('defSpanType x = : ... [ a(nope) ] ...;', { doc: 'a' })
      ).toThrow(RuntimeReferenceError);
      expect(() =>
        run('defSpanType x = : ... [ a(nope) ] ...;', { doc: 'a' })
      ).toThrow("no dictionary 'nope' defined");
    });

    it('tests token properties by value and by presence', () => {
      const source = [
        "defTokenProp pos:num = ~ re '[0-9]+', 0;",
        'defSpanType x = : ... [ pos:num+ ] ...;',
        'defSpanType y = : ... [ pos ] ...;',
      ].join('\n');
      const labels = currentLabels(run(source, { doc: 'at 10 20 x' }));
      expect(instanceTexts(labels, 'x')).toEqual(['10', '10 20', '20']);
      expect(instanceTexts(labels, 'y')).toEqual(['10', '20']);
    });
  });

  describe('type references', () => {
    const titles = "defSpanType t = : ... [ 'Mr' ] ...;";
    const text = 'Mr Smith met Mr Jones';

    it('consumes an instance of the type', () => {
      expect(
        extract(
          `${titles} defSpanType x = : ... [ @t re('^[A-Z]') ] ...;`,
          text
        )
      ).toEqual(['Mr Smith', 'Mr Jones']);
    });

    it('may skip an optional instance', () => {
      expect(
        extract(
          `${titles} defSpanType x = : ... [ @t? re('^[A-Z]') ] ...;`,
          text
        )
      ).toEqual(['Mr', 'Mr Smith', 'Smith', 'Mr', 'Mr Jones', 'Jones']);
    });

    it('never matches an undeclared type', () => {
      expect(
        extract("defSpanType x = : ... [ @missing 'Mr' ] ...;", text)
      ).toEqual([]);
    });
  });

  describe('PatternExpression', () => {
    it('reports whether a span has an extraction', () => {
      const labels = labelsFor({ doc: 'a b' });
      const [span] = labels.base.documentSpans();
      if (!span) throw new Error('no document span');
      expect(
        patternOf("defSpanType x = : ... 'b';").hasExtraction(labels.base, span)
      ).toBe(true);
      expect(
        patternOf("defSpanType x = : ... 'c';").hasExtraction(labels.base, span)
      ).toBe(false);
    });

    it('extracts lazily across input spans', () => {
      const labels = labelsFor({ one: 'a b', two: 'b a' });
      const spans = labels.base.documentSpans();
      const found = [
        ...patternOf("defSpanType x = : ... [ 'a' ] ...;").extract(
          labels.base,
          spans
        ),
      ];
      expect(found.map((span) => span.toString())).toEqual([
        "[one 0:1 'a']",
        "[two 1:2 'a']",
      ]);
    });

    it('renders back to pattern text', () => {
      expect(
        patternOf("defSpanType x = : ... [ a(d) pos:num* ] ...;").toString()
      ).toBe('... [ a(d) pos:num* ] ...');
    });
  });

  describe('syntax errors', () => {
    function parseFailure(source: string): ParseError {
      try {
        parseProgram(source);
      } catch (err) {
        if (err instanceof ParseError) return err;
        throw err;
      }
      throw new Error('expected a parse error');
    }

    it('rejects brackets closed before they open', () => {
      const err = parseFailure("defSpanType x = : ] 'a' [;");
      expect(err.errorId).toBe('MIXUP-P010');
      expect(err.message).toBe(
        "defSpanType: unbalanced '[' ']' in pattern at 1:19"
      );
    });

    it('rejects reversed repeat bounds', () => {
      expect(parseFailure('defSpanType x = : any{3,1};').message).toBe(
        'defSpanType: repeat bounds {3,1} are reversed at 1:22'
      );
    });

    it('rejects unknown test functions', () => {
      expect(parseFailure("defSpanType x = : foo('a');").message).toBe(
        "defSpanType: unknown test 'foo' at 1:19"
      );
    });

    it('rejects an empty alternative', () => {
      expect(parseFailure("defSpanType x = : 'a' || ;").message).toBe(
        'defSpanType: empty pattern sequence at 1:26'
      );
    });
  });
});
