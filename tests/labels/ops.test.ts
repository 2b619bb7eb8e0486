/**
 * Mixup Label Store Tests
 */

import { describe, expect, it } from 'vitest';
import {
  loadOps,
  RuntimeReferenceError,
  saveTypesAsOps,
  Span,
} from '../../src/index.js';
import { instanceTexts, labelsFor } from '../helpers/labels.js';

describe('Mixup Label Store', () => {
  describe('TextLabels', () => {
    it('adds each span to a type once', () => {
      const labels = labelsFor({ doc: 'a b c' });
      const [doc] = labels.base.textBase.documents();
      if (!doc) throw new Error('no document');
      labels.base.addToType(new Span(doc, 1, 3), 't');
      labels.base.addToType(new Span(doc, 0, 1), 't');
      labels.base.addToType(new Span(doc, 1, 3), 't');
      expect(instanceTexts(labels.base, 't')).toEqual(['a', 'b c']);
      expect(labels.base.instanceCount('t')).toBe(2);
      expect(labels.base.hasType(new Span(doc, 0, 1), 't')).toBe(true);
      expect(labels.base.instancesStartingAt('t', doc, 1)).toHaveLength(1);
    });

    it('lists declared types sorted', () => {
      const labels = labelsFor({ doc: 'a' });
      labels.base.declareType('zeta');
      labels.base.declareType('alpha');
      expect(labels.base.types()).toEqual(['alpha', 'zeta']);
      expect(labels.base.instancesOf('missing')).toEqual([]);
    });

    it('fails on an undefined dictionary', () => {
      const labels = labelsFor({ doc: 'a' });
      labels.defineDictionary('d', ['a']);
      expect(labels.base.inDictionary('d', 'a')).toBe(true);
      expect(() => labels.base.inDictionary('e', 'a')).toThrow(
        RuntimeReferenceError
      );
    });
  });

  describe('MultiLevelLabels', () => {
    it('starts with the original level only', () => {
      const labels = labelsFor({ doc: 'a' });
      expect(labels.levelNames()).toEqual(['original']);
      expect(labels.base.levelName).toBe('original');
      expect(() => labels.level('other')).toThrow("no level 'other' defined");
    });

    it('records provided types', () => {
      const labels = labelsFor({ doc: 'a' });
      labels.setAnnotatedBy('b');
      labels.setAnnotatedBy('a');
      expect(labels.isAnnotatedBy('a')).toBe(true);
      expect(labels.annotated()).toEqual(['a', 'b']);
    });
  });

  describe('label operations', () => {
    it('saves instances by character range', () => {
      const labels = labelsFor({ doc: 'Ann met Bob' });
      const [doc] = labels.base.textBase.documents();
      if (!doc) throw new Error('no document');
      labels.base.addToType(new Span(doc, 2, 3), 'name');
      labels.base.addToType(new Span(doc, 0, 1), 'name');
      labels.base.declareType('empty');
      expect(saveTypesAsOps(labels.base)).toBe(
        'declareType empty\naddToType doc 0 3 name\naddToType doc 8 3 name\n'
      );
    });

    it('saves nothing for an unlabeled store', () => {
      expect(saveTypesAsOps(labelsFor({ doc: 'a' }).base)).toBe('');
    });

    it('loads operations onto whole tokens', () => {
      const labels = labelsFor({ doc: 'Ann met Bob' });
      const applied = loadOps(
        [
          '# people',
          'addToType doc 0 3 name',
          '',
          'addToType doc 4 7 name',
          'addToType doc 1 1 name',
          'declareType empty',
        ].join('\n'),
        labels.base
      );
      expect(applied).toBe(4);
      expect(instanceTexts(labels.base, 'name')).toEqual(['Ann', 'met Bob']);
      expect(labels.base.types()).toEqual(['empty', 'name']);
    });

    it('reads back what it saves', () => {
      const source = labelsFor({ doc: 'Ann met Bob' });
      const [doc] = source.base.textBase.documents();
      if (!doc) throw new Error('no document');
      source.base.addToType(new Span(doc, 0, 2), 'pair');

      const target = labelsFor({ doc: 'Ann met Bob' });
      loadOps(saveTypesAsOps(source.base), target.base);
      expect(instanceTexts(target.base, 'pair')).toEqual(['Ann met']);
    });

    it('encodes spaces in document ids and type names', () => {
      const source = labelsFor({ 'my notes.txt': 'Ann met Bob' });
      const [doc] = source.base.textBase.documents();
      if (!doc) throw new Error('no document');
      source.base.addToType(new Span(doc, 0, 2), 'full name');

      const ops = saveTypesAsOps(source.base);
      expect(ops).toBe('addToType my%20notes.txt 0 7 full%20name\n');

      const target = labelsFor({ 'my notes.txt': 'Ann met Bob' });
      expect(loadOps(ops, target.base)).toBe(1);
      expect(instanceTexts(target.base, 'full name')).toEqual(['Ann met']);
    });

    it('rejects bad escapes', () => {
      const labels = labelsFor({ doc: 'a' });
      expect(() => loadOps('declareType %zz', labels.base)).toThrow(
        "Invalid label operation at line 1: bad escape in '%zz'"
      );
    });

    it('rejects malformed lines and unknown documents', () => {
      const labels = labelsFor({ doc: 'a' });
      expect(() => loadOps('addToType doc x 1 t', labels.base)).toThrow(
        'Invalid label operation at line 1: addToType doc x 1 t'
      );
      expect(() => loadOps('\naddToType other 0 1 t', labels.base)).toThrow(
        "Invalid label operation at line 2: unknown document 'other'"
      );
    });
  });
});
