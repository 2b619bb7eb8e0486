/**
 * Error Registry and Error Class Tests
 */

import { describe, expect, it } from 'vitest';
import {
  createError,
  ERROR_REGISTRY,
  LexerError,
  MixupError,
  ParseError,
  renderMessage,
  ResourceLoadError,
  RuntimeError,
  RuntimeReferenceError,
} from '../src/index.js';

describe('Error Registry', () => {
  it('registers every error under its own ID', () => {
    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      expect(definition.errorId).toBe(id);
      expect(id).toMatch(/^MIXUP-[LPR]\d{3}$/);
    }
    expect(ERROR_REGISTRY.size).toBe(18);
    expect(ERROR_REGISTRY.has('MIXUP-P001')).toBe(true);
    expect(ERROR_REGISTRY.get('MIXUP-X999')).toBeUndefined();
  });

  describe('renderMessage', () => {
    it('fills placeholders from the context', () => {
      expect(renderMessage("no type '{type}' defined", { type: 'name' })).toBe(
        "no type 'name' defined"
      );
    });

    it('renders missing values as empty text and coerces others', () => {
      expect(renderMessage('{a}-{b}', { b: 42 })).toBe('-42');
    });

    it('returns a template with an unclosed brace unchanged', () => {
      expect(renderMessage('bad {template', { template: 'x' })).toBe(
        'bad {template'
      );
    });
  });
});

describe('Error classes', () => {
  it('picks the class from the error category', () => {
    expect(createError('MIXUP-L001', { quote: 'double' })).toBeInstanceOf(
      LexerError
    );
    expect(
      createError('MIXUP-P010', { keyword: 'x', reason: 'y' })
    ).toBeInstanceOf(ParseError);
    expect(createError('MIXUP-R001', { type: 't' })).toBeInstanceOf(
      RuntimeReferenceError
    );
    expect(createError('MIXUP-R005', { name: 'd' })).toBeInstanceOf(
      RuntimeReferenceError
    );
    expect(createError('MIXUP-R004', { resource: 'a', reason: 'b' })).toBeInstanceOf(
      ResourceLoadError
    );
  });

  it('keeps runtime errors in one hierarchy', () => {
    const err = createError('MIXUP-R002', { level: 'L' });
    expect(err).toBeInstanceOf(RuntimeError);
    expect(err).toBeInstanceOf(MixupError);
    expect(err.name).toBe('RuntimeReferenceError');
  });

  it('appends the location to the message', () => {
    const err = createError(
      'MIXUP-P001',
      { keyword: 'defFoo' },
      { line: 3, column: 5, offset: 20 }
    );
    expect(err.message).toBe('Unknown statement keyword: defFoo at 3:5');
    expect(err.toData()).toEqual({
      errorId: 'MIXUP-P001',
      message: 'Unknown statement keyword: defFoo',
      location: { line: 3, column: 5, offset: 20 },
      context: { keyword: 'defFoo' },
      cause: undefined,
    });
  });

  it('exposes the keyword of parse errors', () => {
    const err = new ParseError(
      'MIXUP-P009',
      "provide: expected ';' but saw 'x'",
      { line: 1, column: 11, offset: 10 },
      { keyword: 'provide' }
    );
    expect(err.keyword).toBe('provide');
  });

  it('formats through a host formatter', () => {
    const err = createError('MIXUP-R001', { type: 't' });
    expect(err.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
      "[MIXUP-R001] no type 't' defined"
    );
    expect(err.format()).toBe("no type 't' defined");
  });

  it('keeps the underlying cause', () => {
    const cause = new Error('disk');
    const err = createError(
      'MIXUP-R004',
      { resource: 'a', reason: 'disk' },
      undefined,
      cause
    );
    expect(err.cause).toBe(cause);
  });

  it('rejects unknown IDs and mismatched categories', () => {
    expect(() => createError('MIXUP-X001', {})).toThrow(
      'Unknown error ID: MIXUP-X001'
    );
    expect(
      () => new LexerError('MIXUP-R001', 'm', { line: 1, column: 1, offset: 0 })
    ).toThrow('Expected lexer error ID, got: MIXUP-R001');
  });
});
