/**
 * Mixup Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface MixupErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  /** Underlying failure (I/O errors while resolving file references) */
  readonly cause?: unknown;
}

function lookupDefinition(errorId: string, category?: ErrorCategory) {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Mixup errors.
 * Provides structured data for host applications to format as needed.
 */
export class MixupError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: MixupErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    lookupDefinition(data.errorId);

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(
      `${data.message}${locationStr}`,
      data.cause !== undefined ? { cause: data.cause } : undefined
    );
    this.name = 'MixupError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): MixupErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
      cause: this.cause,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: MixupErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template.
 *
 * @example
 * createError('MIXUP-R001', { type: 'name' })
 * // RuntimeReferenceError: "no type 'name' defined"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined,
  cause?: unknown
): MixupError {
  const definition = lookupDefinition(errorId);
  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'lexer':
      return new LexerError(
        errorId,
        message,
        location ?? { line: 1, column: 1, offset: 0 },
        context
      );
    case 'parse':
      return new ParseError(
        errorId,
        message,
        location ?? { line: 1, column: 1, offset: 0 },
        context,
        cause
      );
    case 'runtime':
      if (
        errorId === 'MIXUP-R001' ||
        errorId === 'MIXUP-R002' ||
        errorId === 'MIXUP-R005'
      ) {
        return new RuntimeReferenceError(errorId, message, context);
      }
      if (errorId === 'MIXUP-R003' || errorId === 'MIXUP-R004') {
        return new ResourceLoadError(errorId, message, context, cause);
      }
      return new RuntimeError(errorId, message, location, context, cause);
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Malformed program text (unterminated literals) */
export class LexerError extends MixupError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    lookupDefinition(errorId, 'lexer');
    super({ errorId, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}

/**
 * Parse-time errors.
 * `context.keyword` names the statement being parsed when it is known.
 */
export class ParseError extends MixupError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    lookupDefinition(errorId, 'parse');
    super({ errorId, message, location, context, cause });
    this.name = 'ParseError';
    this.location = location;
  }

  /** Keyword of the statement that failed to parse */
  get keyword(): string | undefined {
    const keyword = this.context?.['keyword'];
    return typeof keyword === 'string' ? keyword : undefined;
  }
}

/** Runtime execution errors */
export class RuntimeError extends MixupError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    lookupDefinition(errorId, 'runtime');
    super({ errorId, message, location, context, cause });
    this.name = 'RuntimeError';
  }
}

/** A scope, level or dictionary names something that was never defined */
export class RuntimeReferenceError extends RuntimeError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(errorId, message, undefined, context);
    this.name = 'RuntimeReferenceError';
  }
}

/** Missing or unusable external annotator */
export class ResourceLoadError extends RuntimeError {
  readonly resource: string;

  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(errorId, message, undefined, context, cause);
    this.name = 'ResourceLoadError';
    const resource = context?.['resource'];
    this.resource = typeof resource === 'string' ? resource : '';
  }
}
