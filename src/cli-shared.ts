/**
 * CLI Shared Utilities
 * Formatting functions for the mixup CLI
 */

import type { TextLabels } from './labels/text-labels.js';
import {
  LexerError,
  ParseError,
  ResourceLoadError,
  RuntimeError,
} from './error-classes.js';
import { ResourceNotFoundError } from './resources.js';

function stripLocation(message: string): string {
  return message.replace(/ at \d+:\d+$/, '');
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    const location = err.location;
    return `Lexer error at line ${location.line}: ${stripLocation(err.message)}`;
  }

  if (err instanceof ParseError) {
    const location = err.location;
    return `Parse error at line ${location.line}, column ${location.column}: ${stripLocation(err.message)}`;
  }

  if (err instanceof ResourceLoadError) {
    return `Annotator error: ${err.message}`;
  }

  if (err instanceof RuntimeError) {
    return `Runtime error: ${stripLocation(err.message)}`;
  }

  if (err instanceof ResourceNotFoundError) {
    return `File not found: ${err.resource}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Every declared type with its instances, one span text per line:
 *
 *   Type name:
 *   	'Bob Smith'
 */
export function formatTypes(labels: TextLabels): string {
  const lines: string[] = [];
  for (const type of labels.types()) {
    lines.push(`Type ${type}:`);
    for (const span of labels.instancesOf(type)) {
      lines.push(`\t'${span.asString()}'`);
    }
  }
  return lines.map((line) => `${line}\n`).join('');
}
