/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: MIXUP-{category}{3-digit} (e.g., MIXUP-R001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (MIXUP-L0xx)
  {
    errorId: 'MIXUP-L001',
    category: 'lexer',
    description: 'Unterminated quoted literal',
    messageTemplate: 'Unterminated {quote}-quoted literal',
    cause:
      'A quote was opened but never closed before the end of the program text.',
    resolution:
      "Close the literal. Note that '//' starts a comment even inside quotes.",
  },

  // Parse Errors (MIXUP-P0xx)
  {
    errorId: 'MIXUP-P001',
    category: 'parse',
    description: 'Unknown statement keyword',
    messageTemplate: 'Unknown statement keyword: {keyword}',
    cause: 'A statement must start with one of the Mixup keywords.',
    resolution:
      'Use one of: defTokenProp, defSpanProp, defSpanType, defDict, declareSpanType, provide, require, annotateWith, defLevel, onLevel, offLevel, importFromLevel.',
  },
  {
    errorId: 'MIXUP-P002',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: '{keyword}: expected {expected}, got {actual}',
  },
  {
    errorId: 'MIXUP-P003',
    category: 'parse',
    description: 'Illegal keyword usage',
    messageTemplate: '{keyword}: {reason}',
    cause:
      "Property statements need 'PROP:VALUE =' and type statements need 'TYPE ='.",
  },
  {
    errorId: 'MIXUP-P004',
    category: 'parse',
    description: 'Expected comma',
    messageTemplate: '{keyword}: expected comma, got {actual}',
  },
  {
    errorId: 'MIXUP-P005',
    category: 'parse',
    description: 'Invalid regex group number',
    messageTemplate: '{keyword}: expected a regex group number and saw {actual}',
  },
  {
    errorId: 'MIXUP-P006',
    category: 'parse',
    description: 'Unreadable file reference',
    messageTemplate: '{keyword}: error when reading {file}: {reason}',
    resolution:
      'Check that the file exists next to the program, in the working directory, or in a configured search path.',
  },
  {
    errorId: 'MIXUP-P007',
    category: 'parse',
    description: 'Illegal defDict',
    messageTemplate: 'defDict: {reason}',
  },
  {
    errorId: 'MIXUP-P008',
    category: 'parse',
    description: 'Unexpected end of statement',
    messageTemplate: '{keyword}: unexpected end of statement, expected {expected}',
  },
  {
    errorId: 'MIXUP-P009',
    category: 'parse',
    description: 'Missing statement terminator',
    messageTemplate: "{keyword}: expected ';' but saw {actual}",
  },
  {
    errorId: 'MIXUP-P010',
    category: 'parse',
    description: 'Invalid pattern expression',
    messageTemplate: '{keyword}: {reason}',
  },
  {
    errorId: 'MIXUP-P011',
    category: 'parse',
    description: 'Invalid regular expression',
    messageTemplate: '{keyword}: invalid regular expression {pattern}: {reason}',
  },

  // Runtime Errors (MIXUP-R0xx)
  {
    errorId: 'MIXUP-R001',
    category: 'runtime',
    description: 'Undefined type',
    messageTemplate: "no type '{type}' defined",
    cause: 'A generator scope names a type that was never declared.',
    resolution:
      'Declare the type first (declareSpanType, defSpanType) or require it.',
  },
  {
    errorId: 'MIXUP-R002',
    category: 'runtime',
    description: 'Unknown level',
    messageTemplate: "no level '{level}' defined",
    resolution: 'Create the level with defLevel before using it.',
  },
  {
    errorId: 'MIXUP-R003',
    category: 'runtime',
    description: 'Annotator not found',
    messageTemplate: "no annotator found in '{resource}'",
  },
  {
    errorId: 'MIXUP-R004',
    category: 'runtime',
    description: 'Annotator failed to load',
    messageTemplate: "annotator '{resource}' could not be loaded: {reason}",
  },
  {
    errorId: 'MIXUP-R005',
    category: 'runtime',
    description: 'Undefined dictionary',
    messageTemplate: "no dictionary '{name}' defined",
  },
  {
    errorId: 'MIXUP-R006',
    category: 'runtime',
    description: 'Level already defined',
    messageTemplate: "level '{level}' already defined",
    cause: 'Levels are never replaced; defLevel may name each level once.',
    resolution: 'Pick a new level name.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("no type '{type}' defined", { type: "name" })
 * // Returns: "no type 'name' defined"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      // Unclosed brace - return template unchanged
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          result += Object.prototype.toString.call(value);
        }
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
