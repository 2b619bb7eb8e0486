/**
 * Evaluation Context Factory
 *
 * Creates and configures the context a program is evaluated in.
 * Public API for host applications.
 */

import type { MultiLevelLabels } from '../../labels/multi-level.js';
import { createResourceResolver, type ResourceResolver } from '../../resources.js';
import { Tokenizer } from '../../text/tokenizer.js';
import { BASE_LEVEL } from '../../types.js';
import type {
  EvaluationContext,
  EvaluationOptions,
  RuntimeCallbacks,
} from './types.js';

const defaultCallbacks: RuntimeCallbacks = {
  onLog: () => {},
};

/**
 * Create an evaluation context over `labels`. Evaluation starts on the
 * base level.
 */
export function createEvaluationContext(
  labels: MultiLevelLabels,
  options: EvaluationOptions = {}
): EvaluationContext {
  return {
    labels,
    currentLevel: BASE_LEVEL,
    resolver: options.resolver ?? createResourceResolver(),
    tokenizer: options.tokenizer ?? new Tokenizer(),
    annotators: new Map(Object.entries(options.annotators ?? {})),
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
    loading: new Set(),
  };
}

/**
 * Context for a nested annotator program: same store and registry, a
 * fresh level, and file references resolved from the program's directory.
 */
export function createChildContext(
  parent: EvaluationContext,
  resolver: ResourceResolver
): EvaluationContext {
  return {
    ...parent,
    currentLevel: BASE_LEVEL,
    resolver,
    observability: {},
  };
}
