/**
 * Runtime Types
 *
 * Public types for evaluation configuration and step results.
 * These types are the primary interface for host applications.
 */

import type { MultiLevelLabels } from '../../labels/multi-level.js';
import type { ResourceResolver } from '../../resources.js';
import type { Tokenizer } from '../../text/tokenizer.js';
import type { Statement } from '../../types.js';

/** Something that adds labels to a store, such as another program */
export interface Annotator {
  annotate(labels: MultiLevelLabels): void;
}

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called for informational messages (annotator loads, fallbacks) */
  onLog: (message: string) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called when a statement fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
  statement: Statement;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
  statement: Statement;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  /** The error that occurred */
  error: Error;
  /** Statement index where error occurred (if available) */
  index?: number;
}

/** State threaded through the statements of one evaluation */
export interface EvaluationContext {
  /** The label store every statement reads and extends */
  readonly labels: MultiLevelLabels;
  /** Level generator scopes resolve against */
  currentLevel: string;
  /** Finds annotator programs and `require` fallbacks */
  readonly resolver: ResourceResolver;
  /** Tokenizer for annotator programs' trie phrases */
  readonly tokenizer: Tokenizer;
  /** Annotators registered by name; consulted before the resolver */
  readonly annotators: ReadonlyMap<string, Annotator>;
  /** I/O callbacks */
  readonly callbacks: RuntimeCallbacks;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
  /** Annotator files currently being evaluated, shared with nested contexts */
  readonly loading: Set<string>;
}

/** Options for creating an evaluation context */
export interface EvaluationOptions {
  resolver?: ResourceResolver | undefined;
  tokenizer?: Tokenizer | undefined;
  annotators?: Record<string, Annotator> | undefined;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks> | undefined;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks | undefined;
}

/** Result of a single step execution */
export interface StepResult {
  /** Statement executed by this step (null once done) */
  statement: Statement | null;
  /** Whether execution is complete (no more statements) */
  done: boolean;
  /** Index of the executed statement (0-based) */
  index: number;
  /** Total number of statements */
  total: number;
}

/** Stepper for controlled step-by-step execution */
export interface ExecutionStepper {
  /** Whether execution is complete */
  readonly done: boolean;
  /** Current statement index (0-based) */
  readonly index: number;
  /** Total number of statements */
  readonly total: number;
  /** The evaluation context (for inspecting labels and the current level) */
  readonly context: EvaluationContext;
  /** Execute the next statement */
  step(): StepResult;
}
