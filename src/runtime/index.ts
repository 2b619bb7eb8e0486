/**
 * Mixup Runtime
 *
 * Module structure:
 *   - core/types.ts: Public types (EvaluationContext, Annotator, callbacks)
 *   - core/context.ts: Context creation (createEvaluationContext)
 *   - core/execute.ts: Program execution (evaluate, createStepper)
 *   - core/statements.ts: Per-statement effects
 *   - core/generators.ts: Generators and label extension
 *   - core/annotators.ts: annotateWith and require fallbacks
 */

export type {
  Annotator,
  ErrorEvent,
  EvaluationContext,
  EvaluationOptions,
  ExecutionStepper,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

export { createEvaluationContext } from './core/context.js';
export { createStepper, evaluate } from './core/execute.js';
export { executeStatement } from './core/statements.js';
export {
  extendLabels,
  generateSpans,
  resolveScope,
  runLabeling,
} from './core/generators.js';
export {
  PROGRAM_EXTENSION,
  ProgramAnnotator,
  loadAnnotator,
  requireType,
} from './core/annotators.js';
