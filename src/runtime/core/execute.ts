/**
 * Program Execution
 *
 * Public API for evaluating Mixup programs.
 * Provides both full evaluation and step-by-step execution.
 */

import type { MultiLevelLabels } from '../../labels/multi-level.js';
import type { Program } from '../../parser/program.js';
import { executeStatement } from './statements.js';
import type {
  EvaluationContext,
  ExecutionStepper,
  StepResult,
} from './types.js';

/**
 * Evaluate every statement of a program, in order, against the context's
 * label store. The first failing statement aborts the evaluation.
 *
 * @returns The (mutated) label store
 */
export function evaluate(
  program: Program,
  context: EvaluationContext
): MultiLevelLabels {
  const stepper = createStepper(program, context);
  while (!stepper.done) {
    stepper.step();
  }
  return context.labels;
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Allows the caller to control the execution loop and inspect the labels
 * between steps.
 */
export function createStepper(
  program: Program,
  context: EvaluationContext
): ExecutionStepper {
  const statements = program.statements;
  const total = statements.length;
  let index = 0;
  let isDone = total === 0;

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    step(): StepResult {
      const statement = statements[index];
      if (isDone || !statement) {
        isDone = true;
        return { statement: null, done: true, index, total };
      }

      const startTime = Date.now();
      context.observability.onStepStart?.({ index, total, statement });

      try {
        executeStatement(statement, context);
      } catch (error) {
        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });
        throw error;
      }

      context.observability.onStepEnd?.({
        index,
        total,
        statement,
        durationMs: Date.now() - startTime,
      });

      index++;
      isDone = index >= total;
      return { statement, done: isDone, index: index - 1, total };
    },
  };
}
