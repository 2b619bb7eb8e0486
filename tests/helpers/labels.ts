/**
 * Test utilities for Mixup programs
 */

import {
  createEvaluationContext,
  createStepper,
  evaluate,
  MultiLevelLabels,
  parseProgram,
  TextBase,
  type EvaluationContext,
  type EvaluationOptions,
  type ParseOptions,
  type StepResult,
  type TextLabels,
} from '../../src/index.js';

/** Options for test execution */
export interface TestOptions extends EvaluationOptions {
  parse?: ParseOptions;
}

/** A label store over in-memory documents, keyed by document id */
export function labelsFor(texts: Record<string, string>): MultiLevelLabels {
  return new MultiLevelLabels(TextBase.fromTexts(Object.entries(texts)));
}

/** Shared setup for all execution modes */
function setup(
  source: string,
  texts: Record<string, string>,
  options: TestOptions = {}
) {
  const program = parseProgram(source, options.parse ?? {});
  const labels = labelsFor(texts);
  return { program, labels, ctx: createEvaluationContext(labels, options) };
}

/** Parse and evaluate a program over the given documents */
export function run(
  source: string,
  texts: Record<string, string>,
  options: TestOptions = {}
): EvaluationContext {
  const { program, ctx } = setup(source, texts, options);
  evaluate(program, ctx);
  return ctx;
}

/** Execute using stepper and return all step results */
export function runStepped(
  source: string,
  texts: Record<string, string>,
  options: TestOptions = {}
): StepResult[] {
  const { program, ctx } = setup(source, texts, options);
  const stepper = createStepper(program, ctx);
  const results: StepResult[] = [];

  while (!stepper.done) {
    results.push(stepper.step());
  }

  return results;
}

/** Text of each instance of `type`, in span order */
export function instanceTexts(labels: TextLabels, type: string): string[] {
  return labels.instancesOf(type).map((span) => span.asString());
}

/** Labels of the level the evaluation ended on */
export function currentLabels(ctx: EvaluationContext): TextLabels {
  return ctx.labels.level(ctx.currentLevel);
}
