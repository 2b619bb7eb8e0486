/**
 * Annotator Loading
 *
 * `annotateWith NAME` and the `require` fallback both load an annotator by
 * name: a host-registered annotator first, then a program file found by
 * the resolver (`NAME` or `NAME.mixup`).
 */

import { createError } from '../../error-classes.js';
import type { MultiLevelLabels } from '../../labels/multi-level.js';
import { loadProgram } from '../../parser/index.js';
import type { Program } from '../../parser/program.js';
import { createChildContext } from './context.js';
import { evaluate } from './execute.js';
import type { Annotator, EvaluationContext } from './types.js';

export const PROGRAM_EXTENSION = '.mixup';

/** Runs a program over the store it is given, from the base level */
export class ProgramAnnotator implements Annotator {
  readonly program: Program;
  readonly file: string;
  private readonly parent: EvaluationContext;

  constructor(program: Program, file: string, parent: EvaluationContext) {
    this.program = program;
    this.file = file;
    this.parent = parent;
  }

  annotate(labels: MultiLevelLabels): void {
    const { loading } = this.parent;
    if (loading.has(this.file)) {
      throw createError('MIXUP-R004', {
        resource: this.file,
        reason: 'the annotator requires itself',
      });
    }

    const context = createChildContext(
      { ...this.parent, labels },
      this.parent.resolver.relativeTo(this.file)
    );
    loading.add(this.file);
    try {
      evaluate(this.program, context);
    } finally {
      loading.delete(this.file);
    }
  }
}

function resolveProgramFile(
  context: EvaluationContext,
  name: string
): string | null {
  const { resolver } = context;
  return (
    resolver.resolve(name) ??
    (name.endsWith(PROGRAM_EXTENSION)
      ? null
      : resolver.resolve(`${name}${PROGRAM_EXTENSION}`))
  );
}

/**
 * Find an annotator by name.
 * Throws ResourceLoadError when nothing is found or the program does not
 * parse.
 */
export function loadAnnotator(
  context: EvaluationContext,
  name: string
): Annotator {
  const registered = context.annotators.get(name);
  if (registered) return registered;

  const file = resolveProgramFile(context, name);
  if (file === null) {
    throw createError('MIXUP-R003', { resource: name });
  }

  let program: Program;
  try {
    program = loadProgram(file, {
      resolver: context.resolver,
      tokenizer: context.tokenizer,
    });
  } catch (err) {
    throw createError(
      'MIXUP-R004',
      {
        resource: name,
        reason: err instanceof Error ? err.message : String(err),
      },
      undefined,
      err
    );
  }

  context.callbacks.onLog(`loaded annotator '${name}' from ${file}`);
  return new ProgramAnnotator(program, file, context);
}

/**
 * `require TYPE[, FILE]`: nothing to do when the type was provided or
 * already has instances; otherwise run FILE (default `TYPE.mixup`) and
 * mark the type provided.
 */
export function requireType(
  context: EvaluationContext,
  type: string,
  file: string | null
): void {
  const { labels } = context;
  if (
    labels.isAnnotatedBy(type) ||
    labels.level(context.currentLevel).instanceCount(type) > 0
  ) {
    return;
  }

  const source = file ?? `${type}${PROGRAM_EXTENSION}`;
  context.callbacks.onLog(`require ${type}: annotating with ${source}`);
  loadAnnotator(context, source).annotate(labels);
  labels.setAnnotatedBy(type);
}
