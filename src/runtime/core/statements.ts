/**
 * Statement Execution
 * Dispatches one statement to its effect on the label store.
 */

import { createError } from '../../error-classes.js';
import { BASE_LEVEL, type Statement } from '../../types.js';
import { loadAnnotator, requireType } from './annotators.js';
import { runLabeling } from './generators.js';
import type { EvaluationContext } from './types.js';

export function executeStatement(
  statement: Statement,
  context: EvaluationContext
): void {
  const { labels } = context;

  switch (statement.kind) {
    case 'DefDict':
      labels.defineDictionary(statement.name, statement.words);
      return;

    case 'DefLevel':
      labels.createLevel(
        statement.name,
        statement.strategy,
        statement.pattern,
        context.currentLevel
      );
      return;

    case 'OnLevel':
      if (!labels.hasLevel(statement.name)) {
        throw createError('MIXUP-R002', { level: statement.name });
      }
      context.currentLevel = statement.name;
      return;

    case 'OffLevel':
      context.currentLevel = BASE_LEVEL;
      return;

    case 'ImportFromLevel':
      labels.importFromLevel(
        statement.sourceLevel,
        statement.sourceType,
        statement.destType,
        context.currentLevel
      );
      return;

    case 'Declare':
      labels.level(context.currentLevel).declareType(statement.type);
      return;

    case 'Provide':
      labels.setAnnotatedBy(statement.annotationType);
      return;

    case 'Require':
      requireType(context, statement.annotationType, statement.file);
      return;

    case 'AnnotateWith':
      loadAnnotator(context, statement.file).annotate(labels);
      return;

    case 'Labeling':
      runLabeling(labels.level(context.currentLevel), statement);
      return;
  }
}
