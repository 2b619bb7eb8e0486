/**
 * Mixup Module
 * Exports lexer, parser, runtime, label store and text model
 */

export { stripComments, tokenize } from './lexer/index.js';
export {
  formatStatement,
  loadProgram,
  parseProgram,
  parseStatements,
  Program,
  type ParseOptions,
} from './parser/index.js';
export {
  matchSpan,
  parsePattern,
  PatternExpression,
  type PatternNode,
  type TokenTest,
} from './pattern/index.js';
export {
  createEvaluationContext,
  createStepper,
  evaluate,
  loadAnnotator,
  ProgramAnnotator,
  PROGRAM_EXTENSION,
  type Annotator,
  type ErrorEvent,
  type EvaluationContext,
  type EvaluationOptions,
  type ExecutionStepper,
  type ObservabilityCallbacks,
  type RuntimeCallbacks,
  type StepEndEvent,
  type StepResult,
  type StepStartEvent,
} from './runtime/index.js';
export {
  loadOps,
  MultiLevelLabels,
  retokenize,
  saveTypesAsOps,
  TextLabels,
  type DictionarySource,
} from './labels/index.js';
export {
  compareSpans,
  DEFAULT_TOKEN_PATTERN,
  LABELS_EXTENSION,
  loadTexts,
  Span,
  sortedUnique,
  TextBase,
  TextDocument,
  tokenKey,
  Tokenizer,
  Trie,
  type LoadedTexts,
  type TextToken,
  type TokenRange,
  type TriePhrase,
} from './text/index.js';
export {
  createResourceResolver,
  ResourceNotFoundError,
  type ResolverOptions,
  type ResourceResolver,
} from './resources.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  type MixupConfig,
} from './config.js';
export * from './types.js';
