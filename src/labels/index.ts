/**
 * Label Store
 */

export { MultiLevelLabels } from './multi-level.js';
export { TextLabels, type DictionarySource } from './text-labels.js';
export { retokenize } from './levels.js';
export { loadOps, saveTypesAsOps } from './ops.js';
