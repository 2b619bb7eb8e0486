/**
 * Statement Serialization
 * Renders statements back to program text the parser accepts.
 */

import type {
  DictEntry,
  Generator,
  LabelEffect,
  Scope,
  Statement,
} from '../types.js';
import { formatName, quoteLiteral } from './helpers.js';

const BARE_WORD = /^[A-Za-z0-9_]+$/;

/** A dictionary word or trie token; quoted unless it lexes as one word */
function formatWord(word: string): string {
  return BARE_WORD.test(word) ? word : quoteLiteral(word);
}

/** File references stay references; their contents are read again on parse */
function formatDictEntry(entry: DictEntry): string {
  return entry.kind === 'File' ? `"${entry.file}"` : formatWord(entry.word);
}

function formatEffect(effect: LabelEffect): string {
  switch (effect.kind) {
    case 'SpanType':
      return `defSpanType ${formatName(effect.type)} =`;
    case 'SpanProperty':
      return `defSpanProp ${formatName(effect.key)}:${formatName(effect.value)} =`;
    case 'TokenProperty':
      return `defTokenProp ${formatName(effect.key)}:${formatName(effect.value)} =`;
  }
}

function formatScope(scope: Scope): string {
  return scope.kind === 'Named' ? ` ${formatName(scope.type)}` : '';
}

function formatGenerator(generator: Generator): string {
  switch (generator.kind) {
    case 'Match':
      return `: ${generator.expr.toString()}`;
    case 'Filter':
      return `- ${generator.expr.toString()}`;
    case 'RegexExtract':
      return `~ re ${quoteLiteral(generator.pattern)}, ${generator.group}`;
    case 'TrieExtract':
      return `~ trie ${generator.trie
        .phrases()
        .map((phrase) => phrase.tokens.map(formatWord).join(' '))
        .join(', ')}`;
  }
}

/** One statement as program text, without the terminating `;` */
export function formatStatement(statement: Statement): string {
  switch (statement.kind) {
    case 'Declare':
      return `declareSpanType ${formatName(statement.type)}`;
    case 'Provide':
      return `provide ${formatName(statement.annotationType)}`;
    case 'Require':
      return statement.file === null
        ? `require ${formatName(statement.annotationType)}`
        : `require ${formatName(statement.annotationType)}, ${formatName(statement.file)}`;
    case 'AnnotateWith':
      return `annotateWith ${formatName(statement.file)}`;
    case 'DefDict': {
      const modifier = statement.caseSensitive ? '+case ' : '';
      const words = statement.entries.map(formatDictEntry).join(', ');
      return `defDict ${modifier}${formatName(statement.name)} = ${words}`;
    }
    case 'DefLevel':
      return `defLevel ${formatName(statement.name)} = ${statement.strategy} ${quoteLiteral(statement.pattern)}`;
    case 'OnLevel':
      return `onLevel ${formatName(statement.name)}`;
    case 'OffLevel':
      return 'offLevel';
    case 'ImportFromLevel':
      return `importFromLevel ${formatName(statement.sourceLevel)} ${formatName(statement.destType)} = ${formatName(statement.sourceType)}`;
    case 'Labeling':
      return `${formatEffect(statement.effect)}${formatScope(statement.scope)} ${formatGenerator(statement.generator)}`;
  }
}
