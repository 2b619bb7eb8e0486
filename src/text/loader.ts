/**
 * Text Loading
 * Builds a TextBase from a file or from every regular file of a directory
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { TextBase } from './text-base.js';
import { Tokenizer } from './tokenizer.js';

/** Extension of label-operation files that sit beside documents */
export const LABELS_EXTENSION = '.labels';

export interface LoadedTexts {
  readonly textBase: TextBase;
  /** Contents of `*.labels` files found in a loaded directory */
  readonly labelFiles: string[];
}

/**
 * Load documents from `target`. A file becomes one document; a directory
 * contributes each regular file, sorted by name. Document ids are file
 * names.
 */
export function loadTexts(
  target: string,
  tokenizer: Tokenizer = new Tokenizer()
): LoadedTexts {
  const stat = fs.statSync(target);
  const texts: [string, string][] = [];
  const labelFiles: string[] = [];

  if (stat.isDirectory()) {
    const names = fs.readdirSync(target).sort();
    for (const name of names) {
      const file = path.join(target, name);
      if (!fs.statSync(file).isFile()) continue;
      const content = fs.readFileSync(file, 'utf-8');
      if (name.endsWith(LABELS_EXTENSION)) {
        labelFiles.push(content);
      } else {
        texts.push([name, content]);
      }
    }
  } else {
    texts.push([path.basename(target), fs.readFileSync(target, 'utf-8')]);
  }

  return { textBase: TextBase.fromTexts(texts, tokenizer), labelFiles };
}
