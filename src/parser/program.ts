/**
 * Program
 * An ordered, immutable list of parsed statements.
 */

import type { Statement } from '../types.js';
import { formatStatement } from './format.js';

export class Program {
  readonly statements: readonly Statement[];

  constructor(statements: readonly Statement[]) {
    this.statements = Object.freeze([...statements]);
    Object.freeze(this);
  }

  get size(): number {
    return this.statements.length;
  }

  /** Program text: one statement per line, each ending in `;` */
  toString(): string {
    return this.statements.map((s) => `${formatStatement(s)};\n`).join('');
  }
}
