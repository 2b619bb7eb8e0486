/**
 * Label Operation Files
 *
 * Line-oriented persistence of type labels:
 *   addToType <docId> <charLo> <charLength> <type>
 *   declareType <type>
 * Blank lines and lines starting with `#` are ignored. Whitespace and `%`
 * inside document ids and type names are percent-encoded.
 */

import { Span } from '../text/span.js';
import type { TextLabels } from './text-labels.js';

function encodeField(field: string): string {
  return field.replace(/[%\s]/g, (char) => encodeURIComponent(char));
}

function decodeField(field: string, line: number): string {
  try {
    return decodeURIComponent(field);
  } catch (err) {
    throw new Error(`Invalid label operation at line ${line}: bad escape in '${field}'`, {
      cause: err,
    });
  }
}

/** Serialize every declared type of `labels` as operations */
export function saveTypesAsOps(labels: TextLabels): string {
  const lines: string[] = [];
  for (const type of labels.types()) {
    const instances = labels.instancesOf(type);
    if (instances.length === 0) {
      lines.push(`declareType ${encodeField(type)}`);
      continue;
    }
    for (const span of instances) {
      lines.push(
        `addToType ${encodeField(span.documentId)} ${span.charLo} ${span.charHi - span.charLo} ${encodeField(type)}`
      );
    }
  }
  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}

/**
 * Apply operations to `labels`. A span maps onto the tokens lying inside
 * its character range; ranges covering no whole token are skipped.
 *
 * @returns number of operations applied
 */
export function loadOps(text: string, labels: TextLabels): number {
  let applied = 0;
  const lines = text.split('\n');

  lines.forEach((raw, i) => {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) return;

    const fields = line.split(/\s+/);
    const [op, ...args] = fields;

    if (op === 'declareType' && args.length === 1 && args[0] !== undefined) {
      labels.declareType(decodeField(args[0], i + 1));
      applied++;
      return;
    }

    if (op === 'addToType' && args.length === 4) {
      const [encodedId, lo, length, encodedType] = args;
      const charLo = Number(lo);
      const charLength = Number(length);
      if (
        encodedId !== undefined &&
        encodedType !== undefined &&
        Number.isInteger(charLo) &&
        Number.isInteger(charLength)
      ) {
        const docId = decodeField(encodedId, i + 1);
        const type = decodeField(encodedType, i + 1);
        const doc = labels.textBase.document(docId);
        if (!doc) {
          throw new Error(`Invalid label operation at line ${i + 1}: unknown document '${docId}'`);
        }
        const span = Span.of(doc).tokensWithinChars(charLo, charLo + charLength);
        labels.declareType(type);
        if (span) labels.addToType(span, type);
        applied++;
        return;
      }
    }

    throw new Error(`Invalid label operation at line ${i + 1}: ${line}`);
  });

  return applied;
}
