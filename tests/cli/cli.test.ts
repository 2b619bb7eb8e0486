/**
 * CLI Tests
 */

import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { main, parseArgs, runProgramFile, type CliOutput } from '../../src/cli.js';
import { formatError, formatTypes } from '../../src/cli-shared.js';
import {
  createError,
  ResourceNotFoundError,
  Span,
} from '../../src/index.js';
import { labelsFor } from '../helpers/labels.js';

const PROGRAM = "defSpanType name = : ... [ re('^[A-Z]') ] ...;\n";

function runArgs(argv: string[]) {
  const parsed = parseArgs(argv);
  if (parsed.mode !== 'run') throw new Error('expected run mode');
  return parsed;
}

function capture(): CliOutput & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

describe('CLI', () => {
  describe('parseArgs', () => {
    it('reads program, text and output positions', () => {
      expect(parseArgs(['p.mixup', 'docs', 'out.labels'])).toEqual({
        mode: 'run',
        program: 'p.mixup',
        text: 'docs',
        out: 'out.labels',
        verbose: false,
        config: undefined,
      });
    });

    it('reads flags in any position', () => {
      expect(
        parseArgs(['--verbose', 'p.mixup', '--config', 'alt.yaml'])
      ).toEqual({
        mode: 'run',
        program: 'p.mixup',
        text: undefined,
        out: undefined,
        verbose: true,
        config: 'alt.yaml',
      });
      expect(parseArgs(['p.mixup', '--help'])).toEqual({ mode: 'help' });
      expect(parseArgs(['-v'])).toEqual({ mode: 'version' });
    });

    it('rejects bad argument lists', () => {
      expect(() => parseArgs([])).toThrow('Missing program file argument');
      expect(() => parseArgs(['--fast', 'p.mixup'])).toThrow(
        'Unknown option: --fast'
      );
      expect(() => parseArgs(['p.mixup', '--config'])).toThrow(
        'Missing file after --config'
      );
      expect(() => parseArgs(['a', 'b', 'c', 'd'])).toThrow(
        'Unexpected argument: d'
      );
    });
  });

  describe('runProgramFile', () => {
    let tempDir: string;

    beforeAll(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mixup-cli-'));
      fs.writeFileSync(path.join(tempDir, 'people.mixup'), PROGRAM);
      fs.writeFileSync(path.join(tempDir, 'bad.mixup'), 'defFoo x;\n');
      fs.mkdirSync(path.join(tempDir, 'docs'));
      fs.writeFileSync(path.join(tempDir, 'docs', 'a.txt'), 'Ann met Bob');
      fs.writeFileSync(path.join(tempDir, 'docs', 'b.txt'), 'hi Cy');
      fs.writeFileSync(
        path.join(tempDir, 'docs', 'extra.labels'),
        'addToType a.txt 4 3 verb\n'
      );
    });

    afterAll(() => {
      fs.rmSync(tempDir, { recursive: true });
    });

    it('prints the program when no text is given', () => {
      const output = capture();
      expect(runProgramFile(runArgs(['people.mixup']), tempDir, output)).toBeNull();
      expect(output.out.join('')).toBe(`program:\n${PROGRAM}`);
    });

    it('labels a directory and prints every type', () => {
      const output = capture();
      runProgramFile(runArgs(['people.mixup', 'docs']), tempDir, output);
      expect(output.out.join('')).toBe(
        `program:\n${PROGRAM}` +
          "Type name:\n\t'Ann'\n\t'Bob'\n\t'Cy'\n" +
          "Type verb:\n\t'met'\n"
      );
      expect(output.err).toEqual([]);
    });

    it('logs progress with --verbose', () => {
      const output = capture();
      runProgramFile(
        runArgs(['people.mixup', 'docs', '--verbose']),
        tempDir,
        output
      );
      expect(output.err).toEqual([
        'loaded 1 label operations\n',
        '[1/1] defSpanType\n',
      ]);
    });

    it('saves labels as operations', () => {
      const output = capture();
      runProgramFile(
        runArgs(['people.mixup', 'docs', 'out.labels']),
        tempDir,
        output
      );
      expect(
        fs.readFileSync(path.join(tempDir, 'out.labels'), 'utf-8')
      ).toBe(
        'addToType a.txt 0 3 name\n' +
          'addToType a.txt 8 3 name\n' +
          'addToType b.txt 3 2 name\n' +
          'addToType a.txt 4 3 verb\n'
      );
      expect(output.out.join('')).toBe(`program:\n${PROGRAM}`);
    });

    it('uses the tokenizer from the configuration', () => {
      fs.mkdirSync(path.join(tempDir, 'custom'));
      fs.writeFileSync(
        path.join(tempDir, 'custom', 'mixup.config.yaml'),
        "tokenPattern: '\\S+'\n"
      );
      fs.writeFileSync(
        path.join(tempDir, 'custom', 'words.mixup'),
        'defSpanType w = : ... [ any ] ...;\n'
      );
      fs.writeFileSync(path.join(tempDir, 'custom', 'doc.txt'), 'New-York city');
      const output = capture();
      runProgramFile(
        runArgs(['words.mixup', 'doc.txt']),
        path.join(tempDir, 'custom'),
        output
      );
      expect(output.out.join('')).toBe(
        'program:\ndefSpanType w = : ... [ any ] ...;\n' +
          "Type w:\n\t'New-York'\n\t'city'\n"
      );
    });

    it('propagates parse errors', () => {
      let caught: unknown;
      try {
        runProgramFile(runArgs(['bad.mixup']), tempDir, capture());
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(Error);
      if (!(caught instanceof Error)) return;
      expect(formatError(caught)).toBe(
        'Parse error at line 1, column 1: Unknown statement keyword: defFoo'
      );
    });

    it('reports a missing program file', () => {
      let caught: unknown;
      try {
        runProgramFile(runArgs(['missing.mixup']), tempDir, capture());
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ResourceNotFoundError);
      if (!(caught instanceof Error)) return;
      expect(formatError(caught)).toBe('File not found: missing.mixup');
    });
  });

  describe('formatError', () => {
    it('formats each error class', () => {
      expect(formatError(createError('MIXUP-R002', { level: 'x' }))).toBe(
        "Runtime error: no level 'x' defined"
      );
      expect(formatError(createError('MIXUP-R003', { resource: 'a' }))).toBe(
        "Annotator error: no annotator found in 'a'"
      );
      expect(
        formatError(
          createError(
            'MIXUP-L001',
            { quote: 'single' },
            { line: 2, column: 3, offset: 9 }
          )
        )
      ).toBe('Lexer error at line 2: Unterminated single-quoted literal');
      expect(formatError(new Error('plain'))).toBe('plain');
    });
  });

  describe('formatTypes', () => {
    it('lists each type with its instance texts', () => {
      const labels = labelsFor({ doc: 'Ann met Bob' });
      const [doc] = labels.base.textBase.documents();
      if (!doc) throw new Error('no document');
      labels.base.addToType(new Span(doc, 0, 3), 'all');
      labels.base.declareType('none');
      expect(formatTypes(labels.base)).toBe(
        "Type all:\n\t'Ann met Bob'\nType none:\n"
      );
    });
  });

  describe('main', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('prints the version from package.json', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      expect(main(['--version'])).toBe(0);
      expect(log).toHaveBeenCalledWith('0.3.0');
    });

    it('returns 1 and reports errors on stderr', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      expect(main(['--fast'])).toBe(1);
      expect(error).toHaveBeenCalledWith('Unknown option: --fast');
    });
  });
});
