#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements main(), parseArgs() and runProgramFile() for the mixup binary.
 * Parses a program, optionally applies it to a file or directory of
 * documents, and prints or saves the resulting labels.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig } from './config.js';
import { formatError, formatTypes } from './cli-shared.js';
import { loadOps, MultiLevelLabels, saveTypesAsOps } from './labels/index.js';
import { loadProgram } from './parser/index.js';
import { createResourceResolver } from './resources.js';
import { createEvaluationContext, evaluate } from './runtime/index.js';
import { loadTexts } from './text/loader.js';
import { Tokenizer } from './text/tokenizer.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'run';
      program: string;
      text?: string | undefined;
      out?: string | undefined;
      verbose: boolean;
      config?: string | undefined;
    }
  | { mode: 'help' | 'version' };

const USAGE = `Usage:
  mixup <program.mixup> [text|directory] [outFile]
  mixup --help                     Show this help message
  mixup --version                  Show version information

Options:
  --verbose                        Log annotator loads and each statement
  --config <file>                  Read settings from <file> instead of
                                   ./mixup.config.yaml

With a text file or directory the program is applied to the documents
(and to the labels in any *.labels files of the directory). Labels are
printed, or saved as label operations to outFile.`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const positional: string[] = [];
  let verbose = false;
  let config: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--verbose') {
      verbose = true;
    } else if (arg === '--config') {
      config = argv[i + 1];
      if (config === undefined) {
        throw new Error('Missing file after --config');
      }
      i++;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [program, text, out, ...extra] = positional;
  if (program === undefined) {
    throw new Error('Missing program file argument');
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected argument: ${extra[0] ?? ''}`);
  }

  return { mode: 'run', program, text, out, verbose, config };
}

/** Where CLI output goes; tests capture it */
export interface CliOutput {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processOutput: CliOutput = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Parse a program file and, with a text path, evaluate it.
 *
 * @returns The label store when documents were labeled
 * @throws Error on configuration, parse, or evaluation failure
 */
export function runProgramFile(
  args: Extract<ParsedArgs, { mode: 'run' }>,
  cwd: string = process.cwd(),
  output: CliOutput = processOutput
): MultiLevelLabels | null {
  const config = loadConfig(cwd, args.config);
  const verbose = args.verbose || config.verbose;
  const log = (message: string): void => {
    if (verbose) output.stderr(`${message}\n`);
  };

  const resolver = createResourceResolver({
    cwd,
    searchPaths: config.searchPaths,
  });
  const tokenizer = new Tokenizer(config.tokenPattern);

  const program = loadProgram(args.program, { resolver, tokenizer });
  output.stdout(`program:\n${program.toString()}`);

  if (args.text === undefined) return null;

  const { textBase, labelFiles } = loadTexts(
    path.resolve(cwd, args.text),
    tokenizer
  );
  const labels = new MultiLevelLabels(textBase);
  for (const ops of labelFiles) {
    const count = loadOps(ops, labels.base);
    log(`loaded ${count} label operations`);
  }

  const programFile = resolver.resolve(args.program) ?? args.program;
  const context = createEvaluationContext(labels, {
    resolver: resolver.relativeTo(programFile),
    tokenizer,
    callbacks: { onLog: log },
    observability: {
      onStepStart: ({ index, total, statement }) =>
        log(`[${index + 1}/${total}] ${statement.keyword}`),
    },
  });
  evaluate(program, context);

  const result = labels.level(context.currentLevel);
  if (args.out !== undefined) {
    fs.writeFileSync(path.resolve(cwd, args.out), saveTypesAsOps(result));
    log(`saved labels to ${args.out}`);
  } else {
    output.stdout(formatTypes(result));
  }
  return labels;
}

/** Version from package.json next to the sources (or the build output) */
function readVersion(): string {
  const packageJsonPath = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '../package.json'
  );
  try {
    const packageJson: unknown = JSON.parse(
      fs.readFileSync(packageJsonPath, 'utf-8')
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (err) {
    console.error(
      formatError(err instanceof Error ? err : new Error(String(err)))
    );
  }
  return '0.0.0';
}

/**
 * Entry point for the mixup binary
 *
 * Writes results to stdout and errors to stderr.
 * Sets exit code 1 on any error.
 */
export function main(argv: string[] = process.argv.slice(2)): number {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return 0;

      case 'version':
        console.log(readVersion());
        return 0;

      case 'run':
        runProgramFile(parsed);
        return 0;
    }
  } catch (err) {
    console.error(
      formatError(err instanceof Error ? err : new Error(String(err)))
    );
    return 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  process.exitCode = main();
}
