/**
 * Resource Resolution
 *
 * Finds the files a program refers to by name: word lists, phrase lists,
 * fallback programs for `require`, and annotator programs. Lookup order:
 * the name as given (absolute, or relative to the working directory), the
 * program's own directory, then each configured search path.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export interface ResourceResolver {
  /** Absolute path of the resource, or null when it cannot be found */
  resolve(name: string): string | null;
  /** Whole resource text; throws when it cannot be found or read */
  readText(name: string): string;
  /** Resource lines with trailing newline characters removed */
  readLines(name: string): string[];
  /** Resolver for resources referenced from `file` (its directory first) */
  relativeTo(file: string): ResourceResolver;
}

export interface ResolverOptions {
  /** Directory searched right after the name as given */
  baseDir?: string | undefined;
  /** Further directories, searched in order */
  searchPaths?: readonly string[] | undefined;
  /** Defaults to process.cwd() */
  cwd?: string | undefined;
}

/** Error thrown when a resource is not found anywhere on the search path */
export class ResourceNotFoundError extends Error {
  readonly code = 'ENOENT';
  readonly resource: string;

  constructor(resource: string, searched: readonly string[]) {
    super(
      `No file named '${resource}' found (searched: ${searched.join(', ') || 'nothing'})`
    );
    this.name = 'ResourceNotFoundError';
    this.resource = resource;
  }
}

export function createResourceResolver(
  options: ResolverOptions = {}
): ResourceResolver {
  const cwd = options.cwd ?? process.cwd();
  const searchPaths = options.searchPaths ?? [];

  const candidates = (name: string): string[] => {
    if (path.isAbsolute(name)) return [name];
    const dirs = [cwd];
    if (options.baseDir !== undefined) dirs.push(options.baseDir);
    dirs.push(...searchPaths.map((dir) => path.resolve(cwd, dir)));
    return dirs.map((dir) => path.resolve(dir, name));
  };

  const resolve = (name: string): string | null => {
    for (const candidate of candidates(name)) {
      if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
        return candidate;
      }
    }
    return null;
  };

  const readText = (name: string): string => {
    const file = resolve(name);
    if (file === null) {
      throw new ResourceNotFoundError(name, candidates(name));
    }
    return fs.readFileSync(file, 'utf-8');
  };

  return {
    resolve,
    readText,
    readLines: (name) => readText(name).split(/\r?\n/),
    relativeTo: (file) =>
      createResourceResolver({
        ...options,
        cwd,
        baseDir: path.dirname(path.resolve(cwd, file)),
      }),
  };
}
