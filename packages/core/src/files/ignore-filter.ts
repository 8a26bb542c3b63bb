import { readFileSync } from 'node:fs';
import { isAbsolute, join, relative, sep } from 'node:path';
import ignore from 'ignore';
import { ok, err, type Result } from 'neverthrow';
import { IoFailureError } from '../types/errors.js';

export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  'node_modules',
  '.git',
  '.sift',
  'dist',
  'build',
  'target',
  '__pycache__',
  '.cache',
];

const IGNORE_FILE_NAMES: readonly string[] = ['.gitignore', '.siftignore'];

/**
 * Returns true for scan-root-relative, `/`-separated paths that must not be
 * searched. Directories are passed with a trailing `/`.
 */
export type IgnoreFilter = (filePath: string) => boolean;

export interface IgnoreFilterOptions {
  /**
   * A directory at or above the scan root. Its ignore files apply too, as do
   * those of every directory between it and the scan root.
   */
  projectRoot?: string;
}

type Rules = ReturnType<typeof ignore>;

interface RuleLayer {
  /** From the directory holding the rules down to the scan root; empty at the scan root. */
  prefix: string;
  rules: Rules;
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

function readRules(path: string): Result<string, IoFailureError> {
  try {
    return ok(readFileSync(path, 'utf-8'));
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
      return ok('');
    }
    const message = error instanceof Error ? error.message : String(error);
    return err(new IoFailureError(path, message));
  }
}

/** Directories whose ignore files apply to a scan, outermost first. */
function ruleDirectories(scanRoot: string, projectRoot: string | undefined): string[] {
  if (projectRoot === undefined) {
    return [scanRoot];
  }
  const down = relative(projectRoot, scanRoot);
  if (down === '' || down.startsWith('..') || isAbsolute(down)) {
    return [scanRoot];
  }

  const dirs = [projectRoot];
  let current = projectRoot;
  for (const part of down.split(sep)) {
    current = join(current, part);
    dirs.push(current);
  }
  return dirs;
}

/**
 * Builds the ignore filter for a scan from the built-in directory list,
 * `extraPatterns` (such as `search.exclude`), and every `.gitignore` and
 * `.siftignore` between the project root and the scan root. Each file's
 * patterns are anchored at the directory that holds it.
 */
export function createIgnoreFilter(
  scanRoot: string,
  extraPatterns: readonly string[] = [],
  options: IgnoreFilterOptions = {},
): Result<IgnoreFilter, IoFailureError> {
  const layers: RuleLayer[] = [];

  for (const [depth, dir] of ruleDirectories(scanRoot, options.projectRoot).entries()) {
    const rules = ignore();
    if (depth === 0) {
      rules.add([...DEFAULT_IGNORE_PATTERNS, ...extraPatterns]);
    }
    for (const name of IGNORE_FILE_NAMES) {
      const content = readRules(join(dir, name));
      if (content.isErr()) {
        return err(content.error);
      }
      rules.add(content.value);
    }
    layers.push({ prefix: toPosix(relative(dir, scanRoot)), rules });
  }

  return ok((filePath) =>
    layers.some(({ prefix, rules }) => rules.ignores(prefix === '' ? filePath : `${prefix}/${filePath}`)),
  );
}
