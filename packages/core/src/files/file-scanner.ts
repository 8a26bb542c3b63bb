import { readdir, stat } from 'node:fs/promises';
import { basename, dirname, extname, join, relative, resolve, sep } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import picomatch from 'picomatch';
import type { SearchTarget } from '../types/index.js';
import { IoFailureError, SearchAbortedError } from '../types/errors.js';
import { isAbortError, throwIfAborted } from '../utils/abort.js';
import { createIgnoreFilter, type IgnoreFilter } from './ignore-filter.js';

/** Extensions whose content is never line-searchable text. */
export const BINARY_EXTENSIONS: ReadonlySet<string> = new Set([
  '.exe', '.dll', '.so', '.dylib', '.bin', '.obj', '.o', '.a', '.lib',
  '.zip', '.tar', '.gz', '.bz2', '.7z', '.rar', '.jar', '.class', '.pyc', '.wasm',
  '.jpg', '.jpeg', '.png', '.gif', '.bmp', '.tiff', '.ico', '.webp',
  '.mp3', '.mp4', '.avi', '.mov', '.wav', '.flac', '.pdf',
  '.woff', '.woff2', '.ttf',
]);

export interface ScanOptions {
  /** Globs a file must match (any of). Empty means every file. */
  include?: readonly string[];
  exclude?: readonly string[];
  signal?: AbortSignal;
}

export type ScanError = IoFailureError | SearchAbortedError;

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

type Matcher = (path: string) => boolean;

function compileGlobs(patterns: readonly string[] | undefined): Matcher | undefined {
  if (!patterns || patterns.length === 0) {
    return undefined;
  }
  const isMatch = picomatch([...patterns], { dot: true });
  // `*.rs` should match `src/main.rs` as well as `main.rs`.
  return (path) => isMatch(path) || isMatch(basename(path));
}

export function isBinaryPath(filePath: string): boolean {
  return BINARY_EXTENSIONS.has(extname(filePath).toLowerCase());
}

/**
 * Walks a directory tree and lists the searchable files, as root-relative
 * `/`-separated paths in sorted order.
 */
export class FileScanner {
  private readonly rootDir: string;
  private readonly ignoreFilter: IgnoreFilter;

  constructor(rootDir: string, ignoreFilter: IgnoreFilter) {
    this.rootDir = rootDir;
    this.ignoreFilter = ignoreFilter;
  }

  async listFiles(options: ScanOptions = {}): Promise<Result<string[], ScanError>> {
    const include = compileGlobs(options.include);
    const exclude = compileGlobs(options.exclude);
    const files: string[] = [];

    try {
      await this.walkDirectory(this.rootDir, files, options.signal);
    } catch (error: unknown) {
      if (isAbortError(error)) {
        return err(error instanceof SearchAbortedError ? error : new SearchAbortedError('Scan cancelled'));
      }
      const message = error instanceof Error ? error.message : String(error);
      return err(new IoFailureError(this.rootDir, message));
    }

    return ok(
      files.filter((file) => (!include || include(file)) && !(exclude && exclude(file))).sort(),
    );
  }

  private async walkDirectory(dir: string, accumulator: string[], signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal, 'Scan cancelled');
    const entries = await readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      const relativePath = toPosix(relative(this.rootDir, fullPath));

      if (this.ignoreFilter(relativePath)) {
        continue;
      }

      if (entry.isDirectory()) {
        if (this.ignoreFilter(relativePath + '/')) {
          continue;
        }
        await this.walkDirectory(fullPath, accumulator, signal);
      } else if (entry.isFile() && !isBinaryPath(entry.name)) {
        accumulator.push(relativePath);
      }
    }
  }
}

export interface ResolveTargetOptions extends ScanOptions {
  ignorePatterns?: readonly string[];
  /** Ignore files from here down to the searched directory apply. */
  projectRoot?: string;
}

/**
 * Turns a user-supplied path into the set of files to search. A directory
 * is walked with ignore rules applied; a single file is searched as is.
 */
export async function resolveSearchTarget(
  path: string,
  options: ResolveTargetOptions = {},
): Promise<Result<SearchTarget, ScanError>> {
  const absolute = resolve(path);

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(absolute)).isDirectory();
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new IoFailureError(absolute, message));
  }

  if (!isDirectory) {
    return ok({ root: dirname(absolute), files: [basename(absolute)] });
  }

  const filter = createIgnoreFilter(absolute, options.ignorePatterns, { projectRoot: options.projectRoot });
  if (filter.isErr()) {
    return err(filter.error);
  }
  const scanner = new FileScanner(absolute, filter.value);
  const files = await scanner.listFiles(options);
  return files.map((list) => ({ root: absolute, files: list }));
}
