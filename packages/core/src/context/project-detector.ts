import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { ProjectProfile, ProjectType } from '../types/index.js';

/** Marker files checked in order; the first present decides the type. */
const PROJECT_MARKERS: ReadonlyArray<{ file: string; type: ProjectType }> = [
  { file: 'Cargo.toml', type: 'rust' },
  { file: 'package.json', type: 'javascript' },
  { file: 'requirements.txt', type: 'python' },
  { file: 'pyproject.toml', type: 'python' },
];

const SKIPPED_DIRECTORIES: ReadonlySet<string> = new Set([
  'node_modules',
  'target',
  '__pycache__',
  'vendor',
  'dist',
  'build',
]);

const MAX_DEPTH = 50;
/** Share of `.md` files at which an unmarked tree counts as documentation. */
const DOCUMENTATION_SHARE = 0.7;
/** An extension this common counts towards a mixed project. */
const SIGNIFICANT_COUNT = 3;

const COMMON_IGNORES = ['.git/', '.svn/', '.hg/', '.DS_Store', 'Thumbs.db'];

export const PROJECT_PROFILES: Readonly<Record<ProjectType, ProjectProfile>> = {
  rust: {
    filePatterns: ['*.rs'],
    ignorePatterns: [...COMMON_IGNORES, 'target/', 'Cargo.lock', '.cargo/'],
  },
  javascript: {
    filePatterns: ['*.js', '*.ts'],
    ignorePatterns: [
      ...COMMON_IGNORES,
      'node_modules/',
      'dist/',
      'build/',
      'coverage/',
      'package-lock.json',
      'yarn.lock',
    ],
  },
  python: {
    filePatterns: ['*.py'],
    ignorePatterns: [
      ...COMMON_IGNORES,
      '__pycache__/',
      '*.pyc',
      '.pytest_cache/',
      'venv/',
      '.venv/',
      'env/',
      '.env/',
      'pip-log.txt',
    ],
  },
  documentation: {
    filePatterns: ['*.md', '*.txt'],
    ignorePatterns: COMMON_IGNORES,
  },
  mixed: {
    filePatterns: [],
    ignorePatterns: [...COMMON_IGNORES, 'target/', 'node_modules/', '__pycache__/', 'dist/', 'build/'],
  },
  unknown: {
    filePatterns: [],
    ignorePatterns: COMMON_IGNORES,
  },
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Guesses what kind of project a directory holds: first from marker files
 * at its top level, then from the extensions of the files beneath it.
 */
export class ProjectDetector {
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  async detect(rootDir: string): Promise<ProjectType> {
    for (const { file, type } of PROJECT_MARKERS) {
      if (await this.isFile(join(rootDir, file))) {
        return type;
      }
    }

    const counts = await this.countExtensions(rootDir);
    const total = [...counts.values()].reduce((sum, n) => sum + n, 0);
    if (total === 0) {
      return 'unknown';
    }
    if ((counts.get('md') ?? 0) / total >= DOCUMENTATION_SHARE) {
      return 'documentation';
    }
    const significant = [...counts.values()].filter((n) => n >= SIGNIFICANT_COUNT).length;
    return significant >= 2 ? 'mixed' : 'unknown';
  }

  /**
   * Lowercase extension (without the dot) → number of files. Hidden entries
   * and build output directories are skipped, as are directories that
   * cannot be read.
   */
  async countExtensions(rootDir: string): Promise<Map<string, number>> {
    const counts = new Map<string, number>();
    const pending: Array<{ dir: string; depth: number }> = [{ dir: rootDir, depth: 0 }];

    for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
      const { dir, depth } = next;
      let entries: Dirent[];
      try {
        entries = await readdir(dir, { withFileTypes: true });
      } catch (error: unknown) {
        this.logger.debug('Skipping unreadable directory', { dir, error: errorMessage(error) });
        continue;
      }

      for (const entry of entries) {
        if (entry.name.startsWith('.')) {
          continue;
        }
        if (entry.isDirectory()) {
          if (depth < MAX_DEPTH && !SKIPPED_DIRECTORIES.has(entry.name)) {
            pending.push({ dir: join(dir, entry.name), depth: depth + 1 });
          }
        } else if (entry.isFile()) {
          const ext = extname(entry.name).slice(1).toLowerCase();
          if (ext !== '') {
            counts.set(ext, (counts.get(ext) ?? 0) + 1);
          }
        }
      }
    }
    return counts;
  }

  private async isFile(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isFile();
    } catch (error: unknown) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        this.logger.debug('Cannot check project marker', { path, error: errorMessage(error) });
      }
      return false;
    }
  }
}
