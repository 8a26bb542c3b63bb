import { stat } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  CapabilityDetector,
  createDefaultSystemProbe,
  type SystemProbe,
} from './capability/capability-detector.js';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG, loadConfig } from './config/config-parser.js';
import { PROJECT_PROFILES, ProjectDetector } from './context/project-detector.js';
import { OllamaEmbeddingProvider } from './embedding/ollama-embedding-provider.js';
import { TERM_INDEX_FILE, loadEmbeddingIndex, loadTermIndex } from './index/index-store.js';
import { createLogger, type Logger } from './logging/logger.js';
import { SearchEngine } from './search/search-engine.js';
import type { NeuralCapability, ProjectType, SearchOptions } from './types/index.js';
import type { LogLevel, SiftConfig } from './types/config.js';

/** Everything needed at query time, detected and loaded once. */
export interface SiftRuntime {
  readonly rootDir: string;
  readonly storagePath: string;
  readonly config: SiftConfig;
  readonly logger: Logger;
  readonly detector: CapabilityDetector;
  readonly capability: NeuralCapability;
  readonly embeddingProvider: OllamaEmbeddingProvider;
  readonly engine: SearchEngine;
  readonly projectType: ProjectType;
  /**
   * Ignore patterns for directory walks: `search.exclude`, plus the project
   * profile's ignores under `search.projectScope`.
   */
  readonly excludePatterns: readonly string[];
  /** Search options taken from the `search` config section. */
  readonly defaultSearchOptions: Partial<SearchOptions>;
}

export interface RuntimeOptions {
  /** Project root; `.sift.yaml` and the storage directory live here. */
  rootDir: string;
  /** Overrides `logging.level` from the config. */
  logLevel?: LogLevel;
  logger?: Logger;
  probe?: SystemProbe;
}

export class RuntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeError';
  }
}

/** The storage directory for a root, or undefined when it escapes the root. */
export function resolveStoragePath(rootDir: string, storage: string): string | undefined {
  const root = resolve(rootDir);
  const storagePath = resolve(root, storage);
  const rel = relative(root, storagePath);
  if (rel.startsWith('..') || isAbsolute(rel)) {
    return undefined;
  }
  return storagePath;
}

async function pathKind(path: string): Promise<'file' | 'directory' | undefined> {
  try {
    const info = await stat(path);
    return info.isDirectory() ? 'directory' : 'file';
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return undefined;
    }
    throw error;
  }
}

/**
 * The project root for a search path: the nearest directory at or above it
 * holding `.sift.yaml` or a built TF-IDF index in the default storage
 * directory. Falls back to the path itself, or its parent when it names a
 * file. A bare `.sift` directory is not a marker: `~/.sift` holds models.
 */
export async function findProjectRoot(searchPath: string): Promise<string> {
  const start = resolve(searchPath);
  const origin = (await pathKind(start)) === 'file' ? dirname(start) : start;

  let dir = origin;
  for (;;) {
    if (
      (await pathKind(join(dir, CONFIG_FILE_NAME))) === 'file' ||
      (await pathKind(join(dir, DEFAULT_CONFIG.storage.path, TERM_INDEX_FILE))) === 'file'
    ) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return origin;
    }
    dir = parent;
  }
}

/**
 * Loads config and indexes, detects the neural capability and wires the
 * search engine.
 */
export async function createRuntime(options: RuntimeOptions): Promise<Result<SiftRuntime, RuntimeError>> {
  const rootDir = resolve(options.rootDir);

  const configResult = await loadConfig(rootDir);
  if (configResult.isErr()) {
    return err(new RuntimeError(`Config load failed: ${configResult.error.message}`));
  }
  const config = configResult.value;

  const logger =
    options.logger ?? createLogger({ level: options.logLevel ?? config.logging.level, component: 'sift' });

  const storagePath = resolveStoragePath(rootDir, config.storage.path);
  if (storagePath === undefined) {
    return err(new RuntimeError('Storage path escapes project root'));
  }

  const detector = new CapabilityDetector(
    {
      runtimeLibraries: config.capability.runtimeLibraries,
      modelPath: config.capability.modelPath,
      minMemoryMb: config.capability.minMemoryMb,
    },
    options.probe ?? createDefaultSystemProbe(),
  );
  const capability = detector.detect();
  const details = detector.capabilityDetails();
  logger.debug('Neural capability detected', { status: capability.status });

  const [termIndex, embeddingIndex] = await Promise.all([
    loadTermIndex(storagePath, logger),
    loadEmbeddingIndex(storagePath, logger),
  ]);

  const projectType = await new ProjectDetector(logger).detect(rootDir);
  const profile = PROJECT_PROFILES[projectType];
  const scoped = config.search.projectScope;
  logger.debug('Project type detected', { projectType, scoped });
  const excludePatterns = scoped ? [...config.search.exclude, ...profile.ignorePatterns] : config.search.exclude;

  const embeddingProvider = new OllamaEmbeddingProvider({
    baseUrl: config.embedding.baseUrl,
    model: config.embedding.model,
    dimensions: config.embedding.dimensions,
    timeout: config.embedding.timeout,
  });

  const engine = new SearchEngine({
    capability,
    details,
    termIndex,
    embeddingIndex,
    embeddingProvider,
    indexRoot: rootDir,
    projectType,
    logger: logger.child({ component: 'search' }),
    config: {
      qualityGate: config.search.qualityGate,
      concurrency: config.search.concurrency,
      exclude: excludePatterns,
    },
  });

  return ok({
    rootDir,
    storagePath,
    config,
    logger,
    detector,
    capability,
    embeddingProvider,
    engine,
    projectType,
    excludePatterns,
    defaultSearchOptions: {
      minScore: config.search.minScore,
      maxResults: config.search.maxResults,
      contextLines: config.search.contextLines,
      ...(scoped && profile.filePatterns.length > 0 ? { include: profile.filePatterns } : {}),
    },
  });
}
