import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Result } from 'neverthrow';
import type { Logger } from '../logging/logger.js';
import type { IndexUnavailableError } from '../types/errors.js';
import { EmbeddingIndex } from './embedding-index.js';
import { TermIndex } from './term-index.js';

export const TERM_INDEX_FILE = 'tfidf-index.json';
export const EMBEDDING_INDEX_FILE = 'embeddings.json';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function loadIndex<T>(
  filePath: string,
  deserialize: (json: string) => Result<T, IndexUnavailableError>,
  logger: Logger,
): Promise<T | undefined> {
  let json: string;
  try {
    json = await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (!isNotFound(error)) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Could not read index, ignoring it', { filePath, error: message });
    }
    return undefined;
  }

  const result = deserialize(json);
  if (result.isErr()) {
    logger.warn('Ignoring corrupt index', { filePath, error: result.error.message });
    return undefined;
  }
  return result.value;
}

/** The term index under `storageDir`, or undefined when absent or unreadable. */
export function loadTermIndex(storageDir: string, logger: Logger): Promise<TermIndex | undefined> {
  return loadIndex(join(storageDir, TERM_INDEX_FILE), (json) => TermIndex.deserialize(json), logger);
}

export function loadEmbeddingIndex(
  storageDir: string,
  logger: Logger,
): Promise<EmbeddingIndex | undefined> {
  return loadIndex(
    join(storageDir, EMBEDDING_INDEX_FILE),
    (json) => EmbeddingIndex.deserialize(json),
    logger,
  );
}

export async function saveTermIndex(storageDir: string, index: TermIndex): Promise<string> {
  await mkdir(storageDir, { recursive: true });
  const filePath = join(storageDir, TERM_INDEX_FILE);
  await writeFile(filePath, index.serialize(), 'utf-8');
  return filePath;
}

export async function saveEmbeddingIndex(storageDir: string, index: EmbeddingIndex): Promise<string> {
  await mkdir(storageDir, { recursive: true });
  const filePath = join(storageDir, EMBEDDING_INDEX_FILE);
  await writeFile(filePath, index.serialize(), 'utf-8');
  return filePath;
}
