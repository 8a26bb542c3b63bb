import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '../logging/logger.js';
import type { SearchResult } from '../types/index.js';
import { splitLines } from './strategy.js';

/**
 * Attaches up to `contextLines` trimmed lines before and after each result.
 * Each file is read once; results from files that can no longer be read
 * are returned without context.
 */
export async function attachContext(
  results: readonly SearchResult[],
  root: string,
  contextLines: number,
  logger: Logger,
): Promise<SearchResult[]> {
  if (contextLines <= 0 || results.length === 0) {
    return [...results];
  }

  const files = new Map<string, string[] | undefined>();
  for (const { filePath } of results) {
    if (files.has(filePath)) {
      continue;
    }
    try {
      files.set(filePath, splitLines(await readFile(join(root, filePath), 'utf-8')));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug('No context for unreadable file', { filePath, error: message });
      files.set(filePath, undefined);
    }
  }

  return results.map((result) => {
    const lines = files.get(result.filePath);
    if (!lines) {
      return result;
    }
    const index = result.lineNumber - 1;
    return {
      ...result,
      contextBefore: lines.slice(Math.max(0, index - contextLines), index).map((l) => l.trim()),
      contextAfter: lines.slice(index + 1, index + 1 + contextLines).map((l) => l.trim()),
    };
  });
}
