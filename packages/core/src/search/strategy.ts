import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import pLimit from 'p-limit';
import type { Logger } from '../logging/logger.js';
import type {
  MatchType,
  ResourceRequirements,
  SearchOptions,
  SearchResult,
  SearchTarget,
  StrategyName,
} from '../types/index.js';
import { SearchAbortedError, type SearchError } from '../types/errors.js';
import { isAbortError, throwIfAborted } from '../utils/abort.js';

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

/**
 * One way of matching a query against file content. Zero matches is
 * `ok([])`; only failures that make the whole search meaningless are errors.
 */
export interface SearchStrategy {
  readonly name: StrategyName;
  search(
    query: string,
    target: SearchTarget,
    options: SearchOptions,
  ): Promise<Result<SearchResult[], SearchError>>;
  requiredResources(): ResourceRequirements;
}

export type StrategyRegistry = ReadonlyMap<StrategyName, SearchStrategy>;

// ---------------------------------------------------------------------------
// Line scanning shared by the traversal-backed strategies
// ---------------------------------------------------------------------------

export interface LineMatch {
  score: number;
  matchType: MatchType;
  /** Offsets into the trimmed line. */
  startChar: number;
  endChar: number;
}

/** Scores one trimmed, non-empty line, or returns undefined for no match. */
export type LineScorer = (line: string) => LineMatch | undefined;

export interface LineScanContext {
  logger: Logger;
  /** Files read at once. */
  concurrency: number;
}

export const DEFAULT_READ_CONCURRENCY = 8;

export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

/**
 * Reads every target file and scores it line by line. Unreadable files are
 * logged and skipped. Results keep file order, then line order.
 */
export async function scanLines(
  target: SearchTarget,
  options: SearchOptions,
  scorer: LineScorer,
  context: LineScanContext,
): Promise<Result<SearchResult[], SearchAbortedError>> {
  const limit = pLimit(Math.max(1, context.concurrency));

  const scanFile = async (filePath: string): Promise<SearchResult[]> => {
    throwIfAborted(options.signal, 'Search cancelled');

    let content: string;
    try {
      content = await readFile(join(target.root, filePath), 'utf-8');
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      context.logger.warn('Skipping unreadable file', { filePath, error: message });
      return [];
    }

    const results: SearchResult[] = [];
    const lines = splitLines(content);
    for (let i = 0; i < lines.length; i++) {
      const line = (lines[i] ?? '').trim();
      if (line.length === 0) {
        continue;
      }
      const match = scorer(line);
      if (match && match.score >= options.minScore) {
        results.push({
          filePath,
          lineNumber: i + 1,
          content: line,
          score: match.score,
          matchType: match.matchType,
          startChar: match.startChar,
          endChar: match.endChar,
        });
      }
    }
    return results;
  };

  try {
    const perFile = await Promise.all(target.files.map((file) => limit(() => scanFile(file))));
    return ok(perFile.flat());
  } catch (error: unknown) {
    if (isAbortError(error)) {
      return err(error instanceof SearchAbortedError ? error : new SearchAbortedError('Search cancelled'));
    }
    throw error;
  }
}

export function clampScore(score: number): number {
  return Math.min(1, Math.max(0, score));
}
