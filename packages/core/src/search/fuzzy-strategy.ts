import type { Result } from 'neverthrow';
import type {
  ResourceRequirements,
  SearchOptions,
  SearchResult,
  SearchTarget,
} from '../types/index.js';
import type { SearchError } from '../types/errors.js';
import { tokenize } from '../text/tokenizer.js';
import { boundedSimilarity, subsequenceScore } from './edit-distance.js';
import {
  clampScore,
  scanLines,
  type LineMatch,
  type LineScanContext,
  type SearchStrategy,
} from './strategy.js';

export const MAX_EDIT_DISTANCE = 4;

/** Lines longer than this skip the sliding-window comparison. */
const MAX_WINDOW_LINE_LENGTH = 1000;
const MIN_TOKEN_SCORE = 0.1;

const WEIGHTS = {
  subsequence: 0.4,
  token: 0.3,
  window: 0.2,
  substring: 0.3,
} as const;

function tokenSimilarity(queryTokens: readonly string[], lineTokens: readonly string[]): number {
  if (queryTokens.length === 0) {
    return 0;
  }
  let total = 0;
  for (const queryToken of queryTokens) {
    let best = 0;
    for (const lineToken of lineTokens) {
      best = Math.max(
        best,
        subsequenceScore(queryToken, lineToken),
        boundedSimilarity(queryToken, lineToken, MAX_EDIT_DISTANCE),
      );
    }
    if (best > MIN_TOKEN_SCORE) {
      total += best;
    }
  }
  return total / queryTokens.length;
}

interface WindowMatch {
  score: number;
  start: number;
  end: number;
}

function bestWindow(query: string, line: string): WindowMatch {
  let best: WindowMatch = { score: 0, start: 0, end: 0 };
  if (line.length > MAX_WINDOW_LINE_LENGTH) {
    return best;
  }
  for (let size = query.length; size <= query.length + 2; size++) {
    for (let start = 0; start + size <= line.length; start++) {
      const score = boundedSimilarity(query, line.slice(start, start + size), MAX_EDIT_DISTANCE);
      if (score > best.score) {
        best = { score, start, end: start + size };
      }
    }
  }
  return best;
}

/**
 * Scores one line against a query that may contain typos: a blend of
 * in-order character coverage, per-term edit similarity and the best
 * similarly sized window of the line, with a bonus for a literal hit.
 */
export function scoreFuzzyLine(
  query: string,
  line: string,
  options: Pick<SearchOptions, 'caseSensitive'>,
): LineMatch | undefined {
  const needle = options.caseSensitive ? query.trim() : query.trim().toLowerCase();
  const haystack = options.caseSensitive ? line : line.toLowerCase();
  if (needle.length === 0) {
    return undefined;
  }

  const at = haystack.indexOf(needle);
  const window: WindowMatch =
    at !== -1 ? { score: 1, start: at, end: at + needle.length } : bestWindow(needle, haystack);

  const score = clampScore(
    WEIGHTS.subsequence * subsequenceScore(needle, haystack) +
      WEIGHTS.token *
        tokenSimilarity(
          tokenize(query, { caseSensitive: options.caseSensitive }),
          tokenize(line, { caseSensitive: options.caseSensitive }),
        ) +
      WEIGHTS.window * window.score +
      (at !== -1 ? WEIGHTS.substring : 0),
  );

  if (score === 0) {
    return undefined;
  }
  return window.score > 0
    ? { score, matchType: 'fuzzy', startChar: window.start, endChar: window.end }
    : { score, matchType: 'fuzzy', startChar: 0, endChar: line.length };
}

/** Approximate matching that tolerates typos up to four edits. */
export class FuzzyStrategy implements SearchStrategy {
  readonly name = 'fuzzy';
  private readonly context: LineScanContext;

  constructor(context: LineScanContext) {
    this.context = context;
  }

  search(
    query: string,
    target: SearchTarget,
    options: SearchOptions,
  ): Promise<Result<SearchResult[], SearchError>> {
    return scanLines(target, options, (line) => scoreFuzzyLine(query, line, options), this.context);
  }

  requiredResources(): ResourceRequirements {
    return { minMemoryMb: 20, requiresMl: false, requiresIndex: false, cpuIntensive: true };
  }
}
