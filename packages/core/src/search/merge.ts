import type { SearchResult } from '../types/index.js';

function resultKey(result: Pick<SearchResult, 'filePath' | 'lineNumber'>): string {
  return `${result.filePath}\u0000${result.lineNumber}`;
}

/** Score descending, then path and line ascending. */
export function compareResults(a: SearchResult, b: SearchResult): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.filePath !== b.filePath) {
    return a.filePath < b.filePath ? -1 : 1;
  }
  return a.lineNumber - b.lineNumber;
}

/**
 * Concatenates result lists, orders them, keeps the best-scoring result for
 * each (file, line) and truncates to `maxResults`. Merging a merged list
 * returns it unchanged.
 */
export function mergeResults(
  lists: readonly (readonly SearchResult[])[],
  maxResults: number,
): SearchResult[] {
  const sorted = lists.flat().sort(compareResults);

  const seen = new Set<string>();
  const merged: SearchResult[] = [];
  for (const result of sorted) {
    const key = resultKey(result);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    merged.push(result);
    if (merged.length >= maxResults) {
      break;
    }
  }
  return merged;
}

export interface WeightedResults {
  results: readonly SearchResult[];
  weight: number;
}

/**
 * Linear fusion of hybrid plan steps: each result is scaled by its step
 * weight and scores for the same line are summed, capped at 1. A line found
 * by more than one step becomes a `hybrid` match.
 */
export function fuseWeighted(steps: readonly WeightedResults[]): SearchResult[] {
  const fused = new Map<string, { result: SearchResult; best: number }>();

  for (const { results, weight } of steps) {
    for (const result of results) {
      const weighted = result.score * weight;
      const key = resultKey(result);
      const existing = fused.get(key);
      if (!existing) {
        fused.set(key, { result: { ...result, score: weighted }, best: weighted });
        continue;
      }
      const score = existing.result.score + weighted;
      // Offsets follow the strongest contribution.
      const base = weighted > existing.best ? result : existing.result;
      existing.result = { ...base, score, matchType: 'hybrid' };
      existing.best = Math.max(existing.best, weighted);
    }
  }

  return [...fused.values()].map(({ result }) => ({ ...result, score: Math.min(1, result.score) }));
}
