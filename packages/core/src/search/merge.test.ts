import { describe, it, expect } from 'vitest';
import type { SearchResult } from '../types/index.js';
import { compareResults, fuseWeighted, mergeResults } from './merge.js';

function result(filePath: string, lineNumber: number, score: number, overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    filePath,
    lineNumber,
    content: `line ${lineNumber}`,
    score,
    matchType: 'keyword',
    startChar: 0,
    endChar: 4,
    ...overrides,
  };
}

describe('mergeResults', () => {
  const keyword = [result('b.ts', 3, 0.9), result('a.ts', 1, 0.5), result('a.ts', 2, 0.9)];
  const fuzzy = [result('a.ts', 1, 0.7, { matchType: 'fuzzy' }), result('c.ts', 9, 0.4, { matchType: 'fuzzy' })];

  it('should order by score, then path, then line', () => {
    const merged = mergeResults([keyword, fuzzy], 10);
    expect(merged.map((r) => `${r.filePath}:${r.lineNumber}`)).toEqual([
      'a.ts:2',
      'b.ts:3',
      'a.ts:1',
      'c.ts:9',
    ]);
  });

  it('should keep only the highest-scoring result per line', () => {
    const merged = mergeResults([keyword, fuzzy], 10);
    const line1 = merged.filter((r) => r.filePath === 'a.ts' && r.lineNumber === 1);
    expect(line1).toHaveLength(1);
    expect(line1[0]?.score).toBe(0.7);
    expect(line1[0]?.matchType).toBe('fuzzy');
  });

  it('should drop duplicates that are not adjacent after sorting', () => {
    const lists = [[result('a.ts', 1, 0.9), result('b.ts', 1, 0.8)], [result('a.ts', 1, 0.3)]];
    expect(mergeResults(lists, 10)).toHaveLength(2);
  });

  it('should truncate to maxResults', () => {
    expect(mergeResults([keyword, fuzzy], 2)).toHaveLength(2);
    expect(mergeResults([keyword], 0)).toEqual([]);
  });

  it('should be idempotent', () => {
    const once = mergeResults([keyword, fuzzy], 3);
    expect(mergeResults([once], 3)).toEqual(once);
  });

  it('should keep every merged result unique and ordered', () => {
    const merged = mergeResults([keyword, fuzzy, keyword], 100);
    const keys = merged.map((r) => `${r.filePath}:${r.lineNumber}`);
    expect(new Set(keys).size).toBe(keys.length);
    for (let i = 1; i < merged.length; i++) {
      expect(compareResults(merged[i - 1]!, merged[i]!)).toBeLessThanOrEqual(0);
    }
  });
});

describe('fuseWeighted', () => {
  it('should sum weighted scores for lines found by several steps', () => {
    const fused = fuseWeighted([
      { results: [result('a.ts', 1, 0.8, { matchType: 'semantic' }), result('a.ts', 2, 0.6, { matchType: 'semantic' })], weight: 0.6 },
      { results: [result('a.ts', 1, 1, { matchType: 'tfidf', startChar: 2, endChar: 6 })], weight: 0.4 },
    ]);

    const line1 = fused.find((r) => r.lineNumber === 1);
    const line2 = fused.find((r) => r.lineNumber === 2);

    expect(line1?.score).toBeCloseTo(0.88);
    expect(line1?.matchType).toBe('hybrid');
    // 0.48 from semantic beats 0.4 from tfidf, so semantic offsets stay.
    expect(line1?.startChar).toBe(0);
    expect(line2?.score).toBeCloseTo(0.36);
    expect(line2?.matchType).toBe('semantic');
  });

  it('should cap fused scores at 1', () => {
    const fused = fuseWeighted([
      { results: [result('a.ts', 1, 1)], weight: 0.7 },
      { results: [result('a.ts', 1, 1)], weight: 0.7 },
    ]);
    expect(fused[0]?.score).toBe(1);
  });
});
