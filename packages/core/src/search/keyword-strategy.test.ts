import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { Logger } from '../logging/logger.js';
import { DEFAULT_SEARCH_OPTIONS } from '../types/index.js';
import { KeywordStrategy, findSubstring, scoreKeywordLine, unquote } from './keyword-strategy.js';

const loose = { caseSensitive: false, wholeWords: false };

describe('scoreKeywordLine', () => {
  it('should score a line containing the whole query as 1', () => {
    expect(scoreKeywordLine('todo', '// TODO: fix parser', loose)).toEqual({
      score: 1,
      matchType: 'keyword',
      startChar: 3,
      endChar: 7,
    });
  });

  it('should treat a quoted query as an exact phrase', () => {
    expect(scoreKeywordLine('"fix parser"', '// TODO: fix parser', loose)).toEqual({
      score: 1,
      matchType: 'exact',
      startChar: 9,
      endChar: 19,
    });
  });

  it('should respect case sensitivity for exact phrases', () => {
    const options = { caseSensitive: true, wholeWords: false };
    expect(scoreKeywordLine('"Fix Parser"', '// TODO: fix parser', options)).toBeUndefined();
  });

  it('should add the phrase bonus for consecutive full token matches', () => {
    const match = scoreKeywordLine('parser error', 'Parser  error found', loose);
    expect(match?.score).toBeCloseTo(0.965);
    expect(match?.startChar).toBe(0);
    expect(match?.endChar).toBe(13);
  });

  it('should give half credit to a token contained in another', () => {
    const match = scoreKeywordLine('databases config', 'database settings', loose);
    expect(match?.score).toBe(0.25);
    expect(match?.startChar).toBe(0);
    expect(match?.endChar).toBe(8);
  });

  it('should disable partial matches for whole-word searches', () => {
    const options = { caseSensitive: false, wholeWords: true };
    expect(scoreKeywordLine('databases config', 'database settings', options)).toBeUndefined();
    expect(scoreKeywordLine('log', 'catalog entry', options)).toBeUndefined();
    expect(scoreKeywordLine('log', 'catalog entry', loose)?.score).toBe(1);
  });

  it('should not match a query made only of stop words', () => {
    expect(scoreKeywordLine('the', 'nothing here', loose)).toBeUndefined();
  });
});

describe('unquote', () => {
  it('should return the inner text of a quoted query', () => {
    expect(unquote('"exact words"')).toBe('exact words');
    expect(unquote('plain')).toBeUndefined();
    expect(unquote('""')).toBeUndefined();
  });
});

describe('findSubstring', () => {
  it('should skip occurrences inside words when bounded', () => {
    expect(findSubstring('catalog log', 'log', true)).toBe(8);
    expect(findSubstring('catalog log', 'log', false)).toBe(4);
  });
});

describe('KeywordStrategy', () => {
  let tempDir: string;
  let logger: Logger;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'sift-keyword-'));
    logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn(), child: () => logger };
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should find a TODO on the second line', async () => {
    writeFileSync(join(tempDir, 'notes.txt'), 'first line\n// TODO: fix\nlast');
    const strategy = new KeywordStrategy({ logger, concurrency: 8 });

    const result = await strategy.search(
      'TODO',
      { root: tempDir, files: ['notes.txt'] },
      { ...DEFAULT_SEARCH_OPTIONS },
    );

    expect(result._unsafeUnwrap()).toEqual([
      {
        filePath: 'notes.txt',
        lineNumber: 2,
        content: '// TODO: fix',
        score: 1,
        matchType: 'keyword',
        startChar: 3,
        endChar: 7,
      },
    ]);
  });

  it('should log and skip files that cannot be read', async () => {
    writeFileSync(join(tempDir, 'notes.txt'), 'TODO here');
    const strategy = new KeywordStrategy({ logger, concurrency: 2 });

    const result = await strategy.search(
      'todo',
      { root: tempDir, files: ['missing.txt', 'notes.txt'] },
      { ...DEFAULT_SEARCH_OPTIONS },
    );

    expect(result._unsafeUnwrap().map((r) => r.filePath)).toEqual(['notes.txt']);
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping unreadable file',
      expect.objectContaining({ filePath: 'missing.txt' }),
    );
  });

  it('should drop matches below minScore', async () => {
    writeFileSync(join(tempDir, 'a.txt'), 'database settings');
    const strategy = new KeywordStrategy({ logger, concurrency: 1 });

    const result = await strategy.search(
      'databases config',
      { root: tempDir, files: ['a.txt'] },
      { ...DEFAULT_SEARCH_OPTIONS, minScore: 0.3 },
    );

    expect(result._unsafeUnwrap()).toEqual([]);
  });

  it('should return an aborted error when the signal has fired', async () => {
    writeFileSync(join(tempDir, 'a.txt'), 'TODO');
    const controller = new AbortController();
    controller.abort();
    const strategy = new KeywordStrategy({ logger, concurrency: 1 });

    const result = await strategy.search(
      'TODO',
      { root: tempDir, files: ['a.txt'] },
      { ...DEFAULT_SEARCH_OPTIONS, signal: controller.signal },
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('aborted');
    }
  });

  it('should declare light resource requirements', () => {
    const strategy = new KeywordStrategy({ logger, concurrency: 1 });
    expect(strategy.requiredResources()).toEqual({
      minMemoryMb: 10,
      requiresMl: false,
      requiresIndex: false,
      cpuIntensive: false,
    });
  });
});
