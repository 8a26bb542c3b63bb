import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { silentLogger } from '../logging/logger.js';
import type { SearchResult } from '../types/index.js';
import { attachContext } from './context.js';

function hit(filePath: string, lineNumber: number): SearchResult {
  return { filePath, lineNumber, content: '', score: 1, matchType: 'keyword', startChar: 0, endChar: 0 };
}

describe('attachContext', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'sift-context-'));
    writeFileSync(join(tempDir, 'a.txt'), 'one\n  two\nthree\nfour\nfive');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should attach trimmed lines around each result', async () => {
    const [withContext] = await attachContext([hit('a.txt', 3)], tempDir, 1, silentLogger);
    expect(withContext?.contextBefore).toEqual(['two']);
    expect(withContext?.contextAfter).toEqual(['four']);
  });

  it('should clip context at the file edges', async () => {
    const [first, last] = await attachContext([hit('a.txt', 1), hit('a.txt', 5)], tempDir, 2, silentLogger);
    expect(first?.contextBefore).toEqual([]);
    expect(first?.contextAfter).toEqual(['two', 'three']);
    expect(last?.contextBefore).toEqual(['three', 'four']);
    expect(last?.contextAfter).toEqual([]);
  });

  it('should leave results from unreadable files untouched', async () => {
    const [result] = await attachContext([hit('gone.txt', 1)], tempDir, 2, silentLogger);
    expect(result).toEqual(hit('gone.txt', 1));
  });

  it('should do nothing when no context is requested', async () => {
    const [result] = await attachContext([hit('a.txt', 2)], tempDir, 0, silentLogger);
    expect(result?.contextBefore).toBeUndefined();
  });
});
