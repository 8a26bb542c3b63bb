import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { Logger } from '../logging/logger.js';
import { EmbeddingIndex } from './embedding-index.js';
import {
  TERM_INDEX_FILE,
  loadEmbeddingIndex,
  loadTermIndex,
  saveEmbeddingIndex,
  saveTermIndex,
} from './index-store.js';
import { TermIndex } from './term-index.js';

describe('index store', () => {
  let tempDir: string;
  let storageDir: string;
  let logger: Logger;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'sift-index-store-'));
    storageDir = join(tempDir, '.sift');
    logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn(), child: () => logger };
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create the storage directory and reload a term index', async () => {
    const index = new TermIndex([
      { filePath: 'a.ts', lineNumber: 1, content: 'hello world', tokens: ['hello', 'world'] },
    ]);

    const written = await saveTermIndex(storageDir, index);
    expect(written).toBe(join(storageDir, TERM_INDEX_FILE));
    expect(existsSync(written)).toBe(true);

    const loaded = await loadTermIndex(storageDir, logger);
    expect(loaded?.documents()).toEqual(index.documents());
  });

  it('should reload an embedding index', async () => {
    const index = new EmbeddingIndex('m', 2, [
      { id: 'a.ts:1', filePath: 'a.ts', lineNumber: 1, content: 'x', vector: [0.5, 0.5] },
    ]);

    await saveEmbeddingIndex(storageDir, index);
    const loaded = await loadEmbeddingIndex(storageDir, logger);

    expect(loaded?.size).toBe(1);
    expect(loaded?.model).toBe('m');
  });

  it('should treat a missing index as absent without warning', async () => {
    expect(await loadTermIndex(storageDir, logger)).toBeUndefined();
    expect(await loadEmbeddingIndex(storageDir, logger)).toBeUndefined();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should log and ignore a corrupt index', async () => {
    mkdirSync(storageDir);
    writeFileSync(join(storageDir, TERM_INDEX_FILE), '{ broken');

    const loaded = await loadTermIndex(storageDir, logger);

    expect(loaded).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith(
      'Ignoring corrupt index',
      expect.objectContaining({ filePath: join(storageDir, TERM_INDEX_FILE) }),
    );
  });
});
