import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createIgnoreFilter, type IgnoreFilter } from './ignore-filter.js';

describe('createIgnoreFilter', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'sift-ignore-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function filterFor(...args: Parameters<typeof createIgnoreFilter>): IgnoreFilter {
    return createIgnoreFilter(...args)._unsafeUnwrap();
  }

  describe('default patterns', () => {
    const ignored = [
      'node_modules/package/index.js',
      '.git/config',
      '.sift/tfidf-index.json',
      'dist/index.js',
      'build/out.js',
      'target/debug/app',
      'pkg/__pycache__/mod.pyc',
      '.cache/entry',
    ];

    for (const path of ignored) {
      it(`should ignore ${path}`, () => {
        expect(filterFor(tempDir)(path)).toBe(true);
      });
    }

    it('should keep ordinary source files', () => {
      expect(filterFor(tempDir)('src/index.ts')).toBe(false);
    });
  });

  it('should apply .gitignore and .siftignore', () => {
    writeFileSync(join(tempDir, '.gitignore'), '# comment\n*.log\n\n');
    writeFileSync(join(tempDir, '.siftignore'), 'fixtures/\n');
    const filter = filterFor(tempDir);

    expect(filter('debug.log')).toBe(true);
    expect(filter('fixtures/')).toBe(true);
    expect(filter('notes.txt')).toBe(false);
  });

  it('should apply extra patterns', () => {
    const filter = filterFor(tempDir, ['*.min.js']);
    expect(filter('vendor/app.min.js')).toBe(true);
    expect(filter('vendor/app.js')).toBe(false);
  });

  describe('scanning below the project root', () => {
    beforeEach(() => {
      mkdirSync(join(tempDir, 'src', 'generated'), { recursive: true });
      writeFileSync(join(tempDir, '.gitignore'), '*.log\n/src/generated/\n/notes.txt\n');
      writeFileSync(join(tempDir, 'src', '.siftignore'), 'scratch.ts\n');
    });

    it('should anchor project root rules at the project root', () => {
      const filter = filterFor(join(tempDir, 'src'), [], { projectRoot: tempDir });

      expect(filter('server.log')).toBe(true);
      expect(filter('generated/')).toBe(true);
      expect(filter('scratch.ts')).toBe(true);
      // `/notes.txt` names the root's file, not one under src
      expect(filter('notes.txt')).toBe(false);
      expect(filter('index.ts')).toBe(false);
    });

    it('should read only the scan root without a project root', () => {
      const filter = filterFor(join(tempDir, 'src'));

      expect(filter('server.log')).toBe(false);
      expect(filter('scratch.ts')).toBe(true);
    });

    it('should ignore a project root that does not contain the scan root', () => {
      const filter = filterFor(tempDir, [], { projectRoot: join(tempDir, 'src') });

      expect(filter('scratch.ts')).toBe(false);
      expect(filter('server.log')).toBe(true);
    });
  });

  it('should report an ignore path it cannot read', () => {
    mkdirSync(join(tempDir, 'blocked'));
    writeFileSync(join(tempDir, 'blocked', 'file'), '');

    // A file where a directory is expected makes every read under it fail with ENOTDIR.
    const result = createIgnoreFilter(join(tempDir, 'blocked', 'file'));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('io-failure');
    }
  });
});
