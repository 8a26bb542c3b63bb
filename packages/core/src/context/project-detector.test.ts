import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { PROJECT_PROFILES, ProjectDetector } from './project-detector.js';

describe('ProjectDetector', () => {
  let tempDir: string;
  const detector = new ProjectDetector();

  function touch(...paths: string[]): void {
    for (const path of paths) {
      const full = join(tempDir, path);
      mkdirSync(join(full, '..'), { recursive: true });
      writeFileSync(full, '');
    }
  }

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'sift-project-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('marker files', () => {
    it('should detect a Rust project from Cargo.toml', async () => {
      touch('Cargo.toml');
      expect(await detector.detect(tempDir)).toBe('rust');
    });

    it('should detect a JavaScript project from package.json', async () => {
      touch('package.json', 'README.md', 'guide.md');
      expect(await detector.detect(tempDir)).toBe('javascript');
    });

    it('should detect a Python project from pyproject.toml', async () => {
      touch('pyproject.toml');
      expect(await detector.detect(tempDir)).toBe('python');
    });

    it('should check Cargo.toml before package.json', async () => {
      touch('package.json', 'Cargo.toml');
      expect(await detector.detect(tempDir)).toBe('rust');
    });

    it('should not treat a directory named like a marker as one', async () => {
      mkdirSync(join(tempDir, 'package.json'));
      expect(await detector.detect(tempDir)).toBe('unknown');
    });
  });

  describe('file census', () => {
    it('should detect documentation when most files are markdown', async () => {
      touch('a.md', 'b.md', 'guides/c.MD', 'guides/d.md', 'notes.txt');
      expect(await detector.detect(tempDir)).toBe('documentation');
    });

    it('should detect a mixed tree with two common extensions', async () => {
      touch('a.go', 'b.go', 'c.go', 'x.lua', 'y.lua', 'z.lua');
      expect(await detector.detect(tempDir)).toBe('mixed');
    });

    it('should report unknown for a sparse tree', async () => {
      touch('a.go', 'x.lua', 'README');
      expect(await detector.detect(tempDir)).toBe('unknown');
    });

    it('should report unknown for an empty directory', async () => {
      expect(await detector.detect(tempDir)).toBe('unknown');
    });

    it('should not count hidden entries or build output', async () => {
      touch('guide.md', '.hidden/a.go', '.hidden/b.go', 'node_modules/c.go', 'dist/d.go', 'build/e.go');

      const counts = await detector.countExtensions(tempDir);

      expect([...counts]).toEqual([['md', 1]]);
      expect(await detector.detect(tempDir)).toBe('documentation');
    });
  });

  it('should scope documentation projects to prose files', () => {
    expect(PROJECT_PROFILES.documentation.filePatterns).toEqual(['*.md', '*.txt']);
    expect(PROJECT_PROFILES.javascript.ignorePatterns).toContain('node_modules/');
    expect(PROJECT_PROFILES.unknown.filePatterns).toEqual([]);
  });
});
