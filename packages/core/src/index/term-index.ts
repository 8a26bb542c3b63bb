import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { silentLogger, type Logger } from '../logging/logger.js';
import { tokenize } from '../text/tokenizer.js';
import { IndexUnavailableError, SearchAbortedError } from '../types/errors.js';
import { isAbortError, throwIfAborted } from '../utils/abort.js';
import { splitLines } from '../search/strategy.js';

export const TERM_INDEX_VERSION = 1;

/** One non-blank line of a file. */
export interface TermDocument {
  filePath: string;
  lineNumber: number;
  content: string;
  /** Lowercased search terms in line order. */
  tokens: string[];
}

const termIndexSchema = z.object({
  version: z.literal(TERM_INDEX_VERSION),
  documents: z.array(
    z.object({
      filePath: z.string(),
      lineNumber: z.number().int().positive(),
      content: z.string(),
      tokens: z.array(z.string()),
    }),
  ),
});

export interface BuildIndexOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Line-level term statistics for TF-IDF ranking. Document ids are positions
 * in the document list; document frequencies are derived on construction.
 */
export class TermIndex {
  private readonly docs: readonly TermDocument[];
  private readonly frequencies: ReadonlyMap<string, number>;

  constructor(documents: readonly TermDocument[]) {
    this.docs = documents;

    const frequencies = new Map<string, number>();
    for (const doc of documents) {
      for (const term of new Set(doc.tokens)) {
        frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
      }
    }
    this.frequencies = frequencies;
  }

  get size(): number {
    return this.docs.length;
  }

  /** Number of documents containing `term`. */
  documentFrequency(term: string): number {
    return this.frequencies.get(term) ?? 0;
  }

  document(id: number): TermDocument | undefined {
    return this.docs[id];
  }

  documents(): readonly TermDocument[] {
    return this.docs;
  }

  /**
   * Reads `files` under `root` and indexes every non-blank line. Unreadable
   * files are logged and left out.
   */
  static async build(
    root: string,
    files: readonly string[],
    options: BuildIndexOptions = {},
  ): Promise<Result<TermIndex, SearchAbortedError>> {
    const logger = options.logger ?? silentLogger;
    const documents: TermDocument[] = [];

    try {
      for (const filePath of files) {
        throwIfAborted(options.signal, 'Indexing cancelled');

        let content: string;
        try {
          content = await readFile(join(root, filePath), 'utf-8');
        } catch (error: unknown) {
          const message = error instanceof Error ? error.message : String(error);
          logger.warn('Skipping unreadable file', { filePath, error: message });
          continue;
        }

        const lines = splitLines(content);
        for (let i = 0; i < lines.length; i++) {
          const line = (lines[i] ?? '').trim();
          if (line.length > 0) {
            documents.push({ filePath, lineNumber: i + 1, content: line, tokens: tokenize(line) });
          }
        }
      }
    } catch (error: unknown) {
      if (isAbortError(error)) {
        return err(error instanceof SearchAbortedError ? error : new SearchAbortedError('Indexing cancelled'));
      }
      throw error;
    }

    return ok(new TermIndex(documents));
  }

  serialize(): string {
    return JSON.stringify({ version: TERM_INDEX_VERSION, documents: this.docs });
  }

  static deserialize(json: string): Result<TermIndex, IndexUnavailableError> {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      return err(new IndexUnavailableError(`Corrupt term index: ${message}`));
    }

    const parsed = termIndexSchema.safeParse(raw);
    if (!parsed.success) {
      return err(new IndexUnavailableError(`Corrupt term index: ${parsed.error.issues[0]?.message ?? 'invalid format'}`));
    }
    return ok(new TermIndex(parsed.data.documents));
  }
}
