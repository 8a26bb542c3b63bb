import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import type { EmbeddingProvider } from '../types/provider.js';
import {
  EmbeddingFailedError,
  IndexUnavailableError,
  SearchAbortedError,
} from '../types/errors.js';
import { getAbortReason } from '../utils/abort.js';

export const EMBEDDING_INDEX_VERSION = 1;
export const DEFAULT_EMBED_BATCH_SIZE = 50;

export interface EmbeddingEntry {
  id: string;
  filePath: string;
  lineNumber: number;
  content: string;
  vector: number[];
}

/** A piece of text to embed, located in a file. */
export interface EmbeddableLine {
  filePath: string;
  lineNumber: number;
  content: string;
}

export interface ScoredEntry {
  entry: EmbeddingEntry;
  similarity: number;
}

const embeddingIndexSchema = z.object({
  version: z.literal(EMBEDDING_INDEX_VERSION),
  model: z.string(),
  dimensions: z.number().int().positive(),
  entries: z.array(
    z.object({
      id: z.string(),
      filePath: z.string(),
      lineNumber: z.number().int().positive(),
      content: z.string(),
      vector: z.array(z.number()),
    }),
  ),
});

/** Cosine similarity of two vectors; 0 when either has no magnitude or the lengths differ. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    return 0;
  }
  const length = a.length;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export interface BuildEmbeddingOptions {
  batchSize?: number;
  signal?: AbortSignal;
  onProgress?: (embedded: number, total: number) => void;
}

/** Precomputed line embeddings searched by brute-force cosine similarity. */
export class EmbeddingIndex {
  readonly model: string;
  readonly dimensions: number;
  private readonly entries: readonly EmbeddingEntry[];

  constructor(model: string, dimensions: number, entries: readonly EmbeddingEntry[]) {
    this.model = model;
    this.dimensions = dimensions;
    this.entries = entries;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Entries ranked by similarity to `vector`, optionally limited to some files. */
  search(vector: readonly number[], files?: ReadonlySet<string>): ScoredEntry[] {
    const scored: ScoredEntry[] = [];
    for (const entry of this.entries) {
      if (files && !files.has(entry.filePath)) {
        continue;
      }
      scored.push({ entry, similarity: cosineSimilarity(vector, entry.vector) });
    }
    return scored.sort((a, b) => b.similarity - a.similarity);
  }

  static async build(
    lines: readonly EmbeddableLine[],
    provider: EmbeddingProvider,
    options: BuildEmbeddingOptions = {},
  ): Promise<Result<EmbeddingIndex, EmbeddingFailedError | SearchAbortedError>> {
    const batchSize = Math.max(1, options.batchSize ?? DEFAULT_EMBED_BATCH_SIZE);
    const entries: EmbeddingEntry[] = [];

    for (let i = 0; i < lines.length; i += batchSize) {
      if (options.signal?.aborted) {
        return err(new SearchAbortedError(`Indexing cancelled: ${getAbortReason(options.signal)}`));
      }

      const batch = lines.slice(i, i + batchSize);
      const result = await provider.embed(batch.map((line) => line.content));
      if (result.isErr()) {
        return err(result.error);
      }
      if (result.value.length !== batch.length) {
        return err(
          new EmbeddingFailedError(
            `Embedding provider returned ${result.value.length} vectors for ${batch.length} texts`,
          ),
        );
      }

      const misfit = result.value.find((vector) => vector.length !== provider.dimensions);
      if (misfit) {
        return err(
          new EmbeddingFailedError(
            `Embedding provider returned a ${misfit.length}-dimension vector; expected ${provider.dimensions}`,
          ),
        );
      }

      batch.forEach((line, j) => {
        entries.push({
          id: `${line.filePath}:${line.lineNumber}`,
          filePath: line.filePath,
          lineNumber: line.lineNumber,
          content: line.content,
          vector: result.value[j] ?? [],
        });
      });
      options.onProgress?.(entries.length, lines.length);
    }

    return ok(new EmbeddingIndex(provider.model, provider.dimensions, entries));
  }

  serialize(): string {
    return JSON.stringify({
      version: EMBEDDING_INDEX_VERSION,
      model: this.model,
      dimensions: this.dimensions,
      entries: this.entries,
    });
  }

  static deserialize(json: string): Result<EmbeddingIndex, IndexUnavailableError> {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      return err(new IndexUnavailableError(`Corrupt embedding index: ${message}`));
    }

    const parsed = embeddingIndexSchema.safeParse(raw);
    if (!parsed.success) {
      return err(
        new IndexUnavailableError(
          `Corrupt embedding index: ${parsed.error.issues[0]?.message ?? 'invalid format'}`,
        ),
      );
    }
    const { model, dimensions, entries } = parsed.data;
    return ok(new EmbeddingIndex(model, dimensions, entries));
  }
}
