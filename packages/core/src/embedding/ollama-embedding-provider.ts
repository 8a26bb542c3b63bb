import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { EmbeddingFailedError } from '../types/errors.js';
import type { EmbeddingProvider } from '../types/provider.js';

export interface OllamaEmbeddingConfig {
  baseUrl: string;
  model: string;
  dimensions: number;
  /** Per-request timeout in milliseconds. */
  timeout: number;
  batchSize: number;
}

const DEFAULT_CONFIG: OllamaEmbeddingConfig = {
  baseUrl: 'http://localhost:11434',
  model: 'nomic-embed-text',
  dimensions: 768,
  timeout: 30_000,
  batchSize: 50,
};

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

/** Embeddings from a local Ollama server's `/api/embed` endpoint. */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
  private readonly config: OllamaEmbeddingConfig;

  constructor(config?: Partial<OllamaEmbeddingConfig>) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    merged.baseUrl = merged.baseUrl.replace(/\/+$/, '');
    this.config = merged;
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  get model(): string {
    return this.config.model;
  }

  async embed(texts: string[]): Promise<Result<number[][], EmbeddingFailedError>> {
    if (texts.length === 0) {
      return ok([]);
    }

    const allEmbeddings: number[][] = [];
    for (const batch of this.splitIntoBatches(texts)) {
      const result = await this.embedBatch(batch);
      if (result.isErr()) {
        return err(result.error);
      }
      allEmbeddings.push(...result.value);
    }
    return ok(allEmbeddings);
  }

  private async embedBatch(texts: string[]): Promise<Result<number[][], EmbeddingFailedError>> {
    let response: Response;
    try {
      response = await globalThis.fetch(`${this.config.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.config.model, input: texts }),
        signal: AbortSignal.timeout(this.config.timeout),
      });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return err(new EmbeddingFailedError(`Ollama embed request failed: ${message}`));
    }

    if (!response.ok) {
      return err(
        new EmbeddingFailedError(
          `Ollama embed API returned status ${response.status}: ${response.statusText}`,
        ),
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return err(new EmbeddingFailedError(`Invalid response from Ollama: ${message}`));
    }

    const parsed = embedResponseSchema.safeParse(body);
    if (!parsed.success) {
      return err(new EmbeddingFailedError('Invalid response: embeddings is not an array of vectors'));
    }
    if (parsed.data.embeddings.length !== texts.length) {
      return err(
        new EmbeddingFailedError(
          `Ollama returned ${parsed.data.embeddings.length} embeddings for ${texts.length} inputs`,
        ),
      );
    }
    return ok(parsed.data.embeddings);
  }

  private splitIntoBatches(texts: string[]): string[][] {
    const size = Math.max(1, this.config.batchSize);
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += size) {
      batches.push(texts.slice(i, i + size));
    }
    return batches;
  }
}
