import type { Result } from 'neverthrow';
import type { EmbeddingFailedError } from './errors.js';

export interface EmbeddingProvider {
  embed(texts: string[]): Promise<Result<number[][], EmbeddingFailedError>>;
  readonly dimensions: number;
  /** Identifies the model, so an index built by another model is not searched with this one. */
  readonly model: string;
}
