import { ok, err, type Result } from 'neverthrow';
import type { EmbeddingIndex } from '../index/embedding-index.js';
import type {
  NeuralCapability,
  ResourceRequirements,
  SearchOptions,
  SearchResult,
  SearchTarget,
} from '../types/index.js';
import type { EmbeddingProvider } from '../types/provider.js';
import {
  EmbeddingFailedError,
  IndexUnavailableError,
  SearchAbortedError,
  type SearchError,
} from '../types/errors.js';
import { getAbortReason } from '../utils/abort.js';
import { clampScore, type SearchStrategy } from './strategy.js';

export interface SemanticStrategyDeps {
  capability: NeuralCapability;
  index?: EmbeddingIndex;
  provider?: EmbeddingProvider;
}

/** Ranks indexed lines by cosine similarity to the embedded query. */
export class SemanticStrategy implements SearchStrategy {
  readonly name = 'semantic';
  private readonly deps: SemanticStrategyDeps;

  constructor(deps: SemanticStrategyDeps) {
    this.deps = deps;
  }

  async search(
    query: string,
    target: SearchTarget,
    options: SearchOptions,
  ): Promise<Result<SearchResult[], SearchError>> {
    const { capability, index, provider } = this.deps;
    if (capability.status !== 'available') {
      return err(new IndexUnavailableError(`Semantic search unavailable: ${capability.reason}`));
    }
    if (!index || !provider) {
      return err(
        new IndexUnavailableError('Embedding index not found; run "sift index --semantic" first'),
      );
    }

    if (index.model !== provider.model || index.dimensions !== provider.dimensions) {
      return err(
        new IndexUnavailableError(
          `Embedding index was built with ${index.model} / ${index.dimensions} dims but the configured model is ` +
            `${provider.model} / ${provider.dimensions} dims; re-run "sift index --semantic"`,
        ),
      );
    }

    const embedded = await provider.embed([query]);
    if (embedded.isErr()) {
      return err(embedded.error);
    }
    const vector = embedded.value[0];
    if (!vector) {
      return err(new EmbeddingFailedError('Embedding provider returned no vector for the query'));
    }
    if (vector.length !== index.dimensions) {
      return err(
        new EmbeddingFailedError(
          `Query embedding has ${vector.length} dims; the index expects ${index.dimensions}`,
        ),
      );
    }
    if (options.signal?.aborted) {
      return err(new SearchAbortedError(`Search cancelled: ${getAbortReason(options.signal)}`));
    }

    const results: SearchResult[] = [];
    for (const { entry, similarity } of index.search(vector, new Set(target.files))) {
      const score = clampScore(similarity);
      if (score < options.minScore) {
        // Ranked descending, so nothing later qualifies.
        break;
      }
      results.push({
        filePath: entry.filePath,
        lineNumber: entry.lineNumber,
        content: entry.content,
        score,
        matchType: 'semantic',
        startChar: 0,
        endChar: entry.content.length,
      });
    }
    return ok(results);
  }

  requiredResources(): ResourceRequirements {
    return { minMemoryMb: 512, requiresMl: true, requiresIndex: true, cpuIntensive: true };
  }
}
