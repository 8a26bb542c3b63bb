import { join, relative, sep } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import { detectFileType } from '../context/file-type.js';
import { resolveSearchTarget } from '../files/file-scanner.js';
import type { EmbeddingIndex } from '../index/embedding-index.js';
import type { TermIndex } from '../index/term-index.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { QueryClassifier } from '../query/query-classifier.js';
import { SemanticNeedScorer } from '../query/semantic-need-scorer.js';
import {
  DEFAULT_SEARCH_OPTIONS,
  type CapabilityDetails,
  type NeuralCapability,
  type PlanStep,
  type ProjectType,
  type ResourceRequirements,
  type SearchOptions,
  type SearchResult,
  type SearchTarget,
  type StrategyName,
  type StrategyPlan,
} from '../types/index.js';
import type { EmbeddingProvider } from '../types/provider.js';
import { SearchAbortedError, UnknownStrategyError, type SearchError } from '../types/errors.js';
import { getAbortReason } from '../utils/abort.js';
import { attachContext } from './context.js';
import { FuzzyStrategy } from './fuzzy-strategy.js';
import { KeywordStrategy } from './keyword-strategy.js';
import { fuseWeighted, mergeResults } from './merge.js';
import { RegexStrategy } from './regex-strategy.js';
import { SemanticStrategy } from './semantic-strategy.js';
import { DEFAULT_READ_CONCURRENCY, type SearchStrategy, type StrategyRegistry } from './strategy.js';
import { StrategySelector, describePlan, type PlanEnvironment } from './strategy-selector.js';
import { TfIdfStrategy } from './tfidf-strategy.js';

export interface SearchEngineConfig {
  /** A sequential plan runs its fallback when the primary returns fewer results. */
  qualityGate: number;
  concurrency: number;
  /** Extra ignore patterns applied while walking directories. */
  exclude: readonly string[];
}

export const DEFAULT_ENGINE_CONFIG: SearchEngineConfig = {
  qualityGate: 1,
  concurrency: DEFAULT_READ_CONCURRENCY,
  exclude: [],
};

export interface SearchEngineDeps {
  /** Detected once per process. */
  capability: NeuralCapability;
  details: CapabilityDetails;
  termIndex?: TermIndex;
  embeddingIndex?: EmbeddingIndex;
  embeddingProvider?: EmbeddingProvider;
  /** Directory the indexes were built from. Defaults to each search root. */
  indexRoot?: string;
  projectType?: ProjectType;
  logger?: Logger;
  config?: Partial<SearchEngineConfig>;
}

type StepResult = Result<SearchResult[], SearchError>;

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

/** Narrows a target to the files a step's extension and file type filters allow. */
function restrictTarget(target: SearchTarget, step: PlanStep): SearchTarget {
  const extensions = step.extensions ?? [];
  const { fileType } = step;
  if (extensions.length === 0 && fileType === undefined) {
    return target;
  }
  return {
    root: target.root,
    files: target.files.filter((file) => {
      const lower = file.toLowerCase();
      return (
        (extensions.length === 0 || extensions.some((ext) => lower.endsWith(ext))) &&
        (fileType === undefined || detectFileType(file) === fileType)
      );
    }),
  };
}

function abortedError(signal: AbortSignal | undefined): SearchAbortedError {
  return new SearchAbortedError(`Search cancelled: ${getAbortReason(signal)}`);
}

/**
 * Adaptive search over local files: classifies the query, plans which
 * strategies to run given the host's capabilities and the indexes on disk,
 * runs the plan and merges the results.
 */
export class SearchEngine {
  private readonly registry: StrategyRegistry;
  private readonly selector: StrategySelector;
  private readonly classifier = new QueryClassifier();
  private readonly scorer = new SemanticNeedScorer();
  private readonly deps: SearchEngineDeps;
  private readonly config: SearchEngineConfig;
  private readonly logger: Logger;

  constructor(deps: SearchEngineDeps) {
    this.deps = deps;
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...deps.config };
    this.logger = deps.logger ?? silentLogger;

    const lineContext = { logger: this.logger, concurrency: this.config.concurrency };
    const strategies: SearchStrategy[] = [
      new KeywordStrategy(lineContext),
      new FuzzyStrategy(lineContext),
      new RegexStrategy(lineContext),
      new TfIdfStrategy(deps.termIndex),
      new SemanticStrategy({
        capability: deps.capability,
        index: deps.embeddingIndex,
        provider: deps.embeddingProvider,
      }),
    ];
    this.registry = new Map(strategies.map((strategy) => [strategy.name, strategy]));

    const requirements = new Map<StrategyName, ResourceRequirements>();
    for (const [name, strategy] of this.registry) {
      requirements.set(name, strategy.requiredResources());
    }
    this.selector = new StrategySelector(requirements);
  }

  get capability(): NeuralCapability {
    return this.deps.capability;
  }

  capabilityDetails(): CapabilityDetails {
    return this.deps.details;
  }

  environment(): PlanEnvironment {
    return {
      capability: this.deps.capability,
      availability: {
        termIndex: this.deps.termIndex !== undefined,
        embeddingIndex: this.deps.embeddingIndex !== undefined,
      },
      memoryMb: this.deps.details.memoryInfo.totalMb,
      projectType: this.deps.projectType,
    };
  }

  /** The plan `search` would run for a query, without touching the filesystem. */
  plan(query: string, modeHint: string = 'auto'): Result<StrategyPlan, SearchError> {
    return this.selector.plan(
      query,
      this.classifier.classify(query),
      this.scorer.score(query),
      this.environment(),
      modeHint,
    );
  }

  async search(
    query: string,
    path: string,
    options: Partial<SearchOptions> = {},
    modeHint: string = 'auto',
  ): Promise<Result<SearchResult[], SearchError>> {
    const opts: Readonly<SearchOptions> = Object.freeze({ ...DEFAULT_SEARCH_OPTIONS, ...options });

    if (query.trim().length === 0 || opts.maxResults <= 0) {
      return ok([]);
    }

    const planned = this.plan(query, modeHint);
    if (planned.isErr()) {
      return err(planned.error);
    }
    const plan = planned.value;
    this.logger.debug('Search plan', { query, plan: describePlan(plan) });

    const targetResult = await resolveSearchTarget(path, {
      include: opts.include,
      exclude: opts.exclude,
      signal: opts.signal,
      ignorePatterns: this.config.exclude,
      projectRoot: this.deps.indexRoot,
    });
    if (targetResult.isErr()) {
      return err(targetResult.error);
    }
    const target = targetResult.value;

    const executed = await this.execute(plan, target, opts);
    if (executed.isErr()) {
      return err(executed.error);
    }

    const merged = mergeResults([executed.value], opts.maxResults);
    const results = opts.includeContext
      ? await attachContext(merged, target.root, opts.contextLines, this.logger)
      : merged;

    if (opts.signal?.aborted) {
      return err(abortedError(opts.signal));
    }
    return ok(results);
  }

  // -------------------------------------------------------------------------
  // Plan execution
  // -------------------------------------------------------------------------

  private async execute(
    plan: StrategyPlan,
    target: SearchTarget,
    options: SearchOptions,
  ): Promise<StepResult> {
    switch (plan.kind) {
      case 'single':
        return this.runStep(plan.step, target, options);

      case 'sequential': {
        const primary = await this.runStep(plan.primary, target, options);
        if (primary.isErr() || primary.value.length >= this.config.qualityGate) {
          return primary;
        }
        if (options.signal?.aborted) {
          return err(abortedError(options.signal));
        }
        this.logger.debug('Primary strategy below quality gate, running fallback', {
          primary: plan.primary.strategy,
          fallback: plan.fallback.strategy,
          results: primary.value.length,
        });
        const fallback = await this.runStep(plan.fallback, target, options);
        return fallback.map((results) => [...primary.value, ...results]);
      }

      case 'hybrid': {
        const outcomes = await Promise.all(
          plan.steps.map((step) => this.runStep(step, target, options)),
        );
        const weighted: { results: SearchResult[]; weight: number }[] = [];
        for (const [i, outcome] of outcomes.entries()) {
          if (outcome.isErr()) {
            return err(outcome.error);
          }
          weighted.push({ results: outcome.value, weight: plan.steps[i]?.weight ?? 1 });
        }
        return ok(fuseWeighted(weighted).filter((result) => result.score >= options.minScore));
      }
    }
  }

  private async runStep(step: PlanStep, target: SearchTarget, options: SearchOptions): Promise<StepResult> {
    if (options.signal?.aborted) {
      return err(abortedError(options.signal));
    }
    const strategy = this.registry.get(step.strategy);
    if (!strategy) {
      return err(new UnknownStrategyError(step.strategy));
    }

    const scoped = restrictTarget(target, step);
    // Hybrid steps report every hit; the fused score is filtered afterwards.
    const stepOptions: SearchOptions = step.weight === undefined ? options : { ...options, minScore: 0 };

    const result = strategy.requiredResources().requiresIndex
      ? await this.runIndexed(strategy, step.query, scoped, stepOptions)
      : await strategy.search(step.query, scoped, stepOptions);

    if (result.isErr() && result.error.kind !== 'aborted') {
      this.logger.error('Strategy failed', { strategy: step.strategy, error: result.error.message });
    }
    return result;
  }

  /**
   * Index entries are keyed by paths relative to the index root; rebase the
   * target onto it and map results back to the search root.
   */
  private async runIndexed(
    strategy: SearchStrategy,
    query: string,
    target: SearchTarget,
    options: SearchOptions,
  ): Promise<StepResult> {
    const indexRoot = this.deps.indexRoot;
    if (indexRoot === undefined || indexRoot === target.root) {
      return strategy.search(query, target, options);
    }

    const toIndex = (file: string): string => toPosix(relative(indexRoot, join(target.root, file)));
    const fromIndex = (file: string): string => toPosix(relative(target.root, join(indexRoot, file)));

    const rebased: SearchTarget = { root: indexRoot, files: target.files.map(toIndex) };
    const result = await strategy.search(query, rebased, options);
    return result.map((results) => results.map((r) => ({ ...r, filePath: fromIndex(r.filePath) })));
  }
}
