import { ok, err, type Result } from 'neverthrow';
import { extractFileExtensions, stripFileExtensions } from '../query/query-classifier.js';
import {
  FILE_TYPES,
  MODE_HINTS,
  type FileType,
  type ModeHint,
  type NeuralCapability,
  type PlanStep,
  type ProjectType,
  type QueryType,
  type ResourceRequirements,
  type SemanticNeedScore,
  type StrategyName,
  type StrategyPlan,
} from '../types/index.js';
import { IndexUnavailableError, UnknownStrategyError } from '../types/errors.js';
import { unquote } from './keyword-strategy.js';
import { codePatternToRegex, escapeRegExp } from './regex-strategy.js';

/** `needsSemantic` at or above which conceptual queries go fully semantic. */
export const SEMANTIC_THRESHOLD = 0.7;
/** Lower bound of the band where semantic and lexical results are blended. */
export const HYBRID_THRESHOLD = 0.55;

export interface IndexAvailability {
  termIndex: boolean;
  embeddingIndex: boolean;
}

/** What the host can offer, decided once per process. */
export interface PlanEnvironment {
  capability: NeuralCapability;
  availability: IndexAvailability;
  /** Total memory in MB. Memory pruning is skipped when unknown. */
  memoryMb?: number;
  /** Documentation and mixed roots route lexical conceptual queries by file type. */
  projectType?: ProjectType;
}

export type PlanError = UnknownStrategyError | IndexUnavailableError;

export function isModeHint(value: string): value is ModeHint {
  return MODE_HINTS.some((hint) => hint === value);
}

export function describePlan(plan: StrategyPlan): string {
  switch (plan.kind) {
    case 'single':
      return `single(${plan.step.strategy})`;
    case 'sequential':
      return `sequential(${plan.primary.strategy} -> ${plan.fallback.strategy})`;
    case 'hybrid':
      return `hybrid(${plan.steps.map(describeStep).join(', ')})`;
  }
}

function describeStep(step: PlanStep): string {
  const scope = step.fileType === undefined ? '' : `[${step.fileType}]`;
  return `${step.strategy}${scope}:${(step.weight ?? 0).toFixed(2)}`;
}

function single(strategy: StrategyName, query: string): StrategyPlan {
  return { kind: 'single', step: { strategy, query } };
}

/**
 * Turns a classified query into an execution plan. Strategies whose
 * resource requirements the environment cannot meet are pruned before any
 * policy applies, so they are never planned.
 */
export class StrategySelector {
  private readonly requirements: ReadonlyMap<StrategyName, ResourceRequirements>;

  constructor(requirements: ReadonlyMap<StrategyName, ResourceRequirements>) {
    this.requirements = requirements;
  }

  isEligible(name: StrategyName, env: PlanEnvironment): boolean {
    return this.ineligibility(name, env) === undefined;
  }

  plan(
    query: string,
    queryType: QueryType,
    semantic: SemanticNeedScore,
    env: PlanEnvironment,
    modeHint: string = 'auto',
  ): Result<StrategyPlan, PlanError> {
    if (!isModeHint(modeHint)) {
      return err(new UnknownStrategyError(modeHint));
    }

    switch (modeHint) {
      case 'auto':
        return ok(this.prune(this.autoPlan(query, queryType, semantic, env), env));
      case 'hybrid':
        return ok(this.explicitHybrid(query, env));
      default: {
        const reason = this.ineligibility(modeHint, env);
        if (reason !== undefined) {
          return err(new IndexUnavailableError(reason));
        }
        return ok(single(modeHint, query));
      }
    }
  }

  // -------------------------------------------------------------------------
  // Policies
  // -------------------------------------------------------------------------

  private autoPlan(
    query: string,
    queryType: QueryType,
    semantic: SemanticNeedScore,
    env: PlanEnvironment,
  ): StrategyPlan {
    switch (queryType) {
      case 'regex-like':
        return single('regex', query);

      case 'code-pattern':
        return {
          kind: 'sequential',
          primary: { strategy: 'regex', query: codePatternToRegex(query) },
          fallback: { strategy: 'keyword', query },
        };

      case 'file-extension': {
        const extensions = extractFileExtensions(query);
        const cleaned = stripFileExtensions(query);
        return {
          kind: 'sequential',
          primary: { strategy: 'keyword', query: cleaned, extensions },
          fallback: { strategy: 'fuzzy', query: cleaned, extensions },
        };
      }

      case 'exact-phrase': {
        const unquoted = unquote(query) ?? query.replace(/"/g, '').trim();
        return {
          kind: 'sequential',
          primary: { strategy: 'keyword', query },
          fallback: { strategy: 'fuzzy', query: unquoted.length > 0 ? unquoted : query },
        };
      }

      case 'conceptual':
        return this.conceptualPlan(query, semantic, env);
    }
  }

  private conceptualPlan(query: string, semantic: SemanticNeedScore, env: PlanEnvironment): StrategyPlan {
    const lexical: StrategyName = this.isEligible('tfidf', env) ? 'tfidf' : 'keyword';

    if (this.isEligible('semantic', env)) {
      const need = semantic.needsSemantic;
      if (need >= SEMANTIC_THRESHOLD) {
        return single('semantic', query);
      }
      if (need >= HYBRID_THRESHOLD) {
        return {
          kind: 'hybrid',
          steps: [
            { strategy: 'semantic', query, weight: need },
            { strategy: lexical, query, weight: 1 - need },
          ],
        };
      }
    }

    if (env.projectType === 'documentation' || env.projectType === 'mixed') {
      return this.fileTypePlan(query, env);
    }

    return lexical === 'tfidf'
      ? { kind: 'sequential', primary: { strategy: 'tfidf', query }, fallback: { strategy: 'keyword', query } }
      : { kind: 'sequential', primary: { strategy: 'keyword', query }, fallback: { strategy: 'fuzzy', query } };
  }

  /** Strategies per file type, for trees that are not mostly one kind of code. */
  strategiesForFileType(fileType: FileType, env: PlanEnvironment): StrategyName[] {
    switch (fileType) {
      case 'code':
        return ['regex', 'keyword'];
      case 'documentation': {
        const prose: StrategyName = this.isEligible('semantic', env)
          ? 'semantic'
          : this.isEligible('tfidf', env)
            ? 'tfidf'
            : 'keyword';
        return [prose, 'fuzzy'];
      }
      case 'configuration':
        return ['keyword'];
      case 'data':
        return ['keyword', 'regex'];
      case 'unknown':
        return ['fuzzy'];
    }
  }

  /** One fully weighted step per file type and strategy; regex steps match the query literally. */
  private fileTypePlan(query: string, env: PlanEnvironment): StrategyPlan {
    return {
      kind: 'hybrid',
      steps: FILE_TYPES.flatMap((fileType) =>
        this.strategiesForFileType(fileType, env).map((strategy) => ({
          strategy,
          query: strategy === 'regex' ? escapeRegExp(query) : query,
          weight: 1,
          fileType,
        })),
      ),
    };
  }

  private explicitHybrid(query: string, env: PlanEnvironment): StrategyPlan {
    if (this.isEligible('semantic', env)) {
      const lexical: StrategyName = this.isEligible('tfidf', env) ? 'tfidf' : 'keyword';
      return {
        kind: 'hybrid',
        steps: [
          { strategy: 'semantic', query, weight: 0.5 },
          { strategy: lexical, query, weight: 0.5 },
        ],
      };
    }
    return {
      kind: 'hybrid',
      steps: [
        { strategy: 'keyword', query, weight: 0.5 },
        { strategy: 'fuzzy', query, weight: 0.5 },
      ],
    };
  }

  // -------------------------------------------------------------------------
  // Pruning
  // -------------------------------------------------------------------------

  /** Why a strategy cannot run here, or undefined when it can. */
  private ineligibility(name: StrategyName, env: PlanEnvironment): string | undefined {
    const required = this.requirements.get(name);
    if (!required) {
      return `No ${name} strategy is registered`;
    }
    if (required.requiresMl && env.capability.status !== 'available') {
      return `Semantic search unavailable: ${env.capability.reason}`;
    }
    if (required.requiresIndex) {
      if (name === 'tfidf' && !env.availability.termIndex) {
        return 'TF-IDF index not found; run "sift index" first';
      }
      if (name === 'semantic' && !env.availability.embeddingIndex) {
        return 'Embedding index not found; run "sift index --semantic" first';
      }
    }
    if (env.memoryMb !== undefined && required.minMemoryMb > env.memoryMb) {
      return `Not enough memory for ${name} search (needs ${required.minMemoryMb} MB)`;
    }
    return undefined;
  }

  /** Drops ineligible steps; keyword is the floor when nothing survives. */
  private prune(plan: StrategyPlan, env: PlanEnvironment): StrategyPlan {
    const usable = (step: PlanStep): boolean => this.isEligible(step.strategy, env);

    switch (plan.kind) {
      case 'single':
        return usable(plan.step) ? plan : single('keyword', plan.step.query);
      case 'sequential': {
        const primaryOk = usable(plan.primary);
        const fallbackOk = usable(plan.fallback);
        if (primaryOk && fallbackOk) {
          return plan;
        }
        if (primaryOk || fallbackOk) {
          return { kind: 'single', step: primaryOk ? plan.primary : plan.fallback };
        }
        return single('keyword', plan.fallback.query);
      }
      case 'hybrid': {
        const steps = plan.steps.filter(usable);
        const [only, second] = steps;
        if (only && second) {
          return { kind: 'hybrid', steps };
        }
        if (only) {
          return { kind: 'single', step: only };
        }
        return single('keyword', plan.steps[0]?.query ?? '');
      }
    }
  }
}
