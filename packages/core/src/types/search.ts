export type MatchType = 'exact' | 'keyword' | 'fuzzy' | 'regex' | 'semantic' | 'tfidf' | 'hybrid';

export type QueryType = 'exact-phrase' | 'conceptual' | 'file-extension' | 'code-pattern' | 'regex-like';

export const STRATEGY_NAMES = ['keyword', 'fuzzy', 'regex', 'tfidf', 'semantic'] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

export const MODE_HINTS = ['auto', 'hybrid', ...STRATEGY_NAMES] as const;

export type ModeHint = (typeof MODE_HINTS)[number];

export const FILE_TYPES = ['code', 'documentation', 'configuration', 'data', 'unknown'] as const;

export type FileType = (typeof FILE_TYPES)[number];

export interface SearchResult {
  /** Path relative to the search root, `/`-separated. */
  filePath: string;
  /** 1-based. */
  lineNumber: number;
  /** The matching line, trimmed. */
  content: string;
  score: number;
  matchType: MatchType;
  /** Offsets into `content`. */
  startChar: number;
  endChar: number;
  contextBefore?: string[];
  contextAfter?: string[];
}

export interface SearchOptions {
  minScore: number;
  maxResults: number;
  caseSensitive: boolean;
  wholeWords: boolean;
  includeContext: boolean;
  contextLines: number;
  /** Glob patterns a file must match (any of) to be searched. Empty means all. */
  include: readonly string[];
  /** Glob patterns that remove a file from the search. */
  exclude: readonly string[];
  signal?: AbortSignal;
}

export const DEFAULT_SEARCH_OPTIONS: Readonly<SearchOptions> = Object.freeze({
  minScore: 0.3,
  maxResults: 100,
  caseSensitive: false,
  wholeWords: false,
  includeContext: false,
  contextLines: 2,
  include: [],
  exclude: [],
});

/**
 * The files a strategy may read. Traversal-backed strategies open them
 * relative to `root`; index-backed strategies use `files` as a filter.
 */
export interface SearchTarget {
  root: string;
  files: readonly string[];
}

export interface ResourceRequirements {
  minMemoryMb: number;
  requiresMl: boolean;
  requiresIndex: boolean;
  cpuIntensive: boolean;
}

export interface PlanStep {
  strategy: StrategyName;
  query: string;
  /** Share of the fused score in a hybrid plan. */
  weight?: number;
  /** Restricts the step to files with these extensions (lowercase, with dot). */
  extensions?: readonly string[];
  /** Restricts the step to files of this kind. */
  fileType?: FileType;
}

export type StrategyPlan =
  | { kind: 'single'; step: PlanStep }
  | { kind: 'sequential'; primary: PlanStep; fallback: PlanStep }
  | { kind: 'hybrid'; steps: readonly PlanStep[] };

export interface SemanticNeedScore {
  needsSemantic: number;
  confidence: number;
  explanation: string;
}
