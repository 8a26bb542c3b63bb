export type {
  MatchType,
  QueryType,
  StrategyName,
  ModeHint,
  FileType,
  ProjectType,
  ProjectProfile,
  SearchResult,
  SearchOptions,
  SearchTarget,
  ResourceRequirements,
  PlanStep,
  StrategyPlan,
  SemanticNeedScore,
  NeuralCapability,
  MemoryInfo,
  CapabilityDetails,
  CapabilityTier,
  SearchErrorKind,
  EmbeddingProvider,
  SiftConfig,
  SearchConfig,
  CapabilityConfig,
  EmbeddingConfig,
  StorageConfig,
  LoggingConfig,
  LogLevel,
} from './types/index.js';

export {
  STRATEGY_NAMES,
  MODE_HINTS,
  FILE_TYPES,
  PROJECT_TYPES,
  DEFAULT_SEARCH_OPTIONS,
  SearchError,
  InvalidPatternError,
  UnknownStrategyError,
  IndexUnavailableError,
  IoFailureError,
  EmbeddingFailedError,
  SearchAbortedError,
} from './types/index.js';

export type { Logger, LoggerOptions } from './logging/logger.js';
export { createLogger, silentLogger } from './logging/logger.js';

export { isAbortError } from './utils/abort.js';

export {
  loadConfig,
  parseConfig,
  ConfigError,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
} from './config/config-parser.js';

export { QueryClassifier, extractFileExtensions } from './query/query-classifier.js';
export { SemanticNeedScorer } from './query/semantic-need-scorer.js';

export type { CapabilityDetectorConfig, SystemProbe } from './capability/capability-detector.js';
export {
  CapabilityDetector,
  createDefaultSystemProbe,
  capabilityTier,
  capabilityRecommendations,
} from './capability/capability-detector.js';

export { ProjectDetector, PROJECT_PROFILES } from './context/project-detector.js';
export { detectFileType } from './context/file-type.js';

export type { IgnoreFilter, IgnoreFilterOptions } from './files/ignore-filter.js';
export { createIgnoreFilter, DEFAULT_IGNORE_PATTERNS } from './files/ignore-filter.js';
export type { ScanOptions, ScanError, ResolveTargetOptions } from './files/file-scanner.js';
export { FileScanner, resolveSearchTarget, isBinaryPath } from './files/file-scanner.js';

export type { TermDocument, BuildIndexOptions } from './index/term-index.js';
export { TermIndex } from './index/term-index.js';
export type { EmbeddingEntry, EmbeddableLine, BuildEmbeddingOptions } from './index/embedding-index.js';
export { EmbeddingIndex, cosineSimilarity } from './index/embedding-index.js';
export {
  TERM_INDEX_FILE,
  EMBEDDING_INDEX_FILE,
  loadTermIndex,
  loadEmbeddingIndex,
  saveTermIndex,
  saveEmbeddingIndex,
} from './index/index-store.js';

export type { SearchStrategy, StrategyRegistry } from './search/strategy.js';
export { KeywordStrategy } from './search/keyword-strategy.js';
export { FuzzyStrategy } from './search/fuzzy-strategy.js';
export { RegexStrategy } from './search/regex-strategy.js';
export { TfIdfStrategy } from './search/tfidf-strategy.js';
export { SemanticStrategy } from './search/semantic-strategy.js';
export { mergeResults, fuseWeighted } from './search/merge.js';
export type { IndexAvailability, PlanEnvironment, PlanError } from './search/strategy-selector.js';
export { StrategySelector, describePlan, isModeHint } from './search/strategy-selector.js';
export type { SearchEngineConfig, SearchEngineDeps } from './search/search-engine.js';
export { SearchEngine, DEFAULT_ENGINE_CONFIG } from './search/search-engine.js';

export type { OllamaEmbeddingConfig } from './embedding/ollama-embedding-provider.js';
export { OllamaEmbeddingProvider } from './embedding/ollama-embedding-provider.js';

export type { SiftRuntime, RuntimeOptions } from './runtime.js';
export { createRuntime, findProjectRoot, resolveStoragePath, RuntimeError } from './runtime.js';
