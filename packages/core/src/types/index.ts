export type {
  MatchType,
  QueryType,
  StrategyName,
  ModeHint,
  FileType,
  SearchResult,
  SearchOptions,
  SearchTarget,
  ResourceRequirements,
  PlanStep,
  StrategyPlan,
  SemanticNeedScore,
} from './search.js';
export { STRATEGY_NAMES, MODE_HINTS, FILE_TYPES, DEFAULT_SEARCH_OPTIONS } from './search.js';
export type { ProjectType, ProjectProfile } from './project.js';
export { PROJECT_TYPES } from './project.js';
export type { NeuralCapability, MemoryInfo, CapabilityDetails, CapabilityTier } from './capability.js';
export type { SearchErrorKind } from './errors.js';
export {
  SearchError,
  InvalidPatternError,
  UnknownStrategyError,
  IndexUnavailableError,
  IoFailureError,
  EmbeddingFailedError,
  SearchAbortedError,
} from './errors.js';
export type { EmbeddingProvider } from './provider.js';
export type {
  SiftConfig,
  SearchConfig,
  CapabilityConfig,
  EmbeddingConfig,
  StorageConfig,
  LoggingConfig,
  LogLevel,
} from './config.js';
