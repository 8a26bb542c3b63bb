export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface SearchConfig {
  minScore: number;
  maxResults: number;
  contextLines: number;
  /** A sequential plan runs its fallback when the primary returns fewer results. */
  qualityGate: number;
  /** Files read at once by traversal-backed strategies. */
  concurrency: number;
  exclude: string[];
  /** Limit searches to the detected project type's files and ignore list. */
  projectScope: boolean;
}

export interface CapabilityConfig {
  /** Defaults to ~/.sift/models/model.onnx when unset. */
  modelPath?: string;
  runtimeLibraries: string[];
  minMemoryMb: number;
}

export interface EmbeddingConfig {
  provider: 'ollama';
  baseUrl: string;
  model: string;
  dimensions: number;
  timeout: number;
}

export interface StorageConfig {
  path: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface SiftConfig {
  version: string;
  search: SearchConfig;
  capability: CapabilityConfig;
  embedding: EmbeddingConfig;
  storage: StorageConfig;
  logging: LoggingConfig;
}
