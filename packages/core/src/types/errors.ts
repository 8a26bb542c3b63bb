export type SearchErrorKind =
  | 'invalid-pattern'
  | 'unknown-strategy'
  | 'index-unavailable'
  | 'io-failure'
  | 'embedding-failed'
  | 'aborted';

export abstract class SearchError extends Error {
  abstract readonly kind: SearchErrorKind;
}

export class InvalidPatternError extends SearchError {
  readonly kind = 'invalid-pattern';
  readonly pattern: string;

  constructor(pattern: string, message: string) {
    super(`Invalid pattern "${pattern}": ${message}`);
    this.name = 'InvalidPatternError';
    this.pattern = pattern;
  }
}

export class UnknownStrategyError extends SearchError {
  readonly kind = 'unknown-strategy';
  readonly strategy: string;

  constructor(strategy: string) {
    super(`Unknown search mode: ${strategy}`);
    this.name = 'UnknownStrategyError';
    this.strategy = strategy;
  }
}

export class IndexUnavailableError extends SearchError {
  readonly kind = 'index-unavailable';

  constructor(message: string) {
    super(message);
    this.name = 'IndexUnavailableError';
  }
}

export class IoFailureError extends SearchError {
  readonly kind = 'io-failure';
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Failed to read ${path}: ${message}`);
    this.name = 'IoFailureError';
    this.path = path;
  }
}

export class EmbeddingFailedError extends SearchError {
  readonly kind = 'embedding-failed';

  constructor(message: string) {
    super(message);
    this.name = 'EmbeddingFailedError';
  }
}

export class SearchAbortedError extends SearchError {
  readonly kind = 'aborted';

  constructor(message: string) {
    super(message);
    this.name = 'SearchAbortedError';
  }
}
