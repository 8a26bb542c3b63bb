import { ok, err, type Result } from 'neverthrow';
import type {
  ResourceRequirements,
  SearchOptions,
  SearchResult,
  SearchTarget,
} from '../types/index.js';
import { InvalidPatternError, type SearchError } from '../types/errors.js';
import {
  clampScore,
  scanLines,
  type LineMatch,
  type LineScanContext,
  type SearchStrategy,
} from './strategy.js';

const PATTERN_CHARS = /[[({*+?^$|\\]/;
const ALNUM = /[\p{L}\p{N}]/u;

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** True when the query should be compiled as written rather than escaped. */
export function isRegexPattern(query: string): boolean {
  return PATTERN_CHARS.test(query);
}

const COMMENT_MARKERS = new Set(['TODO', 'FIXME', 'HACK', 'NOTE', 'WARNING', 'ERROR', 'BUG']);
const DECLARATION_KEYWORDS = new Set(['CLASS', 'STRUCT', 'ENUM', 'TRAIT', 'IMPL']);

const FIXED_PATTERNS: Readonly<Record<string, string>> = {
  FUNCTION: 'fn\\s+\\w+',
  FN: 'fn\\s+\\w+',
  IMPORT: 'import\\s+.*',
  EXPORT: 'export\\s+.*',
  ASYNC: 'async\\s+fn\\s+\\w+',
  AWAIT: 'await\\s+.*',
};

/** Regex used for a query classified as a code pattern. */
export function codePatternToRegex(query: string): string {
  const keyword = query.trim().toUpperCase();
  if (COMMENT_MARKERS.has(keyword)) {
    return `${keyword}.*`;
  }
  if (DECLARATION_KEYWORDS.has(keyword)) {
    return `${keyword.toLowerCase()}\\s+\\w+`;
  }
  return FIXED_PATTERNS[keyword] ?? `${escapeRegExp(query.trim())}.*`;
}

export function compilePattern(
  query: string,
  options: Pick<SearchOptions, 'caseSensitive' | 'wholeWords'>,
): Result<RegExp, InvalidPatternError> {
  let source: string;
  if (isRegexPattern(query)) {
    source = query;
  } else {
    const escaped = escapeRegExp(query);
    source = options.wholeWords ? `\\b${escaped}\\b` : escaped;
  }
  try {
    return ok(new RegExp(source, options.caseSensitive ? '' : 'i'));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new InvalidPatternError(query, message));
  }
}

function isBoundaryMatch(line: string, start: number, end: number): boolean {
  const before = line[start - 1];
  const after = line[end];
  return (before === undefined || !ALNUM.test(before)) && (after === undefined || !ALNUM.test(after));
}

/** First match with at least one character; empty matches are stepped over. */
function firstNonEmptyMatch(pattern: RegExp, line: string): RegExpExecArray | null {
  const first = pattern.exec(line);
  if (!first || first[0].length > 0) {
    return first;
  }

  const scanner = new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
  scanner.lastIndex = first.index + 1;
  while (scanner.lastIndex <= line.length) {
    const match = scanner.exec(line);
    if (!match) {
      return null;
    }
    if (match[0].length > 0) {
      return match;
    }
    scanner.lastIndex = match.index + 1;
  }
  return null;
}

/**
 * Scores the first non-empty match of `pattern` in a line. Longer coverage, whole-word
 * matches and matches at the start of the line score higher; matches shorter
 * than three characters are penalised.
 */
export function scoreRegexLine(pattern: RegExp, line: string): LineMatch | undefined {
  const match = firstNonEmptyMatch(pattern, line);
  if (!match || line.length === 0) {
    return undefined;
  }

  const start = match.index;
  const end = start + match[0].length;
  const coverage = Math.min(1, match[0].length / line.length);

  const score = clampScore(
    0.7 +
      coverage * 0.2 +
      (isBoundaryMatch(line, start, end) ? 0.2 : 0) +
      (start === 0 ? 0.1 : 0) -
      (match[0].length < 3 ? 0.1 : 0),
  );

  return { score, matchType: 'regex', startChar: start, endChar: end };
}

/** Regular-expression matching; plain queries are escaped first. */
export class RegexStrategy implements SearchStrategy {
  readonly name = 'regex';
  private readonly context: LineScanContext;

  constructor(context: LineScanContext) {
    this.context = context;
  }

  async search(
    query: string,
    target: SearchTarget,
    options: SearchOptions,
  ): Promise<Result<SearchResult[], SearchError>> {
    const compiled = compilePattern(query, options);
    if (compiled.isErr()) {
      return err(compiled.error);
    }
    const pattern = compiled.value;
    return scanLines(target, options, (line) => scoreRegexLine(pattern, line), this.context);
  }

  requiredResources(): ResourceRequirements {
    return { minMemoryMb: 15, requiresMl: false, requiresIndex: false, cpuIntensive: true };
  }
}
