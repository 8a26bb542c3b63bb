import type { Result } from 'neverthrow';
import type {
  ResourceRequirements,
  SearchOptions,
  SearchResult,
  SearchTarget,
} from '../types/index.js';
import type { SearchError } from '../types/errors.js';
import { tokenSpans, tokenize } from '../text/tokenizer.js';
import {
  scanLines,
  type LineMatch,
  type LineScanContext,
  type SearchStrategy,
} from './strategy.js';

const PHRASE_BONUS = 0.3;
const PARTIAL_TOKEN_SCORE = 0.5;
const WORD_CHAR = /[\p{L}\p{N}_]/u;

export type KeywordMatchOptions = Pick<SearchOptions, 'caseSensitive' | 'wholeWords'>;

/** The text inside a query wrapped in double quotes, if it is one. */
export function unquote(query: string): string | undefined {
  const trimmed = query.trim();
  if (trimmed.length > 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1);
  }
  return undefined;
}

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && WORD_CHAR.test(ch);
}

/** First occurrence of `needle`, optionally bounded by word edges. */
export function findSubstring(haystack: string, needle: string, wholeWords: boolean): number {
  if (needle.length === 0) {
    return -1;
  }
  for (let at = haystack.indexOf(needle); at !== -1; at = haystack.indexOf(needle, at + 1)) {
    if (!wholeWords) {
      return at;
    }
    const before = haystack[at - 1];
    const after = haystack[at + needle.length];
    if (!isWordChar(before) && !isWordChar(after)) {
      return at;
    }
  }
  return -1;
}

function fold(text: string, caseSensitive: boolean): string {
  return caseSensitive ? text : text.toLowerCase();
}

function hasConsecutiveRun(lineTokens: readonly string[], queryTokens: readonly string[]): boolean {
  for (let i = 0; i + queryTokens.length <= lineTokens.length; i++) {
    if (queryTokens.every((token, j) => lineTokens[i + j] === token)) {
      return true;
    }
  }
  return false;
}

/**
 * Scores one line against a keyword query.
 *
 * A quoted query only matches as a literal substring. Otherwise a line that
 * contains the whole query scores 1; failing that, query terms are matched
 * against the line's terms (1 for a full match, 0.5 for containment) and
 * averaged, with a bonus when all terms appear consecutively.
 */
export function scoreKeywordLine(
  query: string,
  line: string,
  options: KeywordMatchOptions,
): LineMatch | undefined {
  const { caseSensitive, wholeWords } = options;
  const haystack = fold(line, caseSensitive);

  const phrase = unquote(query);
  if (phrase !== undefined) {
    const needle = fold(phrase, caseSensitive);
    const at = findSubstring(haystack, needle, wholeWords);
    return at === -1
      ? undefined
      : { score: 1, matchType: 'exact', startChar: at, endChar: at + needle.length };
  }

  const needle = fold(query.trim(), caseSensitive);
  const whole = findSubstring(haystack, needle, wholeWords);
  if (whole !== -1) {
    return { score: 1, matchType: 'keyword', startChar: whole, endChar: whole + needle.length };
  }

  const queryTokens = tokenize(query, { caseSensitive });
  if (queryTokens.length === 0) {
    return undefined;
  }
  const lineSpans = tokenSpans(line, { caseSensitive });

  let total = 0;
  let startChar = Infinity;
  let endChar = -1;

  for (const queryToken of queryTokens) {
    let best = 0;
    let bestSpan: (typeof lineSpans)[number] | undefined;
    for (const span of lineSpans) {
      if (span.word === queryToken) {
        best = 1;
        bestSpan = span;
        break;
      }
      if (
        !wholeWords &&
        best < PARTIAL_TOKEN_SCORE &&
        (span.word.includes(queryToken) || queryToken.includes(span.word))
      ) {
        best = PARTIAL_TOKEN_SCORE;
        bestSpan = span;
      }
    }
    if (bestSpan) {
      total += best;
      startChar = Math.min(startChar, bestSpan.start);
      endChar = Math.max(endChar, bestSpan.end);
    }
  }

  if (total === 0) {
    return undefined;
  }

  const base = total / queryTokens.length;
  const bonus =
    queryTokens.length > 1 && hasConsecutiveRun(lineSpans.map((s) => s.word), queryTokens)
      ? PHRASE_BONUS
      : 0;
  const score = base >= 1 && bonus > 0 ? 0.95 + bonus * 0.05 : Math.min(1, base + bonus);

  return { score, matchType: 'keyword', startChar, endChar };
}

/** Exact and token-overlap matching over file lines. */
export class KeywordStrategy implements SearchStrategy {
  readonly name = 'keyword';
  private readonly context: LineScanContext;

  constructor(context: LineScanContext) {
    this.context = context;
  }

  search(
    query: string,
    target: SearchTarget,
    options: SearchOptions,
  ): Promise<Result<SearchResult[], SearchError>> {
    return scanLines(target, options, (line) => scoreKeywordLine(query, line, options), this.context);
  }

  requiredResources(): ResourceRequirements {
    return { minMemoryMb: 10, requiresMl: false, requiresIndex: false, cpuIntensive: false };
  }
}
