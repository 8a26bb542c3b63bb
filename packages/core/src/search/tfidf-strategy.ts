import { ok, err, type Result } from 'neverthrow';
import type { TermIndex } from '../index/term-index.js';
import { tokenSpans, tokenize } from '../text/tokenizer.js';
import type {
  ResourceRequirements,
  SearchOptions,
  SearchResult,
  SearchTarget,
} from '../types/index.js';
import { IndexUnavailableError, SearchAbortedError, type SearchError } from '../types/errors.js';
import { getAbortReason } from '../utils/abort.js';
import type { SearchStrategy } from './strategy.js';

const EXACT_PHRASE_BONUS = 0.3;
const PARTIAL_PHRASE_BONUS = 0.1;
const MAX_PHRASE_BONUS = 0.5;
const OPTIMAL_MIN_TOKENS = 20;
const OPTIMAL_MAX_TOKENS = 100;

function phraseBonus(terms: readonly string[], tokens: readonly string[]): number {
  if (terms.length < 2) {
    return 0;
  }
  const needed = Math.ceil(terms.length / 2);
  let bonus = 0;
  for (let i = 0; i + terms.length <= tokens.length; i++) {
    let matches = 0;
    for (let j = 0; j < terms.length; j++) {
      if (tokens[i + j] === terms[j]) {
        matches++;
      }
    }
    if (matches === terms.length) {
      bonus += EXACT_PHRASE_BONUS;
    } else if (matches >= needed) {
      bonus += PARTIAL_PHRASE_BONUS;
    }
  }
  return Math.min(bonus, MAX_PHRASE_BONUS);
}

function lengthPenalty(length: number): number {
  if (length < OPTIMAL_MIN_TOKENS) {
    return Math.max(length / OPTIMAL_MIN_TOKENS, 0.5);
  }
  if (length > OPTIMAL_MAX_TOKENS) {
    return Math.max(OPTIMAL_MAX_TOKENS / length, 0.7);
  }
  return 1;
}

/**
 * TF-IDF relevance of one document: `(1 + ln count) * ln(N / df)` averaged
 * over the query terms, plus a phrase bonus, scaled by a length penalty.
 * Returns 0 when no query term occurs in the document.
 */
export function scoreTfIdf(
  terms: readonly string[],
  tokens: readonly string[],
  index: Pick<TermIndex, 'size' | 'documentFrequency'>,
): number {
  if (terms.length === 0 || tokens.length === 0) {
    return 0;
  }

  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  let matched = false;
  let sum = 0;
  for (const term of terms) {
    const count = counts.get(term) ?? 0;
    if (count === 0) {
      continue;
    }
    matched = true;
    const df = index.documentFrequency(term);
    const idf = df === 0 ? 0 : Math.log(index.size / df);
    sum += (1 + Math.log(count)) * idf;
  }
  if (!matched) {
    return 0;
  }

  const base = sum / terms.length;
  return Math.min((base + phraseBonus(terms, tokens)) * lengthPenalty(tokens.length), 1);
}

function matchSpan(content: string, terms: ReadonlySet<string>): { startChar: number; endChar: number } {
  const hits = tokenSpans(content).filter((span) => terms.has(span.word));
  const first = hits[0];
  const last = hits[hits.length - 1];
  if (!first || !last) {
    return { startChar: 0, endChar: Math.min(content.length, 100) };
  }
  return { startChar: first.start, endChar: last.end };
}

/** Ranks indexed lines by TF-IDF over the query terms. */
export class TfIdfStrategy implements SearchStrategy {
  readonly name = 'tfidf';
  private readonly index: TermIndex | undefined;

  constructor(index: TermIndex | undefined) {
    this.index = index;
  }

  async search(
    query: string,
    target: SearchTarget,
    options: SearchOptions,
  ): Promise<Result<SearchResult[], SearchError>> {
    if (!this.index) {
      return err(new IndexUnavailableError('TF-IDF index not found; run "sift index" first'));
    }
    if (options.signal?.aborted) {
      return err(new SearchAbortedError(`Search cancelled: ${getAbortReason(options.signal)}`));
    }

    const terms = tokenize(query);
    if (terms.length === 0 || this.index.size === 0) {
      return ok([]);
    }

    const termSet = new Set(terms);
    const files = new Set(target.files);
    const results: SearchResult[] = [];

    for (const doc of this.index.documents()) {
      if (!files.has(doc.filePath)) {
        continue;
      }
      const score = scoreTfIdf(terms, doc.tokens, this.index);
      if (score > 0 && score >= options.minScore) {
        results.push({
          filePath: doc.filePath,
          lineNumber: doc.lineNumber,
          content: doc.content,
          score,
          matchType: 'tfidf',
          ...matchSpan(doc.content, termSet),
        });
      }
    }

    return ok(results);
  }

  requiredResources(): ResourceRequirements {
    return { minMemoryMb: 50, requiresMl: false, requiresIndex: true, cpuIntensive: true };
  }
}
