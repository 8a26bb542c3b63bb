import type { QueryType } from '../types/index.js';
import { loadLexicon, type Lexicon } from './lexicon.js';

/** Fragments that only show up in regular expressions. */
const REGEX_FRAGMENTS: readonly string[] = [
  '.*', '\\d+', '\\w+', '\\s+', '\\b', '\\B', '\\A', '\\Z', '\\z',
];

const REGEX_METACHARACTERS = /[[\](){}|^$?*+]/;

/** A single `?` closing a question, as in `where is the config?`. */
const TRAILING_QUESTION_MARK = /(?<=\w)\?$/;

const FILE_WORDS: ReadonlySet<string> = new Set(['file', 'files']);

/**
 * What may precede an extension: nothing, or a file name. Dotted parts after
 * the first need two characters, so `archive.tar` qualifies and `U.S` does not.
 */
const FILE_STEM = /^(?:\w[\w-]*(?:\.\w[\w-]+)*)?$/;

function splitWords(query: string): string[] {
  return query.split(/\s+/).filter((word) => word.length > 0);
}

export function looksLikeRegex(query: string): boolean {
  const candidate = query.trimEnd().replace(TRAILING_QUESTION_MARK, '');
  return (
    REGEX_FRAGMENTS.some((fragment) => candidate.includes(fragment)) ||
    REGEX_METACHARACTERS.test(candidate)
  );
}

function matchExtension(word: string, lexicon: Lexicon): string | undefined {
  const lower = word.toLowerCase();
  let best: string | undefined;
  for (const ext of lexicon.fileExtensions) {
    if (
      lower.endsWith(ext) &&
      FILE_STEM.test(lower.slice(0, lower.length - ext.length)) &&
      (best === undefined || ext.length > best.length)
    ) {
      best = ext;
    }
  }
  return best;
}

/**
 * Extensions named in the query, in order of first appearance, lowercase
 * with the leading dot.
 */
export function extractFileExtensions(query: string, lexicon: Lexicon = loadLexicon()): string[] {
  const found: string[] = [];
  for (const word of splitWords(query)) {
    const ext = matchExtension(word, lexicon);
    if (ext && !found.includes(ext)) {
      found.push(ext);
    }
  }
  return found;
}

/**
 * Removes extension references and the words "file"/"files" so that
 * `TODO in .ts files` searches for `TODO in`. A word such as `config.json`
 * keeps its stem. Returns the original query when nothing would remain.
 */
export function stripFileExtensions(query: string, lexicon: Lexicon = loadLexicon()): string {
  const kept: string[] = [];
  for (const word of splitWords(query)) {
    if (FILE_WORDS.has(word.toLowerCase())) {
      continue;
    }
    const ext = matchExtension(word, lexicon);
    const stem = ext ? word.slice(0, word.length - ext.length) : word;
    if (stem.length > 0) {
      kept.push(stem);
    }
  }
  return kept.length > 0 ? kept.join(' ') : query.trim();
}

export function containsCodeKeyword(query: string, lexicon: Lexicon = loadLexicon()): boolean {
  const words = splitWords(query.toLowerCase());
  // Longer queries only count unambiguous keywords, so prose that happens to
  // say "public" or "static" stays conceptual.
  const keywords = words.length > 2 ? lexicon.strongCodeKeywords : lexicon.broadCodeKeywords;
  return words.some((word) => keywords.has(word));
}

/**
 * Assigns every query exactly one {@link QueryType}. The checks run in a
 * fixed priority order: quotes, regex syntax, file extensions, code
 * keywords, word count.
 */
export class QueryClassifier {
  private readonly lexicon: Lexicon;

  constructor(lexicon: Lexicon = loadLexicon()) {
    this.lexicon = lexicon;
  }

  classify(query: string): QueryType {
    if (query.includes('"')) {
      return 'exact-phrase';
    }
    if (looksLikeRegex(query)) {
      return 'regex-like';
    }
    if (this.hasFileExtension(query)) {
      return 'file-extension';
    }
    if (containsCodeKeyword(query, this.lexicon)) {
      return 'code-pattern';
    }
    if (splitWords(query).length > 2) {
      return 'conceptual';
    }
    return 'exact-phrase';
  }

  private hasFileExtension(query: string): boolean {
    return splitWords(query).some((word) => matchExtension(word, this.lexicon) !== undefined);
  }
}
