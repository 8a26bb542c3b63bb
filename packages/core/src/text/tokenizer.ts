import { readFileSync } from 'node:fs';
import { z } from 'zod';

export interface WordSpan {
  word: string;
  start: number;
  end: number;
}

export interface TokenizeOptions {
  caseSensitive?: boolean;
}

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;
const NUMERIC = /^\p{N}+$/u;

let stopWords: ReadonlySet<string> | undefined;

function loadStopWords(): ReadonlySet<string> {
  if (!stopWords) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL('./data/stop-words.json', import.meta.url), 'utf-8'),
    );
    stopWords = new Set(z.array(z.string()).parse(raw));
  }
  return stopWords;
}

export function isStopWord(word: string): boolean {
  return loadStopWords().has(word.toLowerCase());
}

/** Every run of letters, digits and underscores, with offsets into `text`. */
export function wordSpans(text: string): WordSpan[] {
  const spans: WordSpan[] = [];
  for (const match of text.matchAll(WORD_PATTERN)) {
    const start = match.index ?? 0;
    spans.push({ word: match[0], start, end: start + match[0].length });
  }
  return spans;
}

/**
 * Search terms of a text with their offsets: words of two or more
 * characters that are neither stop words nor plain numbers, lowercased
 * unless `caseSensitive`.
 */
export function tokenSpans(text: string, options: TokenizeOptions = {}): WordSpan[] {
  const spans: WordSpan[] = [];
  for (const span of wordSpans(text)) {
    if (span.word.length < 2 || NUMERIC.test(span.word) || isStopWord(span.word)) {
      continue;
    }
    spans.push(options.caseSensitive ? span : { ...span, word: span.word.toLowerCase() });
  }
  return spans;
}

export function tokenize(text: string, options: TokenizeOptions = {}): string[] {
  return tokenSpans(text, options).map((span) => span.word);
}
