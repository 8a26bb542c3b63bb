import type { SemanticNeedScore } from '../types/index.js';
import { bigramKey, loadLexicon, type Lexicon } from './lexicon.js';

const QUESTION_WORDS: ReadonlySet<string> = new Set([
  'how', 'what', 'why', 'when', 'where', 'which', 'who', 'does', 'can', 'should', 'would',
]);

/** Indexed by token count, capped at five. */
const LENGTH_FACTORS: readonly number[] = [0, 0, 0.2, 0.4, 0.5, 0.6];

const ENTITY_PATTERNS: readonly RegExp[] = [
  /^[A-Z][a-z]+$/,
  /^[A-Z]+[0-9]+$/,
  /^[A-Z]{2,}$/,
  /^[A-Z][a-z]+[A-Z]/,
];

const W_BASE = 0.2;
const W_VOCABULARY = 0.5;
const W_COHERENCE = 0.1;
const W_CONCEPTS = 0.1;
const W_LENGTH = 0.2;
const W_QUESTION = 0.1;

const UNKNOWN_WORD_BASE = 0.3;
const UNKNOWN_BIGRAM = 0.3;
const OPERATOR_DAMPING = 0.3;

interface Token {
  original: string;
  /** Lowercase, letters, digits and underscores only. */
  word: string;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function stripPunctuation(text: string): string {
  return text.replace(/[^\p{L}\p{N}_]/gu, '');
}

function tokenize(query: string): Token[] {
  return query
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .map((original) => ({ original, word: stripPunctuation(original).toLowerCase() }));
}

/** Quotes, wildcards, `+term` and `-term` mark a query as keyword-style. */
function hasOperators(query: string, tokens: readonly Token[]): boolean {
  if (/["*+]/.test(query)) {
    return true;
  }
  return tokens.some((token) => token.original.length > 1 && token.original.startsWith('-'));
}

/**
 * Estimates how much a query would benefit from meaning-based search over
 * literal matching, from lexical features alone.
 *
 * Each feature is a maximum or a saturating sum over tokens, so appending a
 * token never lowers the score unless it introduces a search operator.
 */
export class SemanticNeedScorer {
  private readonly lexicon: Lexicon;

  constructor(lexicon: Lexicon = loadLexicon()) {
    this.lexicon = lexicon;
  }

  score(query: string): SemanticNeedScore {
    const tokens = tokenize(query);
    if (tokens.length === 0) {
      return { needsSemantic: 0, confidence: 0, explanation: 'Empty query' };
    }

    const vocabulary = Math.max(...tokens.map((token) => this.tokenWeight(token)));
    const coherence = this.coherence(tokens);
    const concepts = Math.min(1, tokens.reduce((sum, token) => sum + conceptWeight(token.original), 0));
    const length = LENGTH_FACTORS[Math.min(tokens.length, 5)] ?? 0;
    const question = QUESTION_WORDS.has(tokens[0]?.word ?? '');
    const operators = hasOperators(query, tokens);

    const raw = clamp01(
      W_BASE +
        W_VOCABULARY * vocabulary +
        W_COHERENCE * coherence +
        W_CONCEPTS * concepts +
        W_LENGTH * length +
        (question ? W_QUESTION : 0),
    );

    const known = tokens.filter((token) => this.lexicon.semanticVocabulary.has(token.word)).length;
    const confidence = (known / tokens.length) * 0.7 + Math.min(tokens.length / 10, 1) * 0.3;

    const reasons: string[] = [];
    if (operators) reasons.push('Contains search operators');
    if (vocabulary > 0.6) reasons.push('Contains semantically rich terms');
    if (coherence > 0.7) reasons.push('Terms show strong relationships');
    if (concepts > 0.5) reasons.push('Multiple concepts or entities detected');
    if (question) reasons.push('Phrased as a question');

    return {
      needsSemantic: operators ? raw * OPERATOR_DAMPING : raw,
      confidence: clamp01(confidence),
      explanation: reasons.length > 0 ? reasons.join(', ') : 'Simple keyword query',
    };
  }

  private tokenWeight(token: Token): number {
    const known = this.lexicon.semanticVocabulary.get(token.word);
    if (known !== undefined) {
      return known / 255;
    }

    let oov = 0;
    for (const { affix, weight } of this.lexicon.conceptAffixes) {
      if (token.word.startsWith(affix) || token.word.endsWith(affix)) {
        oov = Math.max(oov, weight / 255);
      }
    }
    const bare = stripPunctuation(token.original);
    if (ENTITY_PATTERNS.some((pattern) => pattern.test(bare))) {
      oov = Math.max(oov, 0.7);
    }
    if (/^\p{Lu}/u.test(bare)) {
      oov += 0.05;
    }
    return UNKNOWN_WORD_BASE + oov * (1 - UNKNOWN_WORD_BASE);
  }

  private coherence(tokens: readonly Token[]): number {
    let best = 0;
    for (let i = 1; i < tokens.length; i++) {
      const first = tokens[i - 1];
      const second = tokens[i];
      if (!first || !second) continue;
      const known = this.lexicon.coherentBigrams.get(bigramKey(first.word, second.word));
      best = Math.max(best, known !== undefined ? known / 255 : UNKNOWN_BIGRAM);
    }
    return best;
  }
}

function conceptWeight(original: string): number {
  let weight = 0;
  if (/^\p{Lu}/u.test(original)) {
    weight += 0.3;
  }
  if (/\p{Lu}/u.test(original) && /\p{Ll}/u.test(original)) {
    weight += 0.4;
  }
  return weight;
}
