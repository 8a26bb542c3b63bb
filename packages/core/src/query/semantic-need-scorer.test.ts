import { describe, it, expect } from 'vitest';
import { SemanticNeedScorer } from './semantic-need-scorer.js';

describe('SemanticNeedScorer', () => {
  const scorer = new SemanticNeedScorer();

  it('should score an empty query as zero', () => {
    expect(scorer.score('   ')).toEqual({ needsSemantic: 0, confidence: 0, explanation: 'Empty query' });
  });

  it('should rate a plain unknown phrase as a keyword query', () => {
    const result = scorer.score('foo bar baz');

    expect(result.needsSemantic).toBeCloseTo(0.46, 5);
    expect(result.confidence).toBeCloseTo(0.09, 5);
    expect(result.explanation).toBe('Simple keyword query');
  });

  it('should reward known vocabulary and coherent bigrams', () => {
    const result = scorer.score('error handling patterns');

    expect(result.needsSemantic).toBeCloseTo(0.2 + 0.5 * (165 / 255) + 0.1 * (205 / 255) + 0.08, 5);
    expect(result.confidence).toBeCloseTo(0.7 / 3 + 0.09, 5);
    expect(result.explanation).toBe('Contains semantically rich terms, Terms show strong relationships');
  });

  it('should boost questions', () => {
    const result = scorer.score('how does authentication work');

    expect(result.needsSemantic).toBeCloseTo(0.2 + 0.5 * (175 / 255) + 0.03 + 0.1 + 0.1, 5);
    expect(result.confidence).toBeCloseTo(0.645, 5);
    expect(result.explanation).toBe('Contains semantically rich terms, Phrased as a question');
  });

  it('should treat capitalized unknown words as entities', () => {
    const result = scorer.score('Kubernetes');

    expect(result.needsSemantic).toBeCloseTo(0.2 + 0.5 * 0.825 + 0.1 * 0.7, 5);
    expect(result.explanation).toBe(
      'Contains semantically rich terms, Multiple concepts or entities detected',
    );
  });

  it('should push the score down sharply when operators are present', () => {
    const plain = scorer.score('error handling patterns');
    const quoted = scorer.score('"error handling" patterns');

    expect(quoted.needsSemantic).toBeCloseTo(plain.needsSemantic * 0.3, 5);
    expect(quoted.explanation.startsWith('Contains search operators')).toBe(true);
    expect(scorer.score('-legacy config').explanation).toBe('Contains search operators');
    expect(scorer.score('config*').needsSemantic).toBeLessThan(0.3);
  });

  it('should not treat hyphenated words as operators', () => {
    expect(scorer.score('real-time').explanation).toBe('Simple keyword query');
  });

  it('should be monotonic in token count without operators', () => {
    const words = 'how does authentication work across distributed systems today'.split(' ');
    let previous = -1;
    for (let n = 1; n <= words.length; n++) {
      const { needsSemantic } = scorer.score(words.slice(0, n).join(' '));
      expect(needsSemantic).toBeGreaterThanOrEqual(previous);
      previous = needsSemantic;
    }
  });

  it('should keep scores within [0, 1]', () => {
    const queries = [
      'What Is The Relationship Between Memory Management And Concurrency Architecture',
      'x',
      '+a -b "c" *',
    ];
    for (const query of queries) {
      const { needsSemantic, confidence } = scorer.score(query);
      expect(needsSemantic).toBeGreaterThanOrEqual(0);
      expect(needsSemantic).toBeLessThanOrEqual(1);
      expect(confidence).toBeGreaterThanOrEqual(0);
      expect(confidence).toBeLessThanOrEqual(1);
    }
  });
});
