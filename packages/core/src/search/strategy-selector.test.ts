import { describe, it, expect } from 'vitest';
import type { ResourceRequirements, SemanticNeedScore, StrategyName } from '../types/index.js';
import {
  StrategySelector,
  describePlan,
  isModeHint,
  type PlanEnvironment,
} from './strategy-selector.js';

const requirements = new Map<StrategyName, ResourceRequirements>([
  ['keyword', { minMemoryMb: 10, requiresMl: false, requiresIndex: false, cpuIntensive: false }],
  ['fuzzy', { minMemoryMb: 20, requiresMl: false, requiresIndex: false, cpuIntensive: true }],
  ['regex', { minMemoryMb: 15, requiresMl: false, requiresIndex: false, cpuIntensive: true }],
  ['tfidf', { minMemoryMb: 50, requiresMl: false, requiresIndex: true, cpuIntensive: true }],
  ['semantic', { minMemoryMb: 512, requiresMl: true, requiresIndex: true, cpuIntensive: true }],
]);

const selector = new StrategySelector(requirements);

const lexicalOnly: PlanEnvironment = {
  capability: { status: 'unavailable', reason: 'Neural runtime library not found' },
  availability: { termIndex: false, embeddingIndex: false },
  memoryMb: 8192,
};

const withTermIndex: PlanEnvironment = {
  ...lexicalOnly,
  availability: { termIndex: true, embeddingIndex: false },
};

const fullyCapable: PlanEnvironment = {
  capability: { status: 'available' },
  availability: { termIndex: true, embeddingIndex: true },
  memoryMb: 8192,
};

function need(needsSemantic: number): SemanticNeedScore {
  return { needsSemantic, confidence: 0.5, explanation: 'test' };
}

describe('StrategySelector', () => {
  describe('automatic policy', () => {
    it('should run regex-like queries as a single regex step', () => {
      const plan = selector.plan('TODO.*', 'regex-like', need(0), lexicalOnly);
      expect(plan._unsafeUnwrap()).toEqual({ kind: 'single', step: { strategy: 'regex', query: 'TODO.*' } });
    });

    it('should map code patterns to a regex with keyword fallback', () => {
      const plan = selector.plan('TODO', 'code-pattern', need(0), lexicalOnly);
      expect(plan._unsafeUnwrap()).toEqual({
        kind: 'sequential',
        primary: { strategy: 'regex', query: 'TODO.*' },
        fallback: { strategy: 'keyword', query: 'TODO' },
      });
    });

    it('should restrict file-extension queries to the named extensions', () => {
      const plan = selector.plan('TODO .rs files', 'file-extension', need(0), lexicalOnly);
      expect(plan._unsafeUnwrap()).toEqual({
        kind: 'sequential',
        primary: { strategy: 'keyword', query: 'TODO', extensions: ['.rs'] },
        fallback: { strategy: 'fuzzy', query: 'TODO', extensions: ['.rs'] },
      });
    });

    it('should keep quotes for keyword and drop them for fuzzy', () => {
      const plan = selector.plan('"fix parser"', 'exact-phrase', need(0), lexicalOnly);
      expect(plan._unsafeUnwrap()).toEqual({
        kind: 'sequential',
        primary: { strategy: 'keyword', query: '"fix parser"' },
        fallback: { strategy: 'fuzzy', query: 'fix parser' },
      });
    });

    it('should fall back to keyword and fuzzy for conceptual queries without indexes', () => {
      const plan = selector.plan('how errors propagate', 'conceptual', need(0.9), lexicalOnly);
      expect(describePlan(plan._unsafeUnwrap())).toBe('sequential(keyword -> fuzzy)');
    });

    it('should prefer tfidf for conceptual queries when the term index exists', () => {
      const plan = selector.plan('how errors propagate', 'conceptual', need(0.9), withTermIndex);
      expect(describePlan(plan._unsafeUnwrap())).toBe('sequential(tfidf -> keyword)');
    });

    it('should go fully semantic for a high semantic need', () => {
      const plan = selector.plan('how errors propagate', 'conceptual', need(0.8), fullyCapable);
      expect(plan._unsafeUnwrap()).toEqual({
        kind: 'single',
        step: { strategy: 'semantic', query: 'how errors propagate' },
      });
    });

    it('should blend semantic and tfidf in the hybrid band', () => {
      const plan = selector.plan('how errors propagate', 'conceptual', need(0.6), fullyCapable)._unsafeUnwrap();
      expect(plan.kind).toBe('hybrid');
      if (plan.kind === 'hybrid') {
        expect(plan.steps.map((s) => s.strategy)).toEqual(['semantic', 'tfidf']);
        expect(plan.steps[0]?.weight).toBeCloseTo(0.6);
        expect(plan.steps[1]?.weight).toBeCloseTo(0.4);
      }
    });

    it('should stay lexical below the hybrid band', () => {
      const plan = selector.plan('how errors propagate', 'conceptual', need(0.5), fullyCapable);
      expect(describePlan(plan._unsafeUnwrap())).toBe('sequential(tfidf -> keyword)');
    });

    it('should never choose semantic for code patterns', () => {
      const plan = selector.plan('TODO', 'code-pattern', need(1), fullyCapable);
      expect(describePlan(plan._unsafeUnwrap())).toBe('sequential(regex -> keyword)');
    });

    it('should prune strategies that need more memory than reported', () => {
      const plan = selector.plan('TODO', 'code-pattern', need(0), { ...lexicalOnly, memoryMb: 12 });
      expect(plan._unsafeUnwrap()).toEqual({ kind: 'single', step: { strategy: 'keyword', query: 'TODO' } });
    });
  });

  describe('file-type routing', () => {
    const docsOnly: PlanEnvironment = { ...lexicalOnly, projectType: 'documentation' };

    it('should give each file type its own steps for lexical conceptual queries in documentation roots', () => {
      const plan = selector.plan('how errors propagate', 'conceptual', need(0.2), docsOnly);
      expect(describePlan(plan._unsafeUnwrap())).toBe(
        'hybrid(regex[code]:1.00, keyword[code]:1.00, keyword[documentation]:1.00, fuzzy[documentation]:1.00, ' +
          'keyword[configuration]:1.00, keyword[data]:1.00, regex[data]:1.00, fuzzy[unknown]:1.00)',
      );
    });

    it('should read documentation through tfidf in mixed roots with a term index', () => {
      const plan = selector.plan('how errors propagate', 'conceptual', need(0.2), {
        ...withTermIndex,
        projectType: 'mixed',
      })._unsafeUnwrap();
      expect(plan.kind).toBe('hybrid');
      if (plan.kind === 'hybrid') {
        expect(plan.steps.filter((s) => s.fileType === 'documentation').map((s) => s.strategy)).toEqual([
          'tfidf',
          'fuzzy',
        ]);
      }
    });

    it('should read documentation semantically when semantic search is eligible', () => {
      expect(selector.strategiesForFileType('documentation', { ...fullyCapable, projectType: 'documentation' })).toEqual([
        'semantic',
        'fuzzy',
      ]);
    });

    it('should still go fully semantic for a high semantic need', () => {
      const plan = selector.plan('how errors propagate', 'conceptual', need(0.8), {
        ...fullyCapable,
        projectType: 'documentation',
      });
      expect(describePlan(plan._unsafeUnwrap())).toBe('single(semantic)');
    });

    it('should match the query literally in regex steps', () => {
      const plan = selector.plan('what is a.b', 'conceptual', need(0), docsOnly)._unsafeUnwrap();
      expect(plan.kind).toBe('hybrid');
      if (plan.kind === 'hybrid') {
        expect(plan.steps[0]).toEqual({ strategy: 'regex', query: 'what is a\\.b', weight: 1, fileType: 'code' });
        expect(plan.steps[1]).toEqual({ strategy: 'keyword', query: 'what is a.b', weight: 1, fileType: 'code' });
      }
    });

    it('should keep the file type on steps that survive pruning', () => {
      const plan = selector.plan('how errors propagate', 'conceptual', need(0), { ...docsOnly, memoryMb: 12 });
      expect(describePlan(plan._unsafeUnwrap())).toBe(
        'hybrid(keyword[code]:1.00, keyword[documentation]:1.00, keyword[configuration]:1.00, keyword[data]:1.00)',
      );
    });

    it('should leave code projects on the lexical fallback chain', () => {
      const plan = selector.plan('how errors propagate', 'conceptual', need(0.2), {
        ...lexicalOnly,
        projectType: 'javascript',
      });
      expect(describePlan(plan._unsafeUnwrap())).toBe('sequential(keyword -> fuzzy)');
    });
  });

  describe('explicit modes', () => {
    it('should map a strategy name to a single step', () => {
      const plan = selector.plan('databse', 'exact-phrase', need(0), lexicalOnly, 'fuzzy');
      expect(plan._unsafeUnwrap()).toEqual({ kind: 'single', step: { strategy: 'fuzzy', query: 'databse' } });
    });

    it('should reject unknown modes', () => {
      const plan = selector.plan('x', 'exact-phrase', need(0), lexicalOnly, 'telepathy');
      expect(plan.isErr()).toBe(true);
      if (plan.isErr()) {
        expect(plan.error.kind).toBe('unknown-strategy');
        expect(plan.error.message).toBe('Unknown search mode: telepathy');
      }
    });

    it('should refuse semantic when the capability is unavailable', () => {
      const plan = selector.plan('x', 'conceptual', need(1), lexicalOnly, 'semantic');
      expect(plan.isErr()).toBe(true);
      if (plan.isErr()) {
        expect(plan.error.kind).toBe('index-unavailable');
        expect(plan.error.message).toBe('Semantic search unavailable: Neural runtime library not found');
      }
    });

    it('should refuse tfidf without a term index', () => {
      const plan = selector.plan('x', 'conceptual', need(0), lexicalOnly, 'tfidf');
      expect(plan.isErr()).toBe(true);
      if (plan.isErr()) {
        expect(plan.error.message).toBe('TF-IDF index not found; run "sift index" first');
      }
    });

    it('should build a lexical hybrid when semantic is not eligible', () => {
      const plan = selector.plan('x', 'conceptual', need(0), lexicalOnly, 'hybrid');
      expect(describePlan(plan._unsafeUnwrap())).toBe('hybrid(keyword:0.50, fuzzy:0.50)');
    });

    it('should build a semantic hybrid when semantic is eligible', () => {
      const plan = selector.plan('x', 'conceptual', need(0), fullyCapable, 'hybrid');
      expect(describePlan(plan._unsafeUnwrap())).toBe('hybrid(semantic:0.50, tfidf:0.50)');
    });
  });
});

describe('isModeHint', () => {
  it('should accept known modes only', () => {
    expect(isModeHint('auto')).toBe(true);
    expect(isModeHint('tfidf')).toBe(true);
    expect(isModeHint('vector')).toBe(false);
  });
});
