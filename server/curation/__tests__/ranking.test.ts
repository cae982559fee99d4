import { describe, expect, it } from 'vitest';
import type { ArticleGroup } from '../../../shared/types';
import { toCandidates } from '../candidates';
import {
  combinedScore,
  groupCandidates,
  orderAndCap,
  popularityScore,
  rankGroups,
  toRankedArticle,
  type RankingOptions,
} from '../ranking';

const group = (overrides: Partial<ArticleGroup>): ArticleGroup => ({
  title: 'Untitled',
  url: 'https://example.com/p/untitled',
  sourceDomain: 'example.com',
  urlQuality: 'good',
  category: 'ai',
  members: [],
  domains: ['example.com'],
  crossSourceCount: 1,
  editorialScore: 0.5,
  popularityScore: 0,
  combinedScore: 0,
  discoveryIndex: 0,
  urlImproved: false,
  ...overrides,
});

const evenWeights: RankingOptions = {
  perDomainCap: 3,
  editorialWeight: 0.5,
  popularityWeight: 0.5,
  normalizationConstant: 4,
};

describe('scores', () => {
  it('saturates popularity at the normalization constant', () => {
    expect(popularityScore(2, 4)).toBe(0.5);
    expect(popularityScore(5, 2)).toBe(1);
    expect(popularityScore(1, 0)).toBe(1);
  });

  it('weights editorial and popularity signals', () => {
    expect(combinedScore(0.5, 1, { editorialWeight: 0.7, popularityWeight: 0.3 })).toBe(0.65);
    expect(combinedScore(2, -1, { editorialWeight: 0.7, popularityWeight: 0.3 })).toBe(0.7);
  });
});

describe('groupCandidates', () => {
  it('merges similar titles into one group with the longest title and all domains', () => {
    const groups = groupCandidates(
      toCandidates(
        [
          { title: 'OpenAI Releases GPT-5', url: 'https://openai.com/blog/gpt-5', editorialScore: 0.4 },
          { title: 'OpenAI releases GPT-5 today', url: 'https://techcrunch.com/2025/gpt-5', editorialScore: 0.9 },
          { title: 'Unrelated AI Story', url: 'https://openai.com/research/other' },
        ],
        'ai',
        0.5,
      ),
      { similarityThreshold: 0.3 },
    );

    expect(groups).toHaveLength(2);
    expect(groups[0]).toMatchObject({
      title: 'OpenAI releases GPT-5 today',
      url: 'https://openai.com/blog/gpt-5',
      sourceDomain: 'openai.com',
      crossSourceCount: 2,
      editorialScore: 0.9,
      discoveryIndex: 0,
    });
    expect(groups[1]).toMatchObject({ title: 'Unrelated AI Story', crossSourceCount: 1, discoveryIndex: 2 });
  });
});

describe('groupCandidates boundary', () => {
  it('opens a new group when similarity only equals the threshold', () => {
    const groups = groupCandidates(
      toCandidates(
        [
          { title: 'alpha beta gamma delta epsilon zeta eta', url: 'https://example.com/p/one' },
          { title: 'alpha beta gamma theta iota kappa', url: 'https://example.org/p/two' },
        ],
        'ai',
        0.5,
      ),
      { similarityThreshold: 0.3 },
    );
    expect(groups.map((entry) => entry.crossSourceCount)).toEqual([1, 1]);
  });
});

describe('rankGroups', () => {
  it('orders by combined score, then cross-source count, then discovery order', () => {
    const result = rankGroups(
      [
        group({ title: 'low', editorialScore: 0.1, discoveryIndex: 0, sourceDomain: 'a.com' }),
        group({ title: 'single', editorialScore: 0.75, crossSourceCount: 1, discoveryIndex: 1, sourceDomain: 'b.com' }),
        group({ title: 'shared', editorialScore: 0.5, crossSourceCount: 2, discoveryIndex: 2, sourceDomain: 'c.com' }),
      ],
      evenWeights,
    );

    expect(result.ranked.map((entry) => [entry.title, entry.combinedScore])).toEqual([
      ['shared', 0.5],
      ['single', 0.5],
      ['low', 0.175],
    ]);
  });

  it('keeps discovery order for complete ties', () => {
    const result = rankGroups(
      [
        group({ title: 'later', discoveryIndex: 3, sourceDomain: 'a.com' }),
        group({ title: 'earlier', discoveryIndex: 1, sourceDomain: 'b.com' }),
      ],
      evenWeights,
    );
    expect(result.ranked.map((entry) => entry.title)).toEqual(['earlier', 'later']);
  });

  it('caps each domain after sorting', () => {
    const result = rankGroups(
      [
        group({ title: 'third', editorialScore: 0.2 }),
        group({ title: 'first', editorialScore: 0.9 }),
        group({ title: 'second', editorialScore: 0.6 }),
      ],
      { ...evenWeights, perDomainCap: 2 },
    );
    expect(result.ranked.map((entry) => entry.title)).toEqual(['first', 'second']);
    expect(result.capped.map((entry) => entry.title)).toEqual(['third']);
  });

  it('returns the same sequence when run on its own output', () => {
    const first = rankGroups(
      [
        group({ title: 'a', editorialScore: 0.3, sourceDomain: 'a.com' }),
        group({ title: 'b', editorialScore: 0.8, sourceDomain: 'a.com' }),
        group({ title: 'c', editorialScore: 0.3, crossSourceCount: 3, sourceDomain: 'b.com' }),
        group({ title: 'd', editorialScore: 0.6, sourceDomain: 'a.com' }),
      ],
      { ...evenWeights, perDomainCap: 2 },
    );
    const second = rankGroups(first.ranked, { ...evenWeights, perDomainCap: 2 });

    expect(second.ranked).toEqual(first.ranked);
    expect(second.capped).toEqual([]);
  });

  it('orders pre-scored groups across categories without rescoring', () => {
    const result = orderAndCap(
      [
        group({ title: 'ai', combinedScore: 0.4, category: 'ai', sourceDomain: 'a.com' }),
        group({ title: 'chips', combinedScore: 0.9, category: 'chips', sourceDomain: 'b.com' }),
      ],
      3,
    );
    expect(result.ranked.map((entry) => entry.category)).toEqual(['chips', 'ai']);
  });
});

describe('toRankedArticle', () => {
  it('lists each contributing domain once', () => {
    const article = toRankedArticle(group({ domains: ['a.com', 'b.com', 'a.com'], crossSourceCount: 2 }));
    expect(article.sourceDomains).toEqual(['a.com', 'b.com']);
    expect(article).not.toHaveProperty('members');
  });
});
