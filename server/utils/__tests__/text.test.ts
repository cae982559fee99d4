import { describe, expect, it } from 'vitest';
import { buildExcerpt, computeTitleSimilarity, countWords, jaccard, tokenizeTitle } from '../text';

describe('tokenizeTitle', () => {
  it('lowercases, strips punctuation and drops stop-words', () => {
    expect([...tokenizeTitle('The OpenAI Releases GPT-5!')]).toEqual(['openai', 'releases', 'gpt', '5']);
  });

  it('keeps stop-words when the title has nothing else', () => {
    expect([...tokenizeTitle('The Of And')]).toEqual(['the', 'of', 'and']);
  });

  it('returns an empty set for missing titles', () => {
    expect(tokenizeTitle(null).size).toBe(0);
  });
});

describe('computeTitleSimilarity', () => {
  it('scores near-identical headlines by token overlap', () => {
    expect(computeTitleSimilarity('OpenAI Releases GPT-5', 'OpenAI releases GPT-5 today')).toBe(0.8);
  });

  it('is symmetric', () => {
    const a = 'Chipmaker reports record revenue';
    const b = 'Record revenue for the chipmaker';
    expect(computeTitleSimilarity(a, b)).toBe(computeTitleSimilarity(b, a));
  });

  it('scores a title against itself as 1', () => {
    for (const title of ['OpenAI Releases GPT-5', 'Chips, chips & more chips!', 'The Of And', 'Ünïcode Ärticle 2025']) {
      expect(computeTitleSimilarity(title, title)).toBe(1);
    }
  });

  it('scores titles with no shared tokens as 0', () => {
    expect(computeTitleSimilarity('Solar panel efficiency record', 'Central bank holds rates')).toBe(0);
    expect(computeTitleSimilarity('The Of And', 'Museum opens exhibition')).toBe(0);
  });

  it('returns 0 when either side is empty', () => {
    expect(computeTitleSimilarity('', 'Anything at all')).toBe(0);
    expect(jaccard(new Set(), new Set(['a']))).toBe(0);
  });
});

describe('text helpers', () => {
  it('counts words after collapsing whitespace', () => {
    expect(countWords('  one   two three ')).toBe(3);
  });

  it('truncates excerpts with an ellipsis', () => {
    expect(buildExcerpt('abcdefghij', 8)).toBe('abcde...');
    expect(buildExcerpt('  short   text ', 40)).toBe('short text');
  });
});
