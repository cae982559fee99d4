import { describe, expect, it } from 'vitest';
import { toCandidate } from '../candidates';

describe('toCandidate', () => {
  it('cuts long titles on code point boundaries', () => {
    const title = `${'a'.repeat(239)}😀b`;
    expect(toCandidate({ title, url: 'https://example.com/p/x' }, 'ai', 0, 0.5).title).toBe(`${'a'.repeat(239)}😀`);
  });

  it('takes the domain from the URL and falls back to the hit', () => {
    expect(toCandidate({ title: 'T', url: 'https://www.example.com/p/x', sourceDomain: 'other.org' }, 'ai', 0, 0.5).sourceDomain).toBe(
      'example.com',
    );
    expect(toCandidate({ title: 'T', url: '', sourceDomain: 'WWW.Other.org' }, 'ai', 0, 0.5).sourceDomain).toBe('other.org');
  });

  it('clamps editorial scores and applies the default when missing', () => {
    expect(toCandidate({ title: 'T', editorialScore: 1.7 }, 'ai', 0, 0.5).editorialScore).toBe(1);
    expect(toCandidate({ title: 'T', editorialScore: null }, 'ai', 0, 0.5).editorialScore).toBe(0.5);
  });
});
