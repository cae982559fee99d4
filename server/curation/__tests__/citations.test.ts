import { describe, expect, it } from 'vitest';
import { auditCitations, extractMarkdownLinks, fixCitations, isDomainOnlyUrl } from '../citations';

const report = 'See [GPT-5 launch](https://openai.com/index/gpt-5/) and [OpenAI](https://openai.com/) for details.';

describe('auditCitations', () => {
  it('extracts markdown links in order', () => {
    expect(extractMarkdownLinks(report)).toEqual([
      { text: 'GPT-5 launch', url: 'https://openai.com/index/gpt-5/' },
      { text: 'OpenAI', url: 'https://openai.com/' },
    ]);
  });

  it('flags bare-domain links and curated URLs that were never cited', () => {
    const result = auditCitations(report, [
      'https://openai.com/index/gpt-5?utm_source=news',
      'https://example.com/blog/missing',
    ]);

    expect(result.domainOnly).toEqual([{ text: 'OpenAI', url: 'https://openai.com/' }]);
    expect(result.uncited).toEqual(['https://example.com/blog/missing']);
  });

  it('treats a root URL as domain-only whatever its query string', () => {
    expect(isDomainOnlyUrl('https://example.com/?utm_source=feed')).toBe(true);
    expect(isDomainOnlyUrl('https://example.com/blog/post?id=2')).toBe(false);
    expect(isDomainOnlyUrl('https://example.com')).toBe(true);
    expect(isDomainOnlyUrl('not a url')).toBe(false);
  });
});

describe('fixCitations', () => {
  const articles = [
    { title: 'OpenAI previews new reasoning model today', url: 'https://openai.com/index/new-reasoning-model/' },
    { title: 'Unrelated story about maps', url: 'https://example.com/blog/maps' },
    { title: 'Example Labs homepage', url: 'https://example.com/' },
  ];

  it('points bare-domain links at the matching curated article', () => {
    const markdown = [
      '**Sources:**',
      '- [OpenAI previews new reasoning model](https://openai.com/)',
      '- [Example Labs](https://example.com/)',
      '- [Launch post](https://openai.com/index/launch/)',
    ].join('\n');

    const result = fixCitations(markdown, articles);

    expect(result.markdown).toBe(
      [
        '**Sources:**',
        '- [OpenAI previews new reasoning model](https://openai.com/index/new-reasoning-model/)',
        '- [Example Labs](https://example.com/)',
        '- [Launch post](https://openai.com/index/launch/)',
      ].join('\n'),
    );
    expect(result.replacements).toEqual([
      {
        text: 'OpenAI previews new reasoning model',
        from: 'https://openai.com/',
        to: 'https://openai.com/index/new-reasoning-model/',
      },
    ]);
  });

  it('fixes roots that carry tracking parameters', () => {
    const result = fixCitations('[OpenAI previews new reasoning model](https://www.openai.com/?utm_source=feed)', articles);
    expect(result.markdown).toBe('[OpenAI previews new reasoning model](https://openai.com/index/new-reasoning-model/)');
  });

  it('never borrows an article from another domain', () => {
    const markdown = '[OpenAI previews new reasoning model](https://techcrunch.com/)';
    expect(fixCitations(markdown, articles)).toEqual({ markdown, replacements: [] });
  });
});
