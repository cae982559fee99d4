import { describe, expect, it } from 'vitest';
import { extractDomain, hostMatches, normalizeUrlKey, parseHttpUrl } from '../urlUtils';

describe('urlUtils', () => {
  it('accepts only http(s) URLs', () => {
    expect(parseHttpUrl('https://example.com/a')?.hostname).toBe('example.com');
    expect(parseHttpUrl('ftp://example.com/a')).toBeNull();
    expect(parseHttpUrl('not a url')).toBeNull();
  });

  it('extracts the host without www', () => {
    expect(extractDomain('https://www.OpenAI.com/blog')).toBe('openai.com');
    expect(extractDomain('mailto:someone@example.com')).toBe('');
  });

  it('matches subdomains but not suffix look-alikes', () => {
    expect(hostMatches('news.mit.edu', 'mit.edu')).toBe(true);
    expect(hostMatches('www.mit.edu', 'mit.edu')).toBe(true);
    expect(hostMatches('notmit.edu', 'mit.edu')).toBe(false);
  });

  it('builds a URL key without tracking parameters, fragment or trailing slash', () => {
    expect(normalizeUrlKey('https://www.Example.com/Story/?utm_source=x&id=4#top')).toBe('example.com/Story?id=4');
    expect(normalizeUrlKey('https://example.com/')).toBe('example.com/');
    expect(normalizeUrlKey(' Not A URL ')).toBe('not a url');
  });
});
