import { DEFAULT_CURATION_SETTINGS } from '../../shared/config';
import type { CitationAuditResult, CitationFixResult, RankedArticle } from '../../shared/types';
import { computeTitleSimilarity } from '../utils/text';
import { extractDomain, hostMatches, normalizeUrlKey, parseHttpUrl } from './urlUtils';

const MARKDOWN_LINK_RE = /\[([^\]]+)\]\((https?:\/\/[^)\s]+)\)/g;

/** Root path, with or without a query string. */
export const isDomainOnlyUrl = (url: string): boolean => {
  const parsed = parseHttpUrl(url);
  if (!parsed) return false;
  return parsed.pathname === '' || parsed.pathname === '/';
};

export const extractMarkdownLinks = (markdown: string): Array<{ text: string; url: string }> => {
  const links: Array<{ text: string; url: string }> = [];
  for (const match of markdown.matchAll(MARKDOWN_LINK_RE)) {
    links.push({ text: match[1].trim(), url: match[2] });
  }
  return links;
};

/**
 * Checks a rendered report against the curated list: links that point at a
 * bare domain, and curated URLs the report never cites.
 */
export const auditCitations = (markdown: string, expectedUrls: string[]): CitationAuditResult => {
  const links = extractMarkdownLinks(markdown);
  const cited = new Set(links.map((link) => normalizeUrlKey(link.url)));
  return {
    links,
    domainOnly: links.filter((link) => isDomainOnlyUrl(link.url)),
    uncited: expectedUrls.filter((url) => !cited.has(normalizeUrlKey(url))),
  };
};

/**
 * Points bare-domain links at the curated article on the same domain whose
 * title best matches the link text. Links without such an article are left as
 * they are.
 */
export const fixCitations = (
  markdown: string,
  articles: Array<Pick<RankedArticle, 'title' | 'url'>>,
  similarityThreshold = DEFAULT_CURATION_SETTINGS.similarityThreshold,
): CitationFixResult => {
  const targets = articles.filter((article) => parseHttpUrl(article.url) && !isDomainOnlyUrl(article.url));
  const replacements: CitationFixResult['replacements'] = [];

  const fixed = markdown.replace(MARKDOWN_LINK_RE, (whole: string, text: string, url: string) => {
    if (!isDomainOnlyUrl(url)) return whole;
    const host = extractDomain(url);
    let best: { url: string; similarity: number } | null = null;
    for (const article of targets) {
      if (!hostMatches(extractDomain(article.url), host)) continue;
      const similarity = computeTitleSimilarity(text, article.title);
      if (similarity < similarityThreshold) continue;
      if (!best || similarity > best.similarity) {
        best = { url: article.url, similarity };
      }
    }
    if (!best) return whole;
    replacements.push({ text: text.trim(), from: url, to: best.url });
    return `[${text}](${best.url})`;
  });

  return { markdown: fixed, replacements };
};
