import type { ArticleCandidate, RawSearchHit } from '../../shared/types';
import { hashString } from '../../shared/crypto';
import { buildExcerpt, collapseWhitespace } from '../utils/text';
import { extractDomain, normalizeDomain } from './urlUtils';

const MAX_TITLE_LENGTH = 240;
const MAX_SNIPPET_LENGTH = 600;

export const clampUnit = (value: number): number => {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
};

const resolveEditorialScore = (value: number | null | undefined, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) ? clampUnit(value) : clampUnit(fallback);

/**
 * Turns a raw search hit into an unclassified candidate. The domain comes from
 * the URL host; the hit's own `sourceDomain` is only used when the URL has none.
 */
export const toCandidate = (
  hit: RawSearchHit,
  category: string,
  discoveryIndex: number,
  defaultEditorialScore: number,
): ArticleCandidate => {
  const title = Array.from(collapseWhitespace(hit.title)).slice(0, MAX_TITLE_LENGTH).join('');
  const url = String(hit.url ?? '').trim();
  const sourceDomain = extractDomain(url) || normalizeDomain(hit.sourceDomain);
  const id = hit.id?.trim() || `${category}_${discoveryIndex}_${hashString(`${title}|${url}`)}`;

  return {
    id,
    title,
    url,
    sourceDomain,
    snippet: buildExcerpt(hit.snippet, MAX_SNIPPET_LENGTH),
    publishedAt: hit.publishedAt?.trim() || null,
    category,
    urlQuality: 'unknown',
    editorialScore: resolveEditorialScore(hit.editorialScore, defaultEditorialScore),
    popularityScore: 0,
    combinedScore: 0,
    crossSourceCount: 1,
    discoveryIndex,
    sourceDomains: sourceDomain ? [sourceDomain] : [],
    titleVariants: title ? [title] : [],
    urlImproved: false,
  };
};

export const toCandidates = (
  hits: RawSearchHit[],
  category: string,
  defaultEditorialScore: number,
): ArticleCandidate[] => hits.map((hit, index) => toCandidate(hit, category, index, defaultEditorialScore));
