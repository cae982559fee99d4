import type { CurationSettings } from '../../shared/config';
import type { ArticleCandidate, ArticleGroup, RankedArticle } from '../../shared/types';
import { computeTitleSimilarity } from '../utils/text';
import { clampUnit } from './candidates';
import { applyDomainCap, compareUrlQuality } from './qualityFilter';
import { normalizeUrlKey } from './urlUtils';

export type GroupingOptions = Pick<CurationSettings, 'similarityThreshold'>;

export type RankingOptions = Pick<CurationSettings, 'perDomainCap' | 'editorialWeight' | 'popularityWeight'> & {
  /** Cross-source count at which popularity saturates at 1. */
  normalizationConstant: number;
};

export interface RankingResult {
  ranked: ArticleGroup[];
  /** Groups removed by the per-domain cap after sorting. */
  capped: ArticleGroup[];
}

const round4 = (value: number): number => Number(value.toFixed(4));

const distinct = (values: string[]): string[] => Array.from(new Set(values.filter(Boolean)));

const buildGroup = (members: ArticleCandidate[]): ArticleGroup => {
  const canonical = members.reduce((best, member) =>
    compareUrlQuality(member.urlQuality, best.urlQuality) < 0 ? member : best,
  );
  const titles = members.flatMap((member) => (member.titleVariants.length ? member.titleVariants : [member.title]));
  const title = titles.reduce((longest, candidate) => (candidate.length > longest.length ? candidate : longest), '');
  const domains = members
    .flatMap((member) => (member.sourceDomains.length ? member.sourceDomains : [member.sourceDomain]))
    .filter(Boolean);

  return {
    title,
    url: canonical.url,
    sourceDomain: canonical.sourceDomain,
    urlQuality: canonical.urlQuality,
    category: canonical.category,
    members,
    domains,
    crossSourceCount: Math.max(1, distinct(domains).length),
    editorialScore: Math.max(...members.map((member) => clampUnit(member.editorialScore))),
    popularityScore: 0,
    combinedScore: 0,
    discoveryIndex: Math.min(...members.map((member) => member.discoveryIndex)),
    urlImproved: canonical.urlImproved,
  };
};

/**
 * Merges candidates describing the same article. A candidate joins the first
 * group whose first-seen title scores above the threshold or whose URL is identical;
 * the result depends on input order.
 */
export const groupCandidates = (candidates: ArticleCandidate[], options: GroupingOptions): ArticleGroup[] => {
  const open: Array<{ anchorTitle: string; urlKeys: Set<string>; members: ArticleCandidate[] }> = [];

  for (const candidate of candidates) {
    if (!candidate.title.trim()) {
      continue;
    }
    const urlKey = normalizeUrlKey(candidate.url);
    const target = open.find(
      (entry) =>
        entry.urlKeys.has(urlKey) ||
        computeTitleSimilarity(candidate.title, entry.anchorTitle) > options.similarityThreshold,
    );
    if (target) {
      target.members.push(candidate);
      target.urlKeys.add(urlKey);
    } else {
      open.push({ anchorTitle: candidate.title, urlKeys: new Set([urlKey]), members: [candidate] });
    }
  }

  return open.map((entry) => buildGroup(entry.members));
};

export const popularityScore = (crossSourceCount: number, normalizationConstant: number): number =>
  round4(clampUnit(Math.min(1, crossSourceCount / Math.max(1, normalizationConstant))));

export const combinedScore = (
  editorial: number,
  popularity: number,
  weights: Pick<CurationSettings, 'editorialWeight' | 'popularityWeight'>,
): number => round4(clampUnit(editorial) * weights.editorialWeight + clampUnit(popularity) * weights.popularityWeight);

export const scoreGroup = (group: ArticleGroup, options: RankingOptions): ArticleGroup => {
  const popularity = popularityScore(group.crossSourceCount, options.normalizationConstant);
  return {
    ...group,
    popularityScore: popularity,
    combinedScore: combinedScore(group.editorialScore, popularity, options),
  };
};

export const compareGroups = (a: ArticleGroup, b: ArticleGroup): number =>
  b.combinedScore - a.combinedScore ||
  b.crossSourceCount - a.crossSourceCount ||
  a.discoveryIndex - b.discoveryIndex;

/**
 * Sorts already-scored groups and applies the per-domain cap. Array sort is
 * stable, so groups that tie on every key keep their input order.
 */
export const orderAndCap = (groups: ArticleGroup[], perDomainCap: number): RankingResult => {
  const ordered = [...groups].sort(compareGroups);
  const { kept, overflow } = applyDomainCap(ordered, perDomainCap);
  return { ranked: kept, capped: overflow };
};

/**
 * Scores, sorts and diversity-limits groups. Running it again on its own
 * output with the same options returns the same sequence.
 */
export const rankGroups = (groups: ArticleGroup[], options: RankingOptions): RankingResult =>
  orderAndCap(
    groups.map((group) => scoreGroup(group, options)),
    options.perDomainCap,
  );

export const toRankedArticle = (group: ArticleGroup): RankedArticle => ({
  title: group.title,
  url: group.url,
  sourceDomain: group.sourceDomain,
  urlQuality: group.urlQuality,
  popularityScore: group.popularityScore,
  combinedScore: group.combinedScore,
  crossSourceCount: group.crossSourceCount,
  category: group.category,
  sourceDomains: distinct(group.domains),
  urlImproved: group.urlImproved,
});
