import type { CurationSettings } from '../../shared/config';
import { randomId } from '../../shared/crypto';
import type {
  ArticleCandidate,
  ArticleGroup,
  CategoryCurationResult,
  CurationMetrics,
  CurationRunResult,
  RawSearchHit,
  StageName,
} from '../../shared/types';
import type { Logger } from '../obs/logger';
import { collapseWhitespace } from '../utils/text';
import { toCandidates } from './candidates';
import { UrlImprovementCache } from './improvementCache';
import { emptyDropCounts, emptyQualityCounts, filterCandidates } from './qualityFilter';
import { groupCandidates, orderAndCap, rankGroups, toRankedArticle } from './ranking';
import { improveCandidates, type SiblingPoolProvider } from './urlImprover';
import { hostMatches } from './urlUtils';

export interface CurationRequest {
  categories: Record<string, RawSearchHit[]>;
  /** Alternative hits per article title, from the search collaborator's re-queries. */
  siblingPools?: Record<string, RawSearchHit[]>;
  /** Number of distinct sources queried per category; sets the popularity scale. */
  sourcesQueried?: Record<string, number>;
  flatten?: boolean;
}

export interface StageReport {
  stage: StageName;
  category: string;
  summary: Record<string, unknown>;
}

export interface CurationContext {
  settings: CurationSettings;
  runId?: string;
  logger?: Logger;
  cache?: UrlImprovementCache;
  onStage?: (report: StageReport) => void;
}

export interface CategoryCurationOutput extends CategoryCurationResult {
  groups: ArticleGroup[];
}

export const emptyMetrics = (): CurationMetrics => ({
  candidatesIn: 0,
  kept: 0,
  dropped: emptyDropCounts(),
  improvementAttempts: 0,
  improved: 0,
  cacheHits: 0,
  groups: 0,
  ranked: 0,
  cappedAtRank: 0,
  urlQuality: emptyQualityCounts(),
});

export const siblingPoolKey = (title: string): string => collapseWhitespace(title).toLowerCase();

/**
 * Default sibling source: caller-supplied pools for the candidate's title,
 * followed by the rest of the category batch. Excluded domains never qualify.
 */
export const createSiblingProvider = (
  batch: ArticleCandidate[],
  pools: Record<string, ArticleCandidate[]>,
  excludedDomains: string[],
): SiblingPoolProvider => {
  const allowed = (candidate: ArticleCandidate) =>
    !excludedDomains.some((domain) => hostMatches(candidate.sourceDomain, domain));
  const batchPool = batch.filter((candidate) => candidate.title && allowed(candidate));

  return (candidate) => {
    const extra = (pools[siblingPoolKey(candidate.title)] ?? []).filter(allowed);
    return [...extra, ...batchPool.filter((sibling) => sibling.id !== candidate.id)];
  };
};

const resolveNormalization = (candidates: ArticleCandidate[], sourcesQueried: number | undefined): number => {
  if (typeof sourcesQueried === 'number' && Number.isFinite(sourcesQueried) && sourcesQueried >= 1) {
    return Math.floor(sourcesQueried);
  }
  const domains = new Set(candidates.map((candidate) => candidate.sourceDomain).filter(Boolean));
  return Math.max(1, domains.size);
};

const buildSiblingPools = (
  siblingPools: Record<string, RawSearchHit[]> | undefined,
  category: string,
  settings: CurationSettings,
): Record<string, ArticleCandidate[]> => {
  const pools: Record<string, ArticleCandidate[]> = {};
  for (const [title, hits] of Object.entries(siblingPools ?? {})) {
    pools[siblingPoolKey(title)] = toCandidates(hits, category, settings.defaultEditorialScore);
  }
  return pools;
};

/**
 * Runs filter, URL improvement and ranking over one category batch.
 */
export const curateCategory = (
  category: string,
  hits: RawSearchHit[],
  context: CurationContext,
  request: Pick<CurationRequest, 'siblingPools' | 'sourcesQueried'> = {},
): CategoryCurationOutput => {
  const { settings, logger } = context;
  const runId = context.runId ?? randomId();
  const cache = context.cache ?? new UrlImprovementCache();
  const candidates = toCandidates(hits, category, settings.defaultEditorialScore);

  if (!candidates.length) {
    logger?.info('Empty category batch', { runId, category });
    return { category, articles: [], groups: [], metrics: emptyMetrics() };
  }

  const filtered = filterCandidates(candidates, settings);
  for (const entry of filtered.dropped) {
    logger?.debug('Candidate dropped', {
      runId,
      category,
      reason: entry.reason,
      title: entry.candidate.title,
      url: entry.candidate.url,
      duplicateOf: entry.duplicateOf,
      detail: entry.detail,
    });
  }
  logger?.info('Filter stage complete', { runId, category, ...filtered.counts });
  context.onStage?.({ stage: 'filter', category, summary: { ...filtered.counts } });

  const provider = createSiblingProvider(
    candidates,
    buildSiblingPools(request.siblingPools, category, settings),
    settings.excludedDomains,
  );
  const improvement = improveCandidates(filtered.kept, provider, settings, cache);
  for (const upgrade of improvement.upgrades) {
    logger?.debug('URL improved', { runId, category, ...upgrade });
  }
  const improvementSummary = {
    attempts: improvement.attempts,
    improved: improvement.improved,
    cacheHits: improvement.cacheHits,
  };
  logger?.info('Improve stage complete', { runId, category, ...improvementSummary });
  context.onStage?.({ stage: 'improve', category, summary: improvementSummary });

  const groups = groupCandidates(improvement.candidates, settings);
  const normalizationConstant = resolveNormalization(candidates, request.sourcesQueried?.[category]);
  const ranking = rankGroups(groups, { ...settings, normalizationConstant });
  const rankSummary = {
    groups: groups.length,
    ranked: ranking.ranked.length,
    capped: ranking.capped.length,
    normalizationConstant,
  };
  logger?.info('Rank stage complete', { runId, category, ...rankSummary });
  context.onStage?.({ stage: 'rank', category, summary: rankSummary });

  return {
    category,
    articles: ranking.ranked.map(toRankedArticle),
    groups: ranking.ranked,
    metrics: {
      candidatesIn: filtered.counts.candidatesIn,
      kept: filtered.counts.kept,
      dropped: filtered.counts.dropped,
      improvementAttempts: improvement.attempts,
      improved: improvement.improved,
      cacheHits: improvement.cacheHits,
      groups: groups.length,
      ranked: ranking.ranked.length,
      cappedAtRank: ranking.capped.length,
      urlQuality: filtered.counts.urlQuality,
    },
  };
};

/**
 * Curates every category of a request with one shared improvement cache.
 * Categories are ranked independently; `flatten` adds a cross-category order
 * of the already-scored groups under the same per-domain cap.
 */
export const curateBatch = (request: CurationRequest, context: CurationContext): CurationRunResult => {
  const runId = context.runId ?? randomId();
  const runContext: CurationContext = {
    ...context,
    runId,
    cache: context.cache ?? new UrlImprovementCache(),
  };

  const outputs = Object.entries(request.categories).map(([category, hits]) =>
    curateCategory(category, hits, runContext, request),
  );

  const result: CurationRunResult = {
    runId,
    categories: outputs.map(({ category, articles, metrics }) => ({ category, articles, metrics })),
  };

  if (request.flatten) {
    const flattened = orderAndCap(
      outputs.flatMap((output) => output.groups),
      context.settings.perDomainCap,
    );
    result.flattened = flattened.ranked.map(toRankedArticle);
  }

  return result;
};
