import type { CurationSettings } from '../../shared/config';
import type { ArticleCandidate } from '../../shared/types';
import { computeTitleSimilarity } from '../utils/text';
import { UrlImprovementCache } from './improvementCache';
import { classifyUrl, type UrlClassifierOptions } from './urlClassifier';
import { extractDomain, normalizeUrlKey } from './urlUtils';

export type UrlImproverOptions = UrlClassifierOptions & Pick<CurationSettings, 'similarityThreshold'>;

/**
 * Supplies alternative hits for a weak candidate, typically gathered by
 * re-querying on title plus source domain. Must return the complete pool.
 */
export type SiblingPoolProvider = (candidate: ArticleCandidate) => ArticleCandidate[];

export interface ImprovementResult {
  candidate: ArticleCandidate;
  improved: boolean;
  similarity?: number;
}

export interface ImprovementStageResult {
  candidates: ArticleCandidate[];
  attempts: number;
  improved: number;
  cacheHits: number;
  upgrades: Array<{ id: string; from: string; to: string; similarity?: number }>;
}

export const isImprovable = (candidate: ArticleCandidate): boolean =>
  candidate.urlQuality === 'domain_only' || candidate.urlQuality === 'poor';

const withImprovedUrl = (candidate: ArticleCandidate, url: string): ArticleCandidate => ({
  ...candidate,
  url,
  urlQuality: 'good',
  urlImproved: true,
  originalUrl: candidate.originalUrl ?? candidate.url,
  sourceDomain: extractDomain(url) || candidate.sourceDomain,
});

/**
 * Replaces a domain-only or poor URL with the good-quality sibling whose title
 * is most similar, provided the similarity reaches the threshold. Ties go to
 * the sibling the classifier is more confident about, then to pool order.
 * Candidates that are not eligible or find no match come back unchanged.
 */
export const improveCandidate = (
  candidate: ArticleCandidate,
  siblingPool: ArticleCandidate[],
  options: UrlImproverOptions,
): ImprovementResult => {
  if (!isImprovable(candidate)) {
    return { candidate, improved: false };
  }

  const currentKey = normalizeUrlKey(candidate.url);
  let best: { url: string; similarity: number; confidence: number } | null = null;

  for (const sibling of siblingPool) {
    if (!sibling.url || normalizeUrlKey(sibling.url) === currentKey) {
      continue;
    }
    const assessment = classifyUrl(sibling.url, options);
    const quality = sibling.urlQuality === 'unknown' ? assessment.quality : sibling.urlQuality;
    if (quality !== 'good') {
      continue;
    }
    const similarity = computeTitleSimilarity(candidate.title, sibling.title);
    if (similarity < options.similarityThreshold) {
      continue;
    }
    if (
      !best ||
      similarity > best.similarity ||
      (similarity === best.similarity && assessment.confidence > best.confidence)
    ) {
      best = { url: sibling.url, similarity, confidence: assessment.confidence };
    }
  }

  if (!best) {
    return { candidate, improved: false };
  }

  return {
    candidate: withImprovedUrl(candidate, best.url),
    improved: true,
    similarity: Number(best.similarity.toFixed(4)),
  };
};

/**
 * Runs improvement over a batch, consulting the run's cache before asking the
 * provider for a sibling pool.
 */
export const improveCandidates = (
  candidates: ArticleCandidate[],
  provider: SiblingPoolProvider,
  options: UrlImproverOptions,
  cache: UrlImprovementCache = new UrlImprovementCache(),
): ImprovementStageResult => {
  const out: ArticleCandidate[] = [];
  const upgrades: ImprovementStageResult['upgrades'] = [];
  let attempts = 0;
  let improved = 0;
  let cacheHits = 0;

  for (const candidate of candidates) {
    if (!isImprovable(candidate)) {
      out.push(candidate);
      continue;
    }

    const cached = cache.get(candidate);
    if (cached) {
      cacheHits += 1;
      if (cached.url) {
        improved += 1;
        upgrades.push({ id: candidate.id, from: candidate.url, to: cached.url, similarity: cached.similarity });
        out.push(withImprovedUrl(candidate, cached.url));
      } else {
        out.push(candidate);
      }
      continue;
    }

    attempts += 1;
    const result = improveCandidate(candidate, provider(candidate), options);
    cache.set(candidate, result.improved ? { url: result.candidate.url, similarity: result.similarity } : { url: null });
    if (result.improved) {
      improved += 1;
      upgrades.push({
        id: candidate.id,
        from: candidate.url,
        to: result.candidate.url,
        similarity: result.similarity,
      });
    }
    out.push(result.candidate);
  }

  return { candidates: out, attempts, improved, cacheHits, upgrades };
};
