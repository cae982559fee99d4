import type { CurationSettings } from '../../shared/config';
import type { ArticleCandidate, ClassifiedUrlQuality, DropReason, UrlQuality } from '../../shared/types';
import { computeTitleSimilarity, countWords } from '../utils/text';
import { classifyUrl, type UrlClassifierOptions } from './urlClassifier';
import { hostMatches, normalizeUrlKey } from './urlUtils';

export type QualityFilterOptions = UrlClassifierOptions &
  Pick<
    CurationSettings,
    | 'similarityThreshold'
    | 'perDomainCap'
    | 'excludedDomains'
    | 'minTitleLength'
    | 'minTitleWords'
    | 'dropTruncatedTitles'
  >;

export interface DroppedCandidate {
  candidate: ArticleCandidate;
  reason: DropReason;
  duplicateOf?: string;
  score?: number;
  detail?: string;
}

export interface QualityFilterCounts {
  candidatesIn: number;
  kept: number;
  dropped: Record<DropReason, number>;
  urlQuality: Record<ClassifiedUrlQuality, number>;
}

export interface QualityFilterResult {
  kept: ArticleCandidate[];
  dropped: DroppedCandidate[];
  counts: QualityFilterCounts;
}

interface OpenGroup {
  anchorTitle: string;
  urlKeys: Set<string>;
  members: ArticleCandidate[];
}

const TRUNCATED_TITLE_RE = /(\.\.\.|…)$/u;

const QUALITY_RANK: Record<UrlQuality, number> = {
  good: 0,
  domain_only: 1,
  poor: 2,
  unknown: 3,
};

export const emptyDropCounts = (): Record<DropReason, number> => ({
  missing_title: 0,
  excluded_domain: 0,
  low_signal_title: 0,
  invalid_url: 0,
  duplicate: 0,
  domain_limit: 0,
});

export const emptyQualityCounts = (): Record<ClassifiedUrlQuality, number> => ({
  good: 0,
  domain_only: 0,
  poor: 0,
});

export const compareUrlQuality = (left: UrlQuality, right: UrlQuality): number =>
  QUALITY_RANK[left] - QUALITY_RANK[right];

const lowSignalReason = (title: string, options: QualityFilterOptions): string | null => {
  if (title.length < options.minTitleLength) {
    return 'title_too_short';
  }
  if (countWords(title) < options.minTitleWords) {
    return 'too_few_words';
  }
  if (options.dropTruncatedTitles && TRUNCATED_TITLE_RE.test(title)) {
    return 'truncated_title';
  }
  return null;
};

const distinct = (values: string[]): string[] => Array.from(new Set(values.filter(Boolean)));

/**
 * Picks the member with the best URL quality; members are in input order, so
 * the earliest wins ties.
 */
const pickRepresentative = (members: ArticleCandidate[]): ArticleCandidate =>
  members.reduce((best, member) => (compareUrlQuality(member.urlQuality, best.urlQuality) < 0 ? member : best));

/**
 * Keeps at most `cap` entries per source domain, in the order given.
 */
export const applyDomainCap = <T extends { sourceDomain: string }>(
  items: T[],
  cap: number,
): { kept: T[]; overflow: T[] } => {
  const perDomain = new Map<string, number>();
  const kept: T[] = [];
  const overflow: T[] = [];
  for (const item of items) {
    const count = perDomain.get(item.sourceDomain) ?? 0;
    if (count >= cap) {
      overflow.push(item);
      continue;
    }
    perDomain.set(item.sourceDomain, count + 1);
    kept.push(item);
  }
  return { kept, overflow };
};

/**
 * Classifies, de-duplicates and diversity-limits one batch of candidates.
 * Every input ends up either in `kept` or in `dropped` with one reason.
 */
export const filterCandidates = (
  candidates: ArticleCandidate[],
  options: QualityFilterOptions,
): QualityFilterResult => {
  const dropped: DroppedCandidate[] = [];
  const dropCounts = emptyDropCounts();
  const qualityCounts = emptyQualityCounts();
  const drop = (entry: DroppedCandidate) => {
    dropped.push(entry);
    dropCounts[entry.reason] += 1;
  };

  const groups: OpenGroup[] = [];

  for (const original of candidates) {
    if (!original.title.trim()) {
      drop({ candidate: original, reason: 'missing_title' });
      continue;
    }

    const assessment = classifyUrl(original.url, options);
    const candidate: ArticleCandidate = { ...original, urlQuality: assessment.quality };
    qualityCounts[assessment.quality] += 1;

    if (assessment.quality === 'poor') {
      drop({ candidate, reason: 'invalid_url', detail: assessment.signals.join(',') });
      continue;
    }

    if (options.excludedDomains.some((domain) => hostMatches(candidate.sourceDomain, domain))) {
      drop({ candidate, reason: 'excluded_domain', detail: candidate.sourceDomain });
      continue;
    }

    const lowSignal = lowSignalReason(candidate.title, options);
    if (lowSignal) {
      drop({ candidate, reason: 'low_signal_title', detail: lowSignal });
      continue;
    }

    const urlKey = normalizeUrlKey(candidate.url);
    let target: OpenGroup | null = null;
    for (const group of groups) {
      if (group.urlKeys.has(urlKey)) {
        target = group;
        break;
      }
      if (computeTitleSimilarity(candidate.title, group.anchorTitle) > options.similarityThreshold) {
        target = group;
        break;
      }
    }

    if (target) {
      target.members.push(candidate);
      target.urlKeys.add(urlKey);
    } else {
      groups.push({ anchorTitle: candidate.title, urlKeys: new Set([urlKey]), members: [candidate] });
    }
  }

  const representatives: ArticleCandidate[] = [];
  for (const group of groups) {
    const representative = pickRepresentative(group.members);
    const sourceDomains = distinct(group.members.flatMap((member) => member.sourceDomains));
    representatives.push({
      ...representative,
      sourceDomains,
      crossSourceCount: Math.max(1, sourceDomains.length),
      titleVariants: distinct(group.members.flatMap((member) => member.titleVariants)),
    });
    for (const member of group.members) {
      if (member === representative) continue;
      drop({
        candidate: member,
        reason: 'duplicate',
        duplicateOf: representative.id,
        score: Number(computeTitleSimilarity(member.title, representative.title).toFixed(4)),
      });
    }
  }

  representatives.sort((a, b) => a.discoveryIndex - b.discoveryIndex);
  const { kept, overflow } = applyDomainCap(representatives, options.perDomainCap);
  for (const candidate of overflow) {
    drop({ candidate, reason: 'domain_limit', detail: candidate.sourceDomain });
  }

  return {
    kept,
    dropped,
    counts: {
      candidatesIn: candidates.length,
      kept: kept.length,
      dropped: dropCounts,
      urlQuality: qualityCounts,
    },
  };
};
