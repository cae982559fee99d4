export type StageName = 'filter' | 'improve' | 'rank';

export type StageStatus = 'start' | 'progress' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}

export type UrlQuality = 'unknown' | 'good' | 'domain_only' | 'poor';

/** A classified quality; `unknown` only exists before classification. */
export type ClassifiedUrlQuality = Exclude<UrlQuality, 'unknown'>;

/**
 * Raw search hit as handed over by the search collaborator.
 */
export interface RawSearchHit {
  id?: string | null;
  title?: string | null;
  url?: string | null;
  sourceDomain?: string | null;
  snippet?: string | null;
  publishedAt?: string | null;
  editorialScore?: number | null;
}

export interface ArticleCandidate {
  id: string;
  title: string;
  url: string;
  sourceDomain: string;
  snippet: string;
  publishedAt: string | null;
  category: string;
  urlQuality: UrlQuality;
  editorialScore: number;
  popularityScore: number;
  combinedScore: number;
  crossSourceCount: number;
  /** Position in the category batch the candidate arrived in. */
  discoveryIndex: number;
  /** Distinct domains of every candidate merged into this one. */
  sourceDomains: string[];
  /** Titles of every candidate merged into this one, first-seen first. */
  titleVariants: string[];
  urlImproved: boolean;
  originalUrl?: string;
}

export interface ArticleGroup {
  title: string;
  url: string;
  sourceDomain: string;
  urlQuality: UrlQuality;
  category: string;
  members: ArticleCandidate[];
  /** Multiset: one entry per contributing member domain. */
  domains: string[];
  crossSourceCount: number;
  editorialScore: number;
  popularityScore: number;
  combinedScore: number;
  discoveryIndex: number;
  urlImproved: boolean;
}

/**
 * Projection of a ranked group handed to the report renderer.
 */
export interface RankedArticle {
  title: string;
  url: string;
  sourceDomain: string;
  urlQuality: UrlQuality;
  popularityScore: number;
  combinedScore: number;
  crossSourceCount: number;
  category: string;
  sourceDomains: string[];
  urlImproved: boolean;
}

export type DropReason =
  | 'missing_title'
  | 'excluded_domain'
  | 'low_signal_title'
  | 'invalid_url'
  | 'duplicate'
  | 'domain_limit';

export interface CurationMetrics {
  candidatesIn: number;
  kept: number;
  dropped: Record<DropReason, number>;
  improvementAttempts: number;
  improved: number;
  cacheHits: number;
  groups: number;
  ranked: number;
  /** Groups removed by the per-domain cap re-applied after ranking. */
  cappedAtRank: number;
  urlQuality: Record<ClassifiedUrlQuality, number>;
}

export interface CategoryCurationResult {
  category: string;
  articles: RankedArticle[];
  metrics: CurationMetrics;
}

export interface CurationRunResult {
  runId: string;
  categories: CategoryCurationResult[];
  flattened?: RankedArticle[];
}

export interface CitationAuditResult {
  links: Array<{ text: string; url: string }>;
  domainOnly: Array<{ text: string; url: string }>;
  uncited: string[];
}

export interface CitationFixResult {
  markdown: string;
  replacements: Array<{ text: string; from: string; to: string }>;
}
