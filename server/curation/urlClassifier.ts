import type { CurationSettings } from '../../shared/config';
import { DEFAULT_CURATION_SETTINGS } from '../../shared/config';
import type { ClassifiedUrlQuality } from '../../shared/types';
import { hostMatches, parseHttpUrl } from './urlUtils';

export type UrlClassifierOptions = Pick<
  CurationSettings,
  'qualityDomainAllowlist' | 'articlePathPatterns' | 'poorPathPatterns'
>;

export interface UrlAssessment {
  quality: ClassifiedUrlQuality;
  /** 0 for poor URLs; article paths and allow-listed hosts raise it for good ones. */
  confidence: number;
  signals: string[];
}

interface CompiledRules {
  article: RegExp[];
  poor: RegExp[];
}

const GOOD_BASE_CONFIDENCE = 0.6;
const ARTICLE_PATH_BOOST = 0.2;
const QUALITY_DOMAIN_BOOST = 0.2;
const DOMAIN_ONLY_CONFIDENCE = 0.3;

const compiledCache = new WeakMap<UrlClassifierOptions, CompiledRules>();

const compilePatterns = (sources: string[]): RegExp[] =>
  sources.flatMap((source) => {
    try {
      return [new RegExp(source, 'i')];
    } catch {
      // Config validation rejects these; direct callers get the pattern skipped.
      return [];
    }
  });

const getRules = (options: UrlClassifierOptions): CompiledRules => {
  const cached = compiledCache.get(options);
  if (cached) {
    return cached;
  }
  const rules = {
    article: compilePatterns(options.articlePathPatterns),
    poor: compilePatterns(options.poorPathPatterns),
  };
  compiledCache.set(options, rules);
  return rules;
};

/**
 * Labels a URL by how directly it points at an article. Never throws:
 * anything that is not a parseable http(s) URL is `poor`.
 */
export const classifyUrl = (
  url: string | null | undefined,
  options: UrlClassifierOptions = DEFAULT_CURATION_SETTINGS,
): UrlAssessment => {
  const raw = String(url ?? '').trim();
  if (!raw) {
    return { quality: 'poor', confidence: 0, signals: ['empty_url'] };
  }

  const parsed = parseHttpUrl(raw);
  if (!parsed) {
    return { quality: 'poor', confidence: 0, signals: ['unsupported_url'] };
  }

  const rules = getRules(options);
  const pathname = parsed.pathname.toLowerCase();
  const pathAndQuery = `${pathname}${parsed.search.toLowerCase()}`;

  const poorMatch = rules.poor.find((pattern) => pattern.test(pathAndQuery));
  if (poorMatch) {
    return { quality: 'poor', confidence: 0, signals: [`poor_path:${poorMatch.source}`] };
  }

  if (pathname === '' || pathname === '/') {
    return { quality: 'domain_only', confidence: DOMAIN_ONLY_CONFIDENCE, signals: ['root_path'] };
  }

  const signals: string[] = [];
  let confidence = GOOD_BASE_CONFIDENCE;
  if (rules.article.some((pattern) => pattern.test(pathname))) {
    confidence += ARTICLE_PATH_BOOST;
    signals.push('article_path');
  }
  if (options.qualityDomainAllowlist.some((domain) => hostMatches(parsed.hostname, domain))) {
    confidence += QUALITY_DOMAIN_BOOST;
    signals.push('quality_domain');
  }

  return { quality: 'good', confidence: Number(confidence.toFixed(2)), signals };
};

export const classify = (
  url: string | null | undefined,
  options: UrlClassifierOptions = DEFAULT_CURATION_SETTINGS,
): ClassifiedUrlQuality => classifyUrl(url, options).quality;
