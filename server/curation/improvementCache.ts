import type { ArticleCandidate } from '../../shared/types';
import { collapseWhitespace } from '../utils/text';
import { normalizeUrlKey } from './urlUtils';

export interface ImprovementCacheEntry {
  /** Replacement URL, or null when no sibling qualified. */
  url: string | null;
  similarity?: number;
}

/**
 * Remembers improvement outcomes for one curation run so the same weak URL is
 * resolved once even when it shows up in several categories. Create one per
 * run; nothing here is process-wide.
 */
export class UrlImprovementCache {
  private readonly entries = new Map<string, ImprovementCacheEntry>();

  static keyFor(candidate: Pick<ArticleCandidate, 'title' | 'url'>): string {
    return `${collapseWhitespace(candidate.title).toLowerCase()}|${normalizeUrlKey(candidate.url)}`;
  }

  get(candidate: Pick<ArticleCandidate, 'title' | 'url'>): ImprovementCacheEntry | undefined {
    return this.entries.get(UrlImprovementCache.keyFor(candidate));
  }

  set(candidate: Pick<ArticleCandidate, 'title' | 'url'>, entry: ImprovementCacheEntry): void {
    this.entries.set(UrlImprovementCache.keyFor(candidate), entry);
  }

  get size(): number {
    return this.entries.size;
  }
}
