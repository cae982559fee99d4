export const buildExcerpt = (value: string | null | undefined, maxLength = 600): string => {
  if (!value) return '';
  const normalized = String(value).replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, Math.max(0, maxLength - 3)).trim()}...`;
};

export const collapseWhitespace = (value: string | null | undefined): string =>
  String(value ?? '').replace(/\s+/g, ' ').trim();

/**
 * Function words that carry no identity for a headline.
 */
export const TITLE_STOPWORDS = new Set([
  'a',
  'an',
  'the',
  'and',
  'or',
  'of',
  'to',
  'in',
  'on',
  'for',
  'with',
  'by',
  'at',
  'as',
  'is',
  'are',
  'from',
  'its',
]);

const PUNCTUATION_RE = /[^\p{L}\p{N}\s]+/gu;

/**
 * Lowercases, strips punctuation and splits into a token set. Stop-words are
 * dropped unless the title consists of nothing else.
 */
export const tokenizeTitle = (title: string | null | undefined): Set<string> => {
  const tokens = String(title ?? '')
    .toLowerCase()
    .replace(PUNCTUATION_RE, ' ')
    .split(/\s+/)
    .filter(Boolean);
  const meaningful = tokens.filter((token) => !TITLE_STOPWORDS.has(token));
  return new Set(meaningful.length ? meaningful : tokens);
};

export const jaccard = (left: Set<string>, right: Set<string>): number => {
  if (!left.size || !right.size) return 0;

  let intersection = 0;
  for (const token of left) {
    if (right.has(token)) intersection++;
  }

  const union = left.size + right.size - intersection;
  return union === 0 ? 0 : intersection / union;
};

export const computeTitleSimilarity = (titleA: string, titleB: string): number =>
  jaccard(tokenizeTitle(titleA), tokenizeTitle(titleB));

export const countWords = (value: string): number => collapseWhitespace(value).split(' ').filter(Boolean).length;
