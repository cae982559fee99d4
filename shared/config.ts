import { z } from 'zod';

/**
 * Hosts whose article URLs earn a confidence boost during classification.
 * Matching is by exact host or subdomain (`news.mit.edu` matches `mit.edu`).
 */
export const DEFAULT_QUALITY_DOMAINS = [
  'openai.com',
  'anthropic.com',
  'googleblog.com',
  'blog.google',
  'deepmind.google',
  'microsoft.com',
  'meta.com',
  'aws.amazon.com',
  'developer.nvidia.com',
  'huggingface.co',
  'github.com',
  'mit.edu',
  'spectrum.ieee.org',
  'techcrunch.com',
  'venturebeat.com',
  'theinformation.com',
  'theverge.com',
  'arstechnica.com',
  'reuters.com',
  'zdnet.com',
  'towardsdatascience.com',
];

/**
 * Path fragments that mark a URL as pointing at a single article.
 * Regex sources, matched case-insensitively against the URL path.
 */
export const DEFAULT_ARTICLE_PATH_PATTERNS = [
  '/blog/',
  '/news/',
  '/articles?/',
  '/posts?/',
  '/research/',
  '/story/',
  '/p/',
  '/releases/',
  '/press-releases?/',
  '/newsroom/',
  '/announcements/',
  '/(19|20)\\d{2}(/|$)',
];

/**
 * Search pages, generic landing pages and section indexes.
 * Regex sources, matched case-insensitively against path plus query string.
 */
export const DEFAULT_POOR_PATH_PATTERNS = [
  '/search(/|\\?|$)',
  'query=',
  '[?&](q|s|search|keywords?)=',
  '/(home|index\\.(html?|php)|main\\.html|default\\.aspx?)/?(\\?|$)',
  '/(category|categories|topics?|tags?)/[^/?]+/?(\\?|$)',
  '/(news|blog|articles?)/?(\\?|$)',
  '/(ai|ml|tech)/?(\\?|$)',
  '/technology/artificial-intelligence/?(\\?|$)',
  '/page/\\d+/?(\\?|$)',
  '[?&]page=\\d+',
];

export const DEFAULT_EXCLUDED_DOMAINS = ['reddit.com', 'quora.com', 'stackoverflow.com'];

const isValidPattern = (source: string): boolean => {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
};

const patternList = z.array(
  z.string().min(1).refine(isValidPattern, { message: 'Invalid regular expression' }),
);

const CurationSettingsObject = z.object({
  similarityThreshold: z.number().min(0).max(1),
  perDomainCap: z.number().int().positive(),
  editorialWeight: z.number().min(0).max(1),
  popularityWeight: z.number().min(0).max(1),
  qualityDomainAllowlist: z.array(z.string().min(1)),
  articlePathPatterns: patternList,
  poorPathPatterns: patternList,
  excludedDomains: z.array(z.string().min(1)),
  minTitleLength: z.number().int().nonnegative(),
  minTitleWords: z.number().int().nonnegative(),
  dropTruncatedTitles: z.boolean(),
  defaultEditorialScore: z.number().min(0).max(1),
});

export const CurationSettingsSchema = CurationSettingsObject.refine(
  (value) => Math.abs(value.editorialWeight + value.popularityWeight - 1) < 1e-6,
  {
    message: 'editorialWeight and popularityWeight must sum to 1',
    path: ['popularityWeight'],
  },
);

export const CurationOverridesSchema = CurationSettingsObject.partial();

export type CurationSettings = z.infer<typeof CurationSettingsSchema>;

export const DEFAULT_CURATION_SETTINGS: CurationSettings = {
  similarityThreshold: 0.3,
  perDomainCap: 3,
  editorialWeight: 0.7,
  popularityWeight: 0.3,
  qualityDomainAllowlist: DEFAULT_QUALITY_DOMAINS,
  articlePathPatterns: DEFAULT_ARTICLE_PATH_PATTERNS,
  poorPathPatterns: DEFAULT_POOR_PATH_PATTERNS,
  excludedDomains: DEFAULT_EXCLUDED_DOMAINS,
  minTitleLength: 15,
  minTitleWords: 3,
  dropTruncatedTitles: true,
  defaultEditorialScore: 0.5,
};

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    heartbeatIntervalMs: z.number().int().positive(),
    bodyLimit: z.string().min(2),
  }),
  curation: CurationSettingsSchema,
  persistence: z.object({
    mode: z.enum(['fs', 'none']),
    rootDir: z.string().min(1),
    outputsDir: z.string().min(1),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  curation: {
    similarityThreshold: number;
    perDomainCap: number;
    editorialWeight: number;
    popularityWeight: number;
    qualityDomainAllowlist: string[];
    excludedDomains: string[];
  };
  persistence: {
    mode: AppConfig['persistence']['mode'];
  };
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  curation: {
    similarityThreshold: config.curation.similarityThreshold,
    perDomainCap: config.curation.perDomainCap,
    editorialWeight: config.curation.editorialWeight,
    popularityWeight: config.curation.popularityWeight,
    qualityDomainAllowlist: [...config.curation.qualityDomainAllowlist],
    excludedDomains: [...config.curation.excludedDomains],
  },
  persistence: {
    mode: config.persistence.mode,
  },
});

/**
 * Applies per-request overrides on top of the configured curation settings.
 * The merged result is validated as a whole, so weights supplied one at a
 * time must still sum to 1 with the configured counterpart.
 */
export const mergeCurationSettings = (
  base: CurationSettings,
  overrides: Partial<CurationSettings> | undefined,
): CurationSettings => {
  if (!overrides) {
    return base;
  }
  return CurationSettingsSchema.parse({ ...base, ...overrides });
};
