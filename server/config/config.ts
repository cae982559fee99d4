import path from 'node:path';
import {
  ConfigSchema,
  DEFAULT_CURATION_SETTINGS,
  type AppConfig,
  type PublicConfig,
  getPublicConfig as getPublicConfigShared,
} from '../../shared/config';

export const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

export const csvFromEnv = (value: string | undefined): string[] => {
  if (!value) return [];
  return value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
};

/** Comma-separated list, or the defaults when the variable is unset or blank. */
const listFromEnv = (value: string | undefined, fallback: string[]): string[] => {
  const parsed = csvFromEnv(value);
  return parsed.length ? parsed : [...fallback];
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const rawRoot = env.RAW_DATA_ROOT || path.join(process.cwd(), 'raw_data');
  const rootDir = path.resolve(rawRoot);
  const defaults = DEFAULT_CURATION_SETTINGS;

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
      bodyLimit: env.BODY_LIMIT?.trim() || '2mb',
    },
    curation: {
      similarityThreshold: numberFromEnv(env.CURATION_SIMILARITY_THRESHOLD, defaults.similarityThreshold),
      perDomainCap: numberFromEnv(env.CURATION_PER_DOMAIN_CAP, defaults.perDomainCap),
      editorialWeight: numberFromEnv(env.CURATION_EDITORIAL_WEIGHT, defaults.editorialWeight),
      popularityWeight: numberFromEnv(env.CURATION_POPULARITY_WEIGHT, defaults.popularityWeight),
      qualityDomainAllowlist: listFromEnv(env.CURATION_QUALITY_DOMAINS, defaults.qualityDomainAllowlist),
      articlePathPatterns: listFromEnv(env.CURATION_ARTICLE_PATH_PATTERNS, defaults.articlePathPatterns),
      poorPathPatterns: listFromEnv(env.CURATION_POOR_PATH_PATTERNS, defaults.poorPathPatterns),
      excludedDomains: listFromEnv(env.CURATION_EXCLUDED_DOMAINS, defaults.excludedDomains),
      minTitleLength: numberFromEnv(env.CURATION_MIN_TITLE_LENGTH, defaults.minTitleLength),
      minTitleWords: numberFromEnv(env.CURATION_MIN_TITLE_WORDS, defaults.minTitleWords),
      dropTruncatedTitles: booleanFromEnv(env.CURATION_DROP_TRUNCATED_TITLES, defaults.dropTruncatedTitles),
      defaultEditorialScore: numberFromEnv(env.CURATION_DEFAULT_EDITORIAL_SCORE, defaults.defaultEditorialScore),
    },
    persistence: {
      mode: (env.PERSISTENCE_MODE || 'fs').trim().toLowerCase(),
      rootDir,
      outputsDir: path.join(rootDir, 'outputs'),
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').trim().toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};
