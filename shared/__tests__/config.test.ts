import { describe, expect, it } from 'vitest';
import {
  CurationOverridesSchema,
  DEFAULT_CURATION_SETTINGS,
  getPublicConfig,
  mergeCurationSettings,
  type AppConfig,
} from '../config';

describe('mergeCurationSettings', () => {
  it('returns the base settings when there are no overrides', () => {
    expect(mergeCurationSettings(DEFAULT_CURATION_SETTINGS, undefined)).toBe(DEFAULT_CURATION_SETTINGS);
  });

  it('applies overrides on top of the base', () => {
    const merged = mergeCurationSettings(DEFAULT_CURATION_SETTINGS, { perDomainCap: 1, similarityThreshold: 0.5 });
    expect(merged).toEqual({ ...DEFAULT_CURATION_SETTINGS, perDomainCap: 1, similarityThreshold: 0.5 });
  });

  it('validates the merged weights together', () => {
    expect(() => mergeCurationSettings(DEFAULT_CURATION_SETTINGS, { editorialWeight: 0.5 })).toThrow(/must sum to 1/);
    expect(
      mergeCurationSettings(DEFAULT_CURATION_SETTINGS, { editorialWeight: 0.5, popularityWeight: 0.5 }).editorialWeight,
    ).toBe(0.5);
  });
});

describe('CurationOverridesSchema', () => {
  it('accepts partial settings and rejects out-of-range values', () => {
    expect(CurationOverridesSchema.safeParse({ perDomainCap: 2 }).success).toBe(true);
    expect(CurationOverridesSchema.safeParse({ perDomainCap: 0 }).success).toBe(false);
    expect(CurationOverridesSchema.safeParse({ similarityThreshold: 1.5 }).success).toBe(false);
  });
});

describe('getPublicConfig', () => {
  it('exposes curation knobs and persistence mode only', () => {
    const config: AppConfig = {
      environment: 'test',
      server: { port: 3001, heartbeatIntervalMs: 15_000, bodyLimit: '2mb' },
      curation: DEFAULT_CURATION_SETTINGS,
      persistence: { mode: 'none', rootDir: '/tmp/curation', outputsDir: '/tmp/curation/outputs' },
      observability: { logLevel: 'info' },
    };

    expect(getPublicConfig(config)).toEqual({
      curation: {
        similarityThreshold: 0.3,
        perDomainCap: 3,
        editorialWeight: 0.7,
        popularityWeight: 0.3,
        qualityDomainAllowlist: DEFAULT_CURATION_SETTINGS.qualityDomainAllowlist,
        excludedDomains: ['reddit.com', 'quora.com', 'stackoverflow.com'],
      },
      persistence: { mode: 'none' },
    });
  });
});
