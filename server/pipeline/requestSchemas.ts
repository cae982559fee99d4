import { z } from 'zod';
import { CurationOverridesSchema } from '../../shared/config';

const MAX_HITS_PER_LIST = 1000;

export const RawSearchHitSchema = z.object({
  id: z.string().nullish(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  sourceDomain: z.string().nullish(),
  snippet: z.string().nullish(),
  publishedAt: z.string().nullish(),
  editorialScore: z.number().finite().nullish(),
});

const hitList = z.array(RawSearchHitSchema).max(MAX_HITS_PER_LIST);

export const CurateRequestSchema = z.object({
  categories: z.record(z.string().min(1), hitList),
  siblingPools: z.record(z.string(), hitList).optional(),
  sourcesQueried: z.record(z.string(), z.number().int().positive()).optional(),
  flatten: z.boolean().optional(),
  options: CurationOverridesSchema.optional(),
});

export type CurateRequestBody = z.infer<typeof CurateRequestSchema>;

export const AuditCitationsRequestSchema = z.object({
  markdown: z.string(),
  urls: z.array(z.string()).default([]),
});

export type AuditCitationsRequestBody = z.infer<typeof AuditCitationsRequestSchema>;

export const FixCitationsRequestSchema = z.object({
  markdown: z.string(),
  articles: z.array(z.object({ title: z.string(), url: z.string() })).default([]),
  similarityThreshold: z.number().min(0).max(1).optional(),
});

export interface RequestValidationError {
  error: string;
  issues: Array<{ path: string; message: string }>;
}

export const describeIssues = (error: z.ZodError): RequestValidationError['issues'] =>
  error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
