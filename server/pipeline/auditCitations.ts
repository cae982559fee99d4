import type { CitationAuditResult, CitationFixResult } from '../../shared/types';
import { auditCitations, fixCitations } from '../curation/citations';
import {
  AuditCitationsRequestSchema,
  FixCitationsRequestSchema,
  describeIssues,
  type RequestValidationError,
} from './requestSchemas';

type HandlerOutcome<T> = { ok: true; result: T } | { ok: false; status: 400; body: RequestValidationError };

export type AuditOutcome = HandlerOutcome<CitationAuditResult>;

export const handleAuditCitations = (body: unknown): AuditOutcome => {
  const parsed = AuditCitationsRequestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      status: 400,
      body: { error: 'Invalid citation audit request', issues: describeIssues(parsed.error) },
    };
  }
  return { ok: true, result: auditCitations(parsed.data.markdown, parsed.data.urls) };
};

export const handleFixCitations = (body: unknown): HandlerOutcome<CitationFixResult> => {
  const parsed = FixCitationsRequestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      status: 400,
      body: { error: 'Invalid citation fix request', issues: describeIssues(parsed.error) },
    };
  }
  const { markdown, articles, similarityThreshold } = parsed.data;
  return { ok: true, result: fixCitations(markdown, articles, similarityThreshold) };
};
