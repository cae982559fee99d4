import { ZodError } from 'zod';
import type { AppConfig } from '../../shared/config';
import { mergeCurationSettings } from '../../shared/config';
import type { ArtifactStore } from '../../shared/artifacts';
import { randomId } from '../../shared/crypto';
import type { CurationRunResult } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { curateBatch, type StageReport } from '../curation/pipeline';
import {
  CurateRequestSchema,
  describeIssues,
  type CurateRequestBody,
  type RequestValidationError,
} from './requestSchemas';

export interface RunCurationArgs {
  body: unknown;
  config: AppConfig;
  store: ArtifactStore;
  logger: Logger;
  runId?: string;
  onStage?: (report: StageReport) => void;
}

export type CurationOutcome =
  | { ok: true; result: CurationRunResult }
  | { ok: false; status: 400; body: RequestValidationError };

export const parseCurateBody = (
  body: unknown,
): { ok: true; request: CurateRequestBody } | { ok: false; body: RequestValidationError } => {
  const parsed = CurateRequestSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, body: { error: 'Invalid curation request', issues: describeIssues(parsed.error) } };
  }
  return { ok: true, request: parsed.data };
};

/**
 * Validates a curation request, runs the pipeline with the request's option
 * overrides and stores the request and result as run artifacts.
 */
export const runCuration = async ({
  body,
  config,
  store,
  logger,
  runId = randomId(),
  onStage,
}: RunCurationArgs): Promise<CurationOutcome> => {
  const parsed = parseCurateBody(body);
  if (!parsed.ok) {
    return { ok: false, status: 400, body: parsed.body };
  }

  let settings = config.curation;
  try {
    settings = mergeCurationSettings(config.curation, parsed.request.options);
  } catch (error) {
    if (error instanceof ZodError) {
      return {
        ok: false,
        status: 400,
        body: { error: 'Invalid curation options', issues: describeIssues(error) },
      };
    }
    throw error;
  }

  const runLogger = logger.child({ runId });
  await store.ensureLayout();
  await store.saveRunArtifact(runId, 'curation_request', parsed.request);

  const startedAt = Date.now();
  const result = curateBatch(parsed.request, { settings, runId, logger: runLogger, onStage });
  runLogger.info('Curation run complete', {
    categories: result.categories.length,
    articles: result.categories.reduce((sum, category) => sum + category.articles.length, 0),
    elapsedMs: Date.now() - startedAt,
  });

  await store.saveRunArtifact(runId, 'curation_result', result);
  return { ok: true, result };
};
