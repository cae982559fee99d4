import type { AppConfig } from '../../shared/config';
import type { ArtifactStore } from '../../shared/artifacts';
import { randomId } from '../../shared/crypto';
import type { SseStream } from '../../shared/sse';
import type { StageName } from '../../shared/types';
import { createLogger, type Logger } from '../obs/logger';
import { runCuration } from './curate';
import { makeStageEmitter, type StageEmitter } from './stageEmitter';

export interface CurateStreamArgs {
  body: unknown;
  config: AppConfig;
  stream: SseStream;
  store: ArtifactStore;
  logger?: Logger;
}

const STAGES: StageName[] = ['filter', 'improve', 'rank'];

export const handleCurateStream = async ({
  body,
  config,
  stream,
  store,
  logger = createLogger(config),
}: CurateStreamArgs): Promise<void> => {
  const runId = randomId();
  const emitters = new Map<StageName, StageEmitter>();
  const started = new Set<StageName>();
  let current: StageName = 'filter';

  const emitterFor = (stage: StageName): StageEmitter => {
    const existing = emitters.get(stage);
    if (existing) return existing;
    const created = makeStageEmitter(runId, stage, (event) => stream.send(event));
    emitters.set(stage, created);
    return created;
  };

  try {
    const outcome = await runCuration({
      body,
      config,
      store,
      logger,
      runId,
      onStage: (report) => {
        current = report.stage;
        const emitter = emitterFor(report.stage);
        if (!started.has(report.stage)) {
          started.add(report.stage);
          emitter.start({ message: `Running ${report.stage} stage` });
        }
        emitter.progress({
          message: `${report.stage} complete for ${report.category}`,
          data: { category: report.category, ...report.summary },
        });
      },
    });

    if (!outcome.ok) {
      stream.sendJson('fatal', outcome.body);
      stream.close();
      return;
    }

    for (const stage of STAGES) {
      if (started.has(stage)) {
        emitterFor(stage).success({ message: `${stage} stage complete` });
      }
    }
    stream.sendJson('curation-result', outcome.result);
    stream.close();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Curation stream failed', { runId, stage: current, error: message });
    emitterFor(current).failure(error);
    stream.sendJson('fatal', { error: message });
    stream.close();
  }
};
