import type { StageEvent, StageName } from '../../shared/types';

type StageEventSender = <T>(event: StageEvent<T>) => void;

const nowIso = () => new Date().toISOString();

export const makeStageEmitter = (runId: string, stage: StageName, send: StageEventSender) => {
  const emit = <T>(status: 'start' | 'progress' | 'success', payload?: { message?: string; data?: T }) => {
    send({
      runId,
      stage,
      status,
      message: payload?.message,
      data: payload?.data,
      ts: nowIso(),
    });
  };

  return {
    start: <T>(payload?: { message?: string; data?: T }) => emit('start', payload),
    progress: <T>(payload?: { message?: string; data?: T }) => emit('progress', payload),
    success: <T>(payload?: { message?: string; data?: T }) => emit('success', payload),
    failure: (error: unknown, options?: { data?: unknown }) => {
      const message = error instanceof Error ? error.message : String(error);
      send({
        runId,
        stage,
        status: 'failure',
        message,
        data: options?.data ?? { error: message },
        ts: nowIso(),
      });
    },
  };
};

export type StageEmitter = ReturnType<typeof makeStageEmitter>;
