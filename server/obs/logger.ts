import type { AppConfig } from '../../shared/config';

export type LogLevel = AppConfig['observability']['logLevel'];

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  /** Logger that adds `bindings` to every line. */
  child: (bindings: Record<string, unknown>) => Logger;
}

const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
  const base = {
    level,
    message,
    ts: new Date().toISOString(),
    ...meta,
  };
  const payload = JSON.stringify(base);
  /* eslint-disable no-console */
  if (level === 'error') {
    console.error(payload);
  } else if (level === 'warn') {
    console.warn(payload);
  } else {
    console.log(payload);
  }
  /* eslint-enable no-console */
};

const buildLogger = (threshold: number, bindings: Record<string, unknown>): Logger => {
  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (levelWeights[level] < threshold && level !== 'error') {
      return;
    }
    emit(level, message, { ...bindings, ...meta });
  };
  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (extra) => buildLogger(threshold, { ...bindings, ...extra }),
  };
};

export const createLogger = (
  config: Pick<AppConfig, 'observability'>,
  bindings: Record<string, unknown> = {},
): Logger => buildLogger(levelWeights[config.observability.logLevel], bindings);
