import 'dotenv/config';
import cors from 'cors';
import express from 'express';
import type { Request, Response } from 'express';
import { loadConfig, getPublicConfig } from './config/config';
import { createSseStream } from './http/sse';
import { createArtifactStore } from './persistence/fsStore';
import { createLogger } from './obs/logger';
import { runCuration } from './pipeline/curate';
import { handleCurateStream } from './pipeline/curateStream';
import { handleAuditCitations, handleFixCitations } from './pipeline/auditCitations';

const RUN_ARTIFACT_KINDS = new Set(['curation_request', 'curation_result']);

const config = loadConfig();
const store = createArtifactStore(config);
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  persistence: config.persistence.mode,
  curation: {
    similarityThreshold: config.curation.similarityThreshold,
    perDomainCap: config.curation.perDomainCap,
    editorialWeight: config.curation.editorialWeight,
    popularityWeight: config.curation.popularityWeight,
    qualityDomains: config.curation.qualityDomainAllowlist.length,
    excludedDomains: config.curation.excludedDomains.length,
  },
});

const app = express();

app.use(cors());
app.use(express.json({ limit: config.server.bodyLimit }));

if (config.observability.logLevel === 'debug') {
  app.use((req, res, next) => {
    const startedAt = Date.now();
    logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
    let finished = false;
    res.on('finish', () => {
      finished = true;
      logger.debug('HTTP response', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        elapsedMs: Date.now() - startedAt,
      });
    });
    res.on('close', () => {
      if (finished) return;
      logger.debug('HTTP closed early', {
        method: req.method,
        path: req.originalUrl,
        elapsedMs: Date.now() - startedAt,
      });
    });
    next();
  });
}

app.get('/api/healthz', (_req: Request, res: Response) => {
  res.json({ ok: true, ts: new Date().toISOString() });
});

app.get('/api/config', (_req: Request, res: Response) => {
  res.json(getPublicConfig(config));
});

app.post('/api/curate', async (req: Request, res: Response) => {
  try {
    const outcome = await runCuration({ body: req.body, config, store, logger });
    if (!outcome.ok) {
      res.status(outcome.status).json(outcome.body);
      return;
    }
    res.json(outcome.result);
  } catch (error) {
    logger.error('Curation failed', { error: error instanceof Error ? error.message : String(error) });
    res.status(500).json({ error: 'Curation failed' });
  }
});

app.post('/api/curate-stream', async (req: Request, res: Response) => {
  const stream = createSseStream(res, {
    heartbeatMs: config.server.heartbeatIntervalMs,
    label: 'curate',
    onError: (error, context) => {
      logger.warn('SSE write failed', {
        ...context,
        error: error instanceof Error ? error.message : String(error),
      });
    },
  });

  await handleCurateStream({ body: req.body, config, stream, store, logger });
});

app.post('/api/audit-citations', (req: Request, res: Response) => {
  const outcome = handleAuditCitations(req.body);
  if (!outcome.ok) {
    res.status(outcome.status).json(outcome.body);
    return;
  }
  res.json(outcome.result);
});

app.post('/api/fix-citations', (req: Request, res: Response) => {
  const outcome = handleFixCitations(req.body);
  if (!outcome.ok) {
    res.status(outcome.status).json(outcome.body);
    return;
  }
  res.json(outcome.result);
});

app.get('/api/runs/:runId/artifacts/:kind', async (req: Request, res: Response) => {
  const runId = String(req.params.runId || '').trim();
  const kind = String(req.params.kind || '').trim();
  if (!runId || !RUN_ARTIFACT_KINDS.has(kind)) {
    res.status(400).json({ error: 'Missing runId or unknown artifact kind' });
    return;
  }
  try {
    const content = await store.readRunArtifact(runId, kind);
    if (content == null) {
      res.status(404).json({ error: 'Not found' });
      return;
    }
    res.type('application/json').send(content);
  } catch (error) {
    logger.error('Artifact read failed', {
      runId,
      kind,
      error: error instanceof Error ? error.message : String(error),
    });
    res.status(500).json({ error: 'Failed to read artifact' });
  }
});

const port = config.server.port;

app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});
