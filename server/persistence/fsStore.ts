import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import { createNoopArtifactStore, type ArtifactStore } from '../../shared/artifacts';

const sanitizeSegment = (value: string): string =>
  value.replace(/[^a-z0-9_\-]/gi, '_').slice(0, 80) || 'artifact';

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to access a path outside of persistence root: ${target}`);
  }
};

const artifactPath = (config: AppConfig, runId: string, kind: string): string => {
  const target = path.join(config.persistence.outputsDir, sanitizeSegment(runId), `${sanitizeSegment(kind)}.json`);
  guardPath(config.persistence.rootDir, target);
  return target;
};

export const createFsArtifactStore = (config: AppConfig): ArtifactStore => {
  const ensureLayout = async () => {
    await ensureDir(config.persistence.rootDir);
    await ensureDir(config.persistence.outputsDir);
  };

  const saveRunArtifact: ArtifactStore['saveRunArtifact'] = async (runId, kind, data) => {
    const target = artifactPath(config, runId, kind);
    await ensureDir(path.dirname(target));
    await fs.writeFile(target, JSON.stringify(data, null, 2), 'utf-8');
    return target;
  };

  const readRunArtifact: ArtifactStore['readRunArtifact'] = async (runId, kind) => {
    try {
      return await fs.readFile(artifactPath(config, runId, kind), 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  };

  return {
    ensureLayout,
    saveRunArtifact,
    readRunArtifact,
  };
};

export const createArtifactStore = (config: AppConfig): ArtifactStore =>
  config.persistence.mode === 'fs' ? createFsArtifactStore(config) : createNoopArtifactStore();
