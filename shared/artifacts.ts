export type RunArtifactKind = 'curation_request' | 'curation_result';

export interface ArtifactStore {
  ensureLayout: () => Promise<void>;
  saveRunArtifact: (runId: string, kind: RunArtifactKind, data: unknown) => Promise<string>;
  /** Raw JSON of a stored artifact, or null when there is none. */
  readRunArtifact: (runId: string, kind: string) => Promise<string | null>;
}

export const createNoopArtifactStore = (): ArtifactStore => ({
  ensureLayout: async () => {},
  saveRunArtifact: async () => '',
  readRunArtifact: async () => null,
});
