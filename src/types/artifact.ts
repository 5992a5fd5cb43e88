import type { Part } from './part.js';

/** Output produced by a task. Contains one or more parts. */
export interface Artifact {
  artifactId: string;
  name?: string;
  description?: string;
  parts: Part[];
  /** Set on the chunk that completes an incrementally built artifact. */
  lastChunk?: boolean;
}
