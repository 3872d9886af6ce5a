import type { Part } from './part.js';

/** Output produced by a task. Contains one or more parts. */
export interface Artifact {
  artifactId: string;
  name?: string;
  description?: string;
  parts: Part[];
  /** Always true for this agent: results are never chunked. */
  lastChunk: boolean;
}
