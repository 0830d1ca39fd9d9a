import type { Finding, SceneRecord } from '../script/types.js';

export interface AnalyzeContext {
  signal?: AbortSignal;
}

/** One scene in, zero or more findings out. */
export interface SceneAnalyzer {
  readonly name: string;
  analyze(scene: SceneRecord, ctx?: AnalyzeContext): Promise<Finding[]>;
}
