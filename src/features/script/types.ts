export type ScriptFormat = 'text' | 'fountain' | 'fdx';

export const SCRIPT_FORMATS: readonly ScriptFormat[] = ['text', 'fountain', 'fdx'];

export interface SceneRecord {
  readonly index: number;        // 1-based, strictly increasing
  readonly heading: string;      // normalized heading line
  readonly body: string;         // text between this heading and the next
  readonly characters: readonly string[]; // sorted, de-duplicated
}

export interface ScriptDocument {
  source: string;      // file path or caller-supplied label
  format: ScriptFormat;
  checksum: string;    // sha256 of normalized text
  scenes: readonly SceneRecord[];
  warnings: string[];
}

/** Scene as assembled by a format parser, before indices are assigned and it is frozen. */
export interface RawScene {
  heading: string;
  lines: string[];
  cues: Set<string>;
}

export type Severity = 'high' | 'medium' | 'low';

export const SEVERITIES: readonly Severity[] = ['high', 'medium', 'low'];

export interface Finding {
  sceneIndex: number;
  category: string;    // e.g. missing_scene_heading, continuity, character_consistency
  severity: Severity;
  message: string;
  suggestions: readonly string[];
}
