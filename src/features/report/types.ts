import type { Finding, ScriptFormat } from '../script/types.js';

export interface ReportMetadata {
  source: string;
  format: ScriptFormat;
  checksum: string;
  generatedAt: string;  // ISO-8601
  toolVersion: string;
  model?: string;
}

export interface SceneSummary {
  index: number;
  heading: string;
  characters: readonly string[];
}

export interface Report {
  readonly metadata: ReportMetadata;
  readonly scenes: readonly SceneSummary[];
  readonly findings: readonly Finding[];
  readonly valid: boolean;
  readonly summary: string;
}
