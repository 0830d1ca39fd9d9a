import type { Finding, Severity, ScriptDocument } from '../script/types.js';
import type { Report } from './types.js';
import { ReportError } from '../../utils/errors.js';

export interface BuildReportInput {
  document: ScriptDocument;
  findings: readonly Finding[];
  toolVersion: string;
  model?: string;
  now?: () => Date;
}

export function summarize(findings: readonly Finding[]): string {
  if (findings.length === 0) return 'No issues found in the script.';
  const n = countBySeverity(findings);
  return `Found ${findings.length} issues: ${n.high} high, ${n.medium} medium, ${n.low} low severity.`;
}

export function countBySeverity(findings: readonly Finding[]): Record<Severity, number> {
  const n: Record<Severity, number> = { high: 0, medium: 0, low: 0 };
  for (const f of findings) n[f.severity]++;
  return n;
}

/**
 * Aggregate findings into a frozen report. Findings are ordered by scene index, keeping
 * input order within a scene; a finding that names a missing scene is a ReportError.
 */
export function buildReport(input: BuildReportInput): Report {
  const { document } = input;
  checkInvariants(document.scenes.map(s => s.index), input.findings);

  // Array.prototype.sort is stable
  const findings = [...input.findings].sort((a, b) => a.sceneIndex - b.sceneIndex);

  return freezeReport({
    metadata: {
      source: document.source,
      format: document.format,
      checksum: document.checksum,
      generatedAt: (input.now ?? (() => new Date()))().toISOString(),
      toolVersion: input.toolVersion,
      ...(input.model ? { model: input.model } : {}),
    },
    scenes: document.scenes.map(s => ({ index: s.index, heading: s.heading, characters: [...s.characters] })),
    findings,
    valid: !findings.some(f => f.severity === 'high'),
    summary: summarize(findings),
  });
}

/** Scene indices strictly increase and every finding names one of them; ReportError otherwise. */
export function checkInvariants(sceneIndices: readonly number[], findings: readonly Finding[]): void {
  let prev = 0;
  for (const index of sceneIndices) {
    if (index <= prev) throw new ReportError(`scene indices must be strictly increasing (${index} after ${prev})`);
    prev = index;
  }
  const known = new Set(sceneIndices);
  for (const f of findings) {
    if (!known.has(f.sceneIndex)) {
      throw new ReportError(`finding "${f.category}" references scene ${f.sceneIndex}, which does not exist`);
    }
  }
}

/** Deep-freezes a report built from fresh copies of its parts. */
export function freezeReport(report: Report): Report {
  return Object.freeze({
    metadata: Object.freeze({ ...report.metadata }),
    scenes: Object.freeze(report.scenes.map(s => Object.freeze({ ...s, characters: Object.freeze([...s.characters]) }))),
    findings: Object.freeze(report.findings.map(f => Object.freeze({ ...f, suggestions: Object.freeze([...f.suggestions]) }))),
    valid: report.valid,
    summary: report.summary,
  });
}
