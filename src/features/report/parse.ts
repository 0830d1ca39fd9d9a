import { z } from 'zod';
import type { Report } from './types.js';
import { checkInvariants, freezeReport } from './builder.js';
import { ReportError } from '../../utils/errors.js';

const FindingSchema = z.object({
  sceneIndex: z.number().int().positive(),
  category: z.string(),
  severity: z.enum(['high', 'medium', 'low']),
  message: z.string(),
  suggestions: z.array(z.string()),
});

export const ReportSchema = z.object({
  metadata: z.object({
    source: z.string(),
    format: z.enum(['text', 'fountain', 'fdx']),
    checksum: z.string(),
    generatedAt: z.string().datetime(),
    toolVersion: z.string(),
    model: z.string().optional(),
  }),
  scenes: z.array(z.object({
    index: z.number().int().positive(),
    heading: z.string(),
    characters: z.array(z.string()),
  })),
  findings: z.array(FindingSchema),
  valid: z.boolean(),
  summary: z.string(),
});

/**
 * Inverse of the json serialization. Structural problems and broken report invariants
 * surface as ReportError; the result is frozen like a built report.
 */
export function parseReport(json: string): Report {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    throw new ReportError(`report is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const r = ReportSchema.safeParse(raw);
  if (!r.success) {
    const issues = r.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ReportError(`report does not match the expected shape: ${issues.join('; ')}`);
  }
  checkInvariants(r.data.scenes.map(s => s.index), r.data.findings);
  return freezeReport(r.data);
}
