import type { Report } from './types.js';
import type { PandocRunner } from '../../lib/pandoc.js';
import { markdownToPdf, runPandoc } from '../../lib/pandoc.js';
import { serializeReport } from './formats.js';
import { createLogger } from '../../lib/logger.js';

const log = createLogger('report:pdf');

/** Markdown rendering of the report run through pandoc; null when pandoc is not installed. */
export function renderReportPdf(report: Report, run: PandocRunner = runPandoc): Buffer | null {
  // the report's own H1 would repeat the title block
  const md = serializeReport(report, 'markdown').replace(/^# .*\n\n/, '');
  const pdf = markdownToPdf(md, { title: `Scene Validation Report: ${report.metadata.source}`, date: report.metadata.generatedAt }, run);
  if (!pdf) log.warn('pandoc not found on PATH; pdf output unavailable');
  return pdf;
}
