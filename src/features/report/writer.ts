import { mkdir, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { ReportFormat } from '../../lib/config.js';
import type { Report } from './types.js';
import type { PandocRunner } from '../../lib/pandoc.js';
import { runPandoc } from '../../lib/pandoc.js';
import { renderReportPdf } from './pdf.js';
import { serializeReport } from './formats.js';
import { ExportError } from '../../utils/errors.js';
import { createLogger } from '../../lib/logger.js';

const log = createLogger('report');

const EXTENSIONS: Record<ReportFormat, string> = { json: 'json', html: 'html', markdown: 'md', pdf: 'pdf' };

export function reportFileName(source: string, format: ReportFormat): string {
  const base = basename(source, extname(source)) || 'script';
  return `${base}.validation.${EXTENSIONS[format]}`;
}

/** Writes `<basename>.validation.<ext>` under `outputDir` and returns its path. */
export async function writeReport(
  report: Report,
  format: ReportFormat,
  outputDir: string,
  opts: { pandoc?: PandocRunner } = {},
): Promise<string> {
  let body: string | Buffer;
  if (format === 'pdf') {
    const pdf = renderReportPdf(report, opts.pandoc ?? runPandoc);
    if (!pdf) throw new ExportError('pdf output requires pandoc on PATH; choose json, html or markdown instead');
    body = pdf;
  } else {
    body = serializeReport(report, format);
  }
  await mkdir(outputDir, { recursive: true });
  const path = join(outputDir, reportFileName(report.metadata.source, format));
  await writeFile(path, body);
  log.info('report written', { path, format, findings: report.findings.length });
  return path;
}
