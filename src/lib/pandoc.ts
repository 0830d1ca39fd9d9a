import { spawnSync } from 'node:child_process';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ExportError } from '../utils/errors.js';

export interface PandocResult {
  status: number | null;
  stdout: string;
  stderr: string;
  missing: boolean;
}

export type PandocRunner = (args: string[], input?: string) => PandocResult;

export const runPandoc: PandocRunner = (args, input) => {
  const res = spawnSync('pandoc', args, { input, encoding: 'utf-8' });
  return {
    status: res.status,
    stdout: String(res.stdout ?? ''),
    stderr: String(res.stderr ?? ''),
    missing: res.error !== undefined,
  };
};

/** pandoc 2.0 or newer on PATH. */
export function pandocAvailable(run: PandocRunner = runPandoc): boolean {
  const res = run(['--version']);
  if (res.missing || res.status !== 0) return false;
  const m = /pandoc(?:\.exe)?\s+(\d+\.\d+(?:\.\d+)?)/i.exec(res.stdout);
  return !!m && parseFloat(m[1] ?? '0') >= 2.0;
}

export interface PdfMeta {
  title: string;
  date: string;
}

/**
 * Markdown to PDF with a YAML title block. Returns null when pandoc is not installed;
 * a failed conversion is an ExportError carrying pandoc's stderr.
 */
export function markdownToPdf(markdown: string, meta: PdfMeta, run: PandocRunner = runPandoc): Buffer | null {
  if (!pandocAvailable(run)) return null;
  const yaml = ['---', `title: ${JSON.stringify(meta.title)}`, `date: ${JSON.stringify(meta.date)}`, '---', ''].join('\n');
  const dir = mkdtempSync(join(tmpdir(), 'scenekit-pdf-'));
  const out = join(dir, 'out.pdf');
  try {
    const res = run(['-f', 'markdown', '-o', out], yaml + markdown);
    if (res.status !== 0) throw new ExportError(`pandoc failed (exit ${res.status ?? 'signal'}): ${res.stderr.trim()}`);
    return readFileSync(out);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}
