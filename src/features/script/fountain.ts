import type { RawScene } from './types.js';
import { headingOf, segmentLines } from './segmentation.js';

const TITLE_KEY_RE = /^(?:title|credit|authors?|source|draft date|date|contact|copyright|notes|revision)\s*:/i;

/**
 * Strip the parts of Fountain markup that are never script content:
 * boneyard comments, notes, the title page, sections, synopses and page breaks.
 */
export function stripFountainMarkup(text: string): string {
  let t = text.replace(/\/\*[\s\S]*?\*\//g, '');
  t = t.replace(/\[\[[\s\S]*?\]\]/g, '');

  const lines = t.split('\n');
  let start = 0;
  while (start < lines.length && !(lines[start] ?? '').trim()) start++;
  if (TITLE_KEY_RE.test(lines[start] ?? '')) {
    let end = start;
    while (end < lines.length && (lines[end] ?? '').trim()) end++;
    // a block holding a scene heading is script, not a title page
    const block = lines.slice(start, end);
    if (!block.some(l => headingOf(l, { forcedHeadings: true }) !== null)) start = end;
  }

  return lines
    .slice(start)
    .filter(l => !/^\s*#/.test(l) && !/^\s*=(?!=)/.test(l) && !/^\s*={3,}\s*$/.test(l))
    .join('\n');
}

export function parseFountain(text: string): { scenes: RawScene[]; preamble: string[] } {
  const body = stripFountainMarkup(text);
  return segmentLines(body.split('\n'), { forcedHeadings: true });
}
