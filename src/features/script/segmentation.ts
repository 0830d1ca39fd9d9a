// src/features/script/segmentation.ts
import type { RawScene } from './types.js';
import { cueName } from './characters.js';

/** Scene heading: INT. / EXT. / EST. / INT./EXT. / I/E, optionally preceded by a scene number. */
const HEADING_RE = /^\s*(?:\d+[A-Z]?[.:)]?\s+)?((?:INT\.?\/EXT|INT|EXT|EST|I\/E)(?:\.|\s)\s*\S.*?)\s*$/i;

/** Explicit scene markers used in prose drafts: [SCENE: CH01_S01 | POV: ...] or "Scene 12: The Docks". */
const MARKER_RE = /^\s*\[SCENE[:\s][^\]]*\]\s*$/i;
const NUMBERED_RE = /^\s*SCENE\s+\d+[A-Z]?\s*(?:[:.\-–]\s*.*)?$/i;

/** Fountain scene number suffix: INT. HOUSE - DAY #12A# */
const SCENE_NUMBER_SUFFIX_RE = /\s*#[^#\s]+#\s*$/;

export interface SegmentOptions {
  /** Fountain: a line starting with a single "." is a forced heading. */
  forcedHeadings?: boolean;
  /** Plain text: accept [SCENE: …] and "Scene N" marker lines as headings. */
  markers?: boolean;
}

export interface SegmentResult {
  scenes: RawScene[];
  preamble: string[];
}

export function isSlugline(line: string): boolean {
  return HEADING_RE.test(line);
}

/** Returns the normalized heading when `line` opens a scene, else null. */
export function headingOf(line: string, opts: SegmentOptions = {}): string | null {
  if (opts.forcedHeadings && /^\.[^.]/.test(line.trim())) {
    return collapse(line.trim().slice(1).replace(SCENE_NUMBER_SUFFIX_RE, ''));
  }
  const m = HEADING_RE.exec(line);
  if (m?.[1]) return normalizeSlugline(m[1].replace(SCENE_NUMBER_SUFFIX_RE, ''));
  if (opts.markers && (MARKER_RE.test(line) || NUMBERED_RE.test(line))) return collapse(line);
  return null;
}

export function normalizeSlugline(h: string): string {
  // trailing scene numbers separated by runs of spaces or tabs
  let clean = collapse(h.replace(/(?:\s{2,}|\t)+\d+[A-Z]?\s*$/, ''));
  clean = clean.replace(/^(INT\.?\/EXT|I\/E|INT|EXT|EST)\.?\s*/i, (_, p: string) => {
    const prefix = p.toUpperCase();
    if (prefix === 'I/E') return 'I/E ';
    if (prefix.includes('/')) return 'INT./EXT. ';
    return `${prefix}. `;
  });
  return clean.toUpperCase().replace(/\s+[-–—]+\s*|\s*[-–—]+\s+/g, ' - ').trim();
}

/**
 * Split lines into scenes at heading lines. Lines before the first heading are returned
 * as preamble. Character cues are collected per scene: a cue line must follow a blank
 * line and be followed by a non-blank line.
 */
export function segmentLines(lines: string[], opts: SegmentOptions = {}): SegmentResult {
  const scenes: RawScene[] = [];
  const preamble: string[] = [];
  let cur: RawScene | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const heading = headingOf(line, opts);
    if (heading !== null) {
      cur = { heading, lines: [], cues: new Set() };
      scenes.push(cur);
      continue;
    }
    if (!cur) {
      if (line.trim()) preamble.push(line);
      continue;
    }
    cur.lines.push(line);

    const prevBlank = i === 0 || !(lines[i - 1] ?? '').trim() || headingOf(lines[i - 1] ?? '', opts) !== null;
    const next = lines[i + 1] ?? '';
    if (prevBlank && next.trim() && headingOf(next, opts) === null) {
      const name = cueName(line);
      if (name) cur.cues.add(name);
    }
  }
  return { scenes, preamble };
}

function collapse(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}
