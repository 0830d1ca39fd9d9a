import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { RawScene, SceneRecord, ScriptDocument, ScriptFormat } from './types.js';
import { segmentLines } from './segmentation.js';
import { parseFountain } from './fountain.js';
import { FdxFormatError, parseFdx } from './fdx.js';
import { attributedNames } from './characters.js';
import { ParseError } from '../../utils/errors.js';
import { createLogger } from '../../lib/logger.js';

const log = createLogger('loader');

const EXTENSION_FORMATS: Record<string, ScriptFormat> = {
  '.fountain': 'fountain',
  '.spmd': 'fountain',
  '.fdx': 'fdx',
};

export function normalize(text: string): string {
  let t = text.replace(/\r\n/g, '\n').replace(/\r/g, '\n').replace(/^\uFEFF/, '');
  t = t.replace(/[ \t]+$/gm, '');
  t = t.replace(/\n+$/g, '\n');
  if (t.trim() && !t.endsWith('\n')) t += '\n';
  return t;
}

export function detectFormat(path: string): ScriptFormat {
  return EXTENSION_FORMATS[extname(path).toLowerCase()] ?? 'text';
}

/**
 * Parse script text into ordered scene records. Empty input yields no scenes;
 * non-empty input without a single scene heading is a ParseError.
 */
export function parseDocument(raw: string, format: ScriptFormat, source = '<inline>'): ScriptDocument {
  const text = normalize(raw);
  const checksum = createHash('sha256').update(text).digest('hex');
  const warnings: string[] = [];

  if (!text.trim()) {
    log.debug('empty document', { source });
    return { source, format, checksum, scenes: [], warnings };
  }

  let parsed: { scenes: RawScene[]; preamble: string[] };
  switch (format) {
    case 'fountain':
      parsed = parseFountain(text);
      break;
    case 'fdx':
      try {
        parsed = parseFdx(text);
      } catch (e) {
        if (e instanceof FdxFormatError) throw new ParseError(source, e.message, e);
        throw e;
      }
      break;
    case 'text':
      parsed = segmentLines(text.split('\n'), { markers: true });
      break;
  }

  if (parsed.scenes.length === 0) {
    if (format === 'fdx' && parsed.preamble.length === 0) {
      return { source, format, checksum, scenes: [], warnings };
    }
    throw new ParseError(source, `no scene headings found (format: ${format}); expected INT./EXT. sluglines${format === 'text' ? ' or [SCENE: …] markers' : ''}`);
  }
  if (parsed.preamble.length) {
    warnings.push(`${parsed.preamble.length} line(s) before the first scene heading were ignored`);
  }

  const scenes = parsed.scenes.map((s, i) => toRecord(s, i + 1, format));
  log.info('document parsed', { source, format, scenes: scenes.length });
  return { source, format, checksum, scenes, warnings };
}

export async function loadDocument(path: string, format?: ScriptFormat): Promise<ScriptDocument> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (e) {
    throw new ParseError(path, e instanceof Error ? e.message : 'file not readable', e);
  }
  return parseDocument(raw, format ?? detectFormat(path), path);
}

function toRecord(s: RawScene, index: number, format: ScriptFormat): SceneRecord {
  const body = trimBlankLines(s.lines).join('\n');
  const names = new Set(s.cues);
  if (format === 'text') for (const n of attributedNames(body)) names.add(n);
  return Object.freeze({
    index,
    heading: s.heading,
    body,
    characters: Object.freeze(Array.from(names).sort()),
  });
}

function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && !(lines[start] ?? '').trim()) start++;
  while (end > start && !(lines[end - 1] ?? '').trim()) end--;
  return lines.slice(start, end);
}
