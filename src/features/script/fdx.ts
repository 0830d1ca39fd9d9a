import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type { RawScene } from './types.js';
import { canonicalName } from './characters.js';
import { normalizeSlugline } from './segmentation.js';

export class FdxFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FdxFormatError';
  }
}

interface Paragraph { type: string; text: string }

const NodeSchema = z.record(z.unknown());

function asRecord(v: unknown): Record<string, unknown> | undefined {
  const r = NodeSchema.safeParse(v);
  return r.success ? r.data : undefined;
}

function asList(v: unknown): unknown[] {
  if (v == null) return [];
  return Array.isArray(v) ? v : [v];
}

// <Text> runs are either plain strings or { '#text': '...', Style: '...' } when styled.
function coerceText(x: unknown): string {
  if (x == null) return '';
  if (typeof x === 'string') return x;
  if (typeof x === 'number' || typeof x === 'boolean') return String(x);
  const rec = asRecord(x);
  if (rec) return coerceText(rec['#text']);
  return '';
}

export function readParagraphs(xml: string): Paragraph[] {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new FdxFormatError(`malformed XML at line ${valid.err.line}: ${valid.err.msg}`);
  }
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    textNodeName: '#text',
    parseTagValue: false,
    trimValues: false,
    isArray: (name) => name === 'Paragraph' || name === 'Text',
  });
  const doc = asRecord(parser.parse(xml));
  const fd = asRecord(doc?.FinalDraft);
  if (!fd) throw new FdxFormatError('not a Final Draft document (no <FinalDraft> root)');
  const content = asRecord(fd.Content);

  return asList(content?.Paragraph).map((p) => {
    const rec = asRecord(p) ?? {};
    const type = typeof rec.Type === 'string' ? rec.Type : 'Action';
    const text = asList(rec.Text).map(coerceText).join('').replace(/\s+/g, ' ').trim();
    return { type, text };
  });
}

/** Final Draft XML: `Scene Heading` paragraphs open scenes, `Character` paragraphs are cues. */
export function parseFdx(xml: string): { scenes: RawScene[]; preamble: string[] } {
  const scenes: RawScene[] = [];
  const preamble: string[] = [];
  let cur: RawScene | null = null;

  for (const p of readParagraphs(xml)) {
    if (p.type === 'Scene Heading') {
      cur = { heading: normalizeSlugline(p.text) || 'UNTITLED SCENE', lines: [], cues: new Set() };
      scenes.push(cur);
      continue;
    }
    if (!cur) {
      if (p.text) preamble.push(p.text);
      continue;
    }
    if (p.type === 'Character') {
      const name = canonicalName(p.text);
      if (name) cur.cues.add(name);
    }
    cur.lines.push(p.text);
  }
  return { scenes, preamble };
}
