import type { StoryboardFrame } from './types.js';
import { escapeHtml } from '../report/formats.js';

export interface ImageSize {
  width: number;
  height: number;
}

export const MAX_IMAGE_CHARACTERS = 5;

const MARGIN = 20;
const LINE = 20;
// average glyph advance of 14px sans-serif
const SMALL_GLYPH = 7;

/** Greedy word wrap to at most `width` characters per line; overlong words are split. */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = '';
  for (let word of text.split(/\s+/).filter(Boolean)) {
    while (word.length > width) {
      if (line) { lines.push(line); line = ''; }
      lines.push(word.slice(0, width));
      word = word.slice(width);
    }
    if (!word) continue;
    if (!line) line = word;
    else if (line.length + 1 + word.length <= width) line += ' ' + word;
    else { lines.push(line); line = word; }
  }
  if (line) lines.push(line);
  return lines;
}

/** Placeholder frame: label, heading, wrapped description and up to five characters. */
export function renderFrameImage(frame: StoryboardFrame, size: ImageSize): string {
  const { width, height } = size;
  const e = escapeHtml;
  const cast = frame.characters.slice(0, MAX_IMAGE_CHARACTERS);
  const castBlock = cast.length ? (cast.length + 1) * LINE + LINE : 0;

  const descTop = 100;
  const room = Math.max(1, Math.floor((height - descTop - castBlock - MARGIN) / LINE));
  let desc = wrapText(frame.description, Math.max(10, Math.floor((width - 2 * MARGIN) / SMALL_GLYPH)));
  if (desc.length > room) {
    desc = desc.slice(0, room);
    desc[room - 1] = `${desc[room - 1] ?? ''}…`;
  }

  const text = (x: number, y: number, px: number, s: string, weight = 'normal') =>
    `  <text x="${x}" y="${y}" font-size="${px}" font-weight="${weight}">${e(s)}</text>`;

  const body: string[] = [
    text(MARGIN, 36, 20, frame.label, 'bold'),
    text(MARGIN, 66, 20, frame.heading),
  ];
  let y = descTop;
  for (const l of desc) { body.push(text(MARGIN, y, 14, l)); y += LINE; }
  if (cast.length) {
    y += LINE;
    body.push(text(MARGIN, y, 14, 'Characters:', 'bold'));
    for (const c of cast) { y += LINE; body.push(text(2 * MARGIN, y, 14, `- ${c}`)); }
  }

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `  <rect width="100%" height="100%" fill="#f0f0f0"/>`,
    `  <g font-family="Arial, Helvetica, sans-serif" fill="#000">`,
    ...body.map(l => '  ' + l),
    '  </g>',
    '</svg>',
    '',
  ].join('\n');
}
