import { mkdir, writeFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type { ImageSize } from './image.js';
import type { Storyboard, StoryboardFormat, StoryboardFrame } from './types.js';
import { renderFrameImage } from './image.js';
import type { PandocRunner } from '../../lib/pandoc.js';
import { markdownToPdf, pandocAvailable, runPandoc } from '../../lib/pandoc.js';
import { escapeHtml, escapeMarkdownCell } from '../report/formats.js';
import { createLogger } from '../../lib/logger.js';
import { ExportError } from '../../utils/errors.js';

const log = createLogger('storyboard:export');

type FileFormat = Exclude<StoryboardFormat, 'all'>;
type TextFormat = Exclude<FileFormat, 'pdf'>;
const EXTENSIONS: Record<FileFormat, string> = { html: 'html', json: 'json', markdown: 'md', pdf: 'pdf' };

export function frameImageName(sceneIndex: number): string {
  return `frames/scene_${String(sceneIndex).padStart(3, '0')}.svg`;
}

/** Writes one SVG per frame under `<outputDir>/frames` and records the relative paths. */
export async function writeFrameImages(sb: Storyboard, outputDir: string, size: ImageSize): Promise<Storyboard> {
  await mkdir(join(outputDir, 'frames'), { recursive: true });
  const frames: StoryboardFrame[] = [];
  for (const frame of sb.frames) {
    const imagePath = frameImageName(frame.sceneIndex);
    await writeFile(join(outputDir, imagePath), renderFrameImage(frame, size), 'utf-8');
    frames.push({ ...frame, imagePath });
  }
  log.debug('frame images written', { count: frames.length, dir: outputDir });
  return { ...sb, frames };
}

export function serializeStoryboard(sb: Storyboard, format: TextFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(sb, null, 2) + '\n';
    case 'html':
      return toHtml(sb);
    case 'markdown':
      return toMarkdown(sb);
  }
}

function baseName(title: string): string {
  const ext = extname(title);
  return (ext ? title.slice(0, -ext.length) : title) || 'storyboard';
}

/** Markdown rendering run through pandoc; null when pandoc is not installed. */
export function renderStoryboardPdf(sb: Storyboard, run: PandocRunner = runPandoc): Buffer | null {
  // the markdown H1 would repeat the title block
  const md = toMarkdown(sb).replace(/^# .*\n\n/, '');
  return markdownToPdf(md, { title: `Storyboard: ${sb.title}`, date: sb.generatedAt }, run);
}

/**
 * `all` writes html, json and markdown, then pdf when pandoc is installed. Returns the
 * written paths in that order. An explicit `pdf` without pandoc is an ExportError.
 */
export async function exportStoryboard(
  sb: Storyboard,
  format: StoryboardFormat,
  outputDir: string,
  opts: { pandoc?: PandocRunner } = {},
): Promise<string[]> {
  const run = opts.pandoc ?? runPandoc;
  const formats: FileFormat[] = format === 'all' ? ['html', 'json', 'markdown'] : [format];
  if (format === 'all') {
    if (pandocAvailable(run)) formats.push('pdf');
    else log.warn('pandoc not found on PATH; skipping storyboard pdf');
  }
  await mkdir(outputDir, { recursive: true });
  const paths: string[] = [];
  for (const f of formats) {
    const path = join(outputDir, `${baseName(sb.title)}.storyboard.${EXTENSIONS[f]}`);
    if (f === 'pdf') {
      const pdf = renderStoryboardPdf(sb, run);
      if (!pdf) throw new ExportError('pdf output requires pandoc on PATH; choose html, json or markdown instead');
      await writeFile(path, pdf);
    } else {
      await writeFile(path, serializeStoryboard(sb, f), 'utf-8');
    }
    paths.push(path);
  }
  log.info('storyboard exported', { formats, frames: sb.frames.length, dir: outputDir });
  return paths;
}

const STYLE = [
  'body{font-family:system-ui,Arial,sans-serif;max-width:1200px;margin:2rem auto;padding:0 1rem}',
  '.frames{display:grid;grid-template-columns:repeat(auto-fill,minmax(360px,1fr));gap:1.5rem}',
  '.frame{border:1px solid #ddd;border-radius:6px;padding:1rem}',
  '.frame img{width:100%;height:auto;border:1px solid #eee}',
  '.placeholder{aspect-ratio:16/9;background:#f0f0f0;display:flex;align-items:center;justify-content:center;color:#666}',
  '.meta{color:#555;font-size:.9rem}',
].join('');

function toHtml(sb: Storyboard): string {
  const e = escapeHtml;
  const frames = sb.frames.map(f => {
    const image = f.imagePath
      ? `<img src="${e(f.imagePath)}" alt="${e(f.label)}">`
      : `<div class="placeholder">${e(f.label)}</div>`;
    return [
      '<section class="frame">',
      image,
      `<h2>${e(f.label)}</h2>`,
      `<h3>${e(f.heading)}</h3>`,
      `<p>${e(f.description)}</p>`,
      `<p class="meta">Camera: ${e(f.cameraAngle)}, ${e(f.cameraMovement)}</p>`,
      f.characters.length ? `<p class="meta">Characters: ${e(f.characters.join(', '))}</p>` : '',
      f.notes ? `<p class="meta">Notes: ${e(f.notes)}</p>` : '',
      '</section>',
    ].filter(Boolean).join('\n');
  });
  return [
    '<!doctype html>',
    `<html lang="en"><head><meta charset="utf-8"><title>Storyboard: ${e(sb.title)}</title>`,
    `<style>${STYLE}</style></head><body>`,
    `<h1>Storyboard: ${e(sb.title)}</h1>`,
    `<p class="meta">Generated ${e(sb.generatedAt)}, ${sb.frames.length} frames</p>`,
    '<div class="frames">',
    ...frames,
    '</div>',
    '</body></html>',
    '',
  ].join('\n');
}

function toMarkdown(sb: Storyboard): string {
  const c = escapeMarkdownCell;
  const lines = [`# Storyboard: ${sb.title}`, '', `Generated ${sb.generatedAt}`, ''];
  for (const f of sb.frames) {
    lines.push(`## ${f.label}`, '', `**${f.heading}**`, '');
    if (f.imagePath) lines.push(`![${f.label}](${f.imagePath})`, '');
    if (f.description) lines.push(f.description, '');
    lines.push('| Camera angle | Movement | Characters | Notes |', '|---|---|---|---|');
    lines.push(`| ${c(f.cameraAngle)} | ${c(f.cameraMovement)} | ${c(f.characters.join(', '))} | ${c(f.notes)} |`, '');
  }
  return lines.join('\n');
}
