import type { Report } from './types.js';

export type TextReportFormat = 'json' | 'html' | 'markdown';

export function serializeReport(report: Report, format: TextReportFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(report, null, 2) + '\n';
    case 'html':
      return toHtml(report);
    case 'markdown':
      return toMarkdown(report);
  }
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Table-cell safe: pipes escaped, line breaks flattened. */
export function escapeMarkdownCell(s: string): string {
  return s.replace(/\\/g, '\\\\').replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ');
}

const STYLE = [
  'body{font-family:system-ui,Arial,sans-serif;line-height:1.5;max-width:960px;margin:2rem auto;padding:0 1rem}',
  '.valid{color:#15803d}.invalid{color:#b91c1c}',
  '.high{color:#b91c1c}.medium{color:#c2410c}.low{color:#1d4ed8}',
  'table{width:100%;border-collapse:collapse;margin:1rem 0}',
  'td,th{border:1px solid #ddd;padding:6px 8px;text-align:left;vertical-align:top}',
  'dl{display:grid;grid-template-columns:max-content 1fr;gap:.25rem 1rem}dt{font-weight:600}',
].join('');

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function toHtml(r: Report): string {
  const e = escapeHtml;
  const meta: Array<[string, string]> = [
    ['Source', r.metadata.source],
    ['Format', r.metadata.format],
    ['Checksum', r.metadata.checksum],
    ['Generated', r.metadata.generatedAt],
    ['Tool version', r.metadata.toolVersion],
  ];
  if (r.metadata.model) meta.push(['Model', r.metadata.model]);

  const parts: string[] = [
    '<!doctype html>',
    '<html lang="en"><head><meta charset="utf-8"><title>Scene Validation Report</title>',
    `<style>${STYLE}</style></head><body>`,
    '<h1>Scene Validation Report</h1>',
    `<h2 class="${r.valid ? 'valid' : 'invalid'}">Status: ${r.valid ? 'Valid' : 'Invalid'}</h2>`,
    `<dl>${meta.map(([k, v]) => `<dt>${e(k)}</dt><dd>${e(v)}</dd>`).join('')}</dl>`,
    `<h3>Summary</h3><p>${e(r.summary)}</p>`,
    '<h3>Scenes</h3><table><tr><th>#</th><th>Heading</th><th>Characters</th></tr>',
    ...r.scenes.map(s => `<tr><td>${s.index}</td><td>${e(s.heading)}</td><td>${e(s.characters.join(', '))}</td></tr>`),
    '</table>',
    '<h3>Issues</h3>',
  ];
  if (r.findings.length === 0) {
    parts.push('<p>No issues found!</p>');
  } else {
    parts.push('<table><tr><th>Scene</th><th>Type</th><th>Description</th><th>Severity</th><th>Suggestions</th></tr>');
    for (const f of r.findings) {
      const tips = f.suggestions.length ? `<ul>${f.suggestions.map(s => `<li>${e(s)}</li>`).join('')}</ul>` : '';
      parts.push(
        `<tr><td>${f.sceneIndex}</td><td>${e(f.category)}</td><td>${e(f.message)}</td>` +
        `<td class="${f.severity}">${capitalize(f.severity)}</td><td>${tips}</td></tr>`,
      );
    }
    parts.push('</table>');
  }
  parts.push('</body></html>');
  return parts.join('\n') + '\n';
}

function toMarkdown(r: Report): string {
  const c = escapeMarkdownCell;
  const lines: string[] = [
    '# Scene Validation Report',
    '',
    `- **Source:** ${r.metadata.source}`,
    `- **Format:** ${r.metadata.format}`,
    `- **Checksum:** ${r.metadata.checksum}`,
    `- **Generated:** ${r.metadata.generatedAt}`,
    `- **Tool version:** ${r.metadata.toolVersion}`,
  ];
  if (r.metadata.model) lines.push(`- **Model:** ${r.metadata.model}`);
  lines.push(`- **Status:** ${r.valid ? 'Valid' : 'Invalid'}`, '', '## Summary', '', r.summary, '', '## Scenes', '');
  lines.push('| # | Heading | Characters |', '|---|---|---|');
  for (const s of r.scenes) lines.push(`| ${s.index} | ${c(s.heading)} | ${c(s.characters.join(', '))} |`);
  lines.push('', '## Issues', '');
  if (r.findings.length === 0) {
    lines.push('No issues found!');
  } else {
    lines.push('| Scene | Type | Severity | Description | Suggestions |', '|---|---|---|---|---|');
    for (const f of r.findings) {
      lines.push(`| ${f.sceneIndex} | ${c(f.category)} | ${f.severity} | ${c(f.message)} | ${c(f.suggestions.join('; '))} |`);
    }
  }
  return lines.join('\n') + '\n';
}
