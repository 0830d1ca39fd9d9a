import { describe, it, expect } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { LLMCaller } from '../src/features/llm/providers.js';
import type { PandocRunner } from '../src/lib/pandoc.js';
import { UsageError, parseArgs } from '../src/cli/args.js';
import { runCli } from '../src/cli/index.js';
import { parseReport } from '../src/features/report/parse.js';
import { VERSION } from '../src/version.js';
import { FakeCaller, jsonResult } from './helpers/fake-caller.js';

const fixtures = fileURLToPath(new URL('./fixtures/', import.meta.url));
const fx = (name: string) => join(fixtures, name);
const outDir = () => mkdtempSync(join(tmpdir(), 'scenekit-cli-'));

const noPandoc: PandocRunner = () => ({ status: null, stdout: '', stderr: '', missing: true });

function io(caller: LLMCaller | null = null) {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, io: { stdout: (t: string) => { out.push(t); }, stderr: (t: string) => { err.push(t); }, env: {}, caller, pandoc: noPandoc } };
}

describe('parseArgs', () => {
  it('parses validate options in both spellings', () => {
    expect(parseArgs(['validate', 'a.txt', '--format=html', '--type', 'fdx', '--stdout'])).toEqual({
      command: 'validate', script: 'a.txt', config: undefined, type: 'fdx', output: undefined, format: 'html', stdout: true,
    });
    expect(parseArgs(['storyboard', 'a.fountain', '--output', 'out', '--config', 'c.json', '--format', 'all'])).toEqual({
      command: 'storyboard', script: 'a.fountain', config: 'c.json', type: undefined, output: 'out', format: 'all',
    });
  });

  it('treats no arguments and --help as help', () => {
    expect(parseArgs([])).toEqual({ command: 'help' });
    expect(parseArgs(['validate', '--help'])).toEqual({ command: 'help' });
    expect(parseArgs(['--version'])).toEqual({ command: 'version' });
  });

  it.each([
    [['lint', 'x'], 'unknown command "lint"'],
    [['validate'], 'validate: missing <script> argument'],
    [['validate', 'a', 'b'], 'validate: unexpected argument "b"'],
    [['validate', 'a', '--format', 'docx'], '--format must be one of json, html, markdown, pdf (got "docx")'],
    [['storyboard', 'a', '--format', 'docx'], '--format must be one of html, json, markdown, pdf, all (got "docx")'],
    [['validate', 'a', '--type', 'docx'], '--type must be one of text, fountain, fdx (got "docx")'],
    [['validate', 'a', '--output'], 'option --output needs a value'],
    [['validate', 'a', '--output', '--stdout'], 'option --output needs a value'],
    [['validate', 'a', '--colour', 'red'], 'unknown option --colour'],
    [['validate', 'a', '--stdout', '--format', 'pdf'], '--stdout cannot be combined with --format pdf'],
    [['storyboard', 'a', '--stdout'], '--stdout is only supported by validate'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(new UsageError(message));
  });
});

describe('runCli', () => {
  it('prints the version', async () => {
    const c = io();
    expect(await runCli(['--version'], c.io)).toBe(0);
    expect(c.out).toEqual([VERSION]);
  });

  it('exits 2 with usage on bad arguments', async () => {
    const c = io();
    expect(await runCli(['lint'], c.io)).toBe(2);
    expect(c.err[0]?.startsWith('error: unknown command "lint"\n\nUsage:')).toBe(true);
  });

  it('prints a json report to stdout', async () => {
    const c = io();
    expect(await runCli(['validate', fx('pier.txt'), '--stdout'], c.io)).toBe(0);
    const report = parseReport(c.out.join('\n'));
    expect(report.metadata.format).toBe('text');
    expect(report.scenes).toHaveLength(2);
    expect(report.valid).toBe(true);
  });

  it('writes the report file and summarizes it', async () => {
    const c = io();
    const dir = outDir();
    expect(await runCli(['validate', fx('harbor.fdx'), '--format', 'markdown', '--output', dir], c.io)).toBe(0);
    const path = join(dir, 'harbor.validation.md');
    expect(c.out).toEqual([
      `✅ Report saved to ${path}`,
      '   Status: Valid',
      '   Found 1 issues: 0 high, 1 medium, 0 low severity.',
    ]);
    expect(readFileSync(path, 'utf-8')).toContain('| 2 | character_consistency | medium |');
  });

  it('exits 0 for an invalid script and reports model findings', async () => {
    const c = io(new FakeCaller(() => jsonResult([{ issue_type: 'continuity', description: 'Coat changes colour', severity: 'high' }])));
    const dir = outDir();
    expect(await runCli(['validate', fx('pier.txt'), '--output', dir], c.io)).toBe(0);
    expect(c.out[1]).toBe('   Status: Invalid');
    const report = parseReport(readFileSync(join(dir, 'pier.validation.json'), 'utf-8'));
    expect(report.metadata.model).toBe('models/fake-model');
    expect(report.findings.map(f => f.sceneIndex)).toEqual([1, 2]);
  });

  it('takes the report format from the config file', async () => {
    const c = io();
    const dir = outDir();
    expect(await runCli(['validate', fx('pier.txt'), '--config', fx('config.json'), '--output', dir], c.io)).toBe(0);
    expect(existsSync(join(dir, 'pier.validation.md'))).toBe(true);
  });

  it('exits 1 with a categorized message on failure', async () => {
    const missing = io();
    expect(await runCli(['validate', fx('nope.fountain')], missing.io)).toBe(1);
    expect(missing.err[0]?.startsWith(`❌ Script could not be parsed: ${fx('nope.fountain')}: `)).toBe(true);

    const badConfig = io();
    expect(await runCli(['validate', fx('pier.txt'), '--config', fx('nope.json')], badConfig.io)).toBe(1);
    expect(badConfig.err[0]?.startsWith(`❌ Configuration error: Config file not readable: ${fx('nope.json')}`)).toBe(true);
  });

  it('prints an invalid config file on one line', async () => {
    const dir = outDir();
    const config = join(dir, 'bad.json');
    writeFileSync(config, JSON.stringify({ logging: { level: 'loud' }, output: { default_format: 'docx' } }));
    const c = io();
    expect(await runCli(['validate', fx('pier.txt'), '--config', config], c.io)).toBe(1);
    expect(c.err).toHaveLength(1);
    expect(c.err[0]).not.toContain('\n');
    expect(c.err[0]?.startsWith('❌ Configuration error: Invalid configuration: logging.level: ')).toBe(true);
    expect(c.err[0]).toContain('; output.default_format: ');
  });

  it('builds a storyboard with frame images', async () => {
    const c = io();
    const dir = outDir();
    expect(await runCli(['storyboard', fx('lighthouse.fountain'), '--format', 'json', '--output', dir], c.io)).toBe(0);
    expect(c.out).toEqual(['✅ Storyboard with 3 frames saved:', `   ${join(dir, 'lighthouse.storyboard.json')}`]);
    expect(existsSync(join(dir, 'frames', 'scene_003.svg'))).toBe(true);
  });

  it('skips frame images when the config turns them off', async () => {
    const c = io();
    const dir = outDir();
    expect(await runCli(['storyboard', fx('lighthouse.fountain'), '--config', fx('config.json'), '--output', dir], c.io)).toBe(0);
    expect(c.out).toHaveLength(4);
    expect(existsSync(join(dir, 'frames'))).toBe(false);
    const sb: unknown = JSON.parse(readFileSync(join(dir, 'lighthouse.storyboard.json'), 'utf-8'));
    expect(sb).toMatchObject({ frames: [{ label: 'Shot 1: INT. LIGHTHOUSE - NIGHT' }, { label: 'Shot 2: EXT. CLIFFS - DAY' }, { label: 'Shot 3: FLASHBACK' }] });
  });
});
