import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { resolveConfig } from '../src/lib/config.js';
import type { ConfigInput } from '../src/lib/config.js';
import { parseDocument } from '../src/features/script/importer.js';
import { analyzeDocument, createCaller, runValidation, validateDocument } from '../src/features/analysis/pipeline.js';
import { GeminiAuthError, GeminiNetworkError, GeminiProvider, GeminiRateLimitError } from '../src/features/llm/providers/gemini.js';
import { VERSION } from '../src/version.js';
import { FakeCaller, jsonResult } from './helpers/fake-caller.js';

const fixtures = fileURLToPath(new URL('./fixtures/', import.meta.url));
const TWO_SCENES = 'INT. A - DAY\nMara waits.\n\nINT. B - NIGHT\nRain.\n';

function setup(input: ConfigInput = {}) {
  const delays: number[] = [];
  return {
    config: resolveConfig(input, {}),
    delays,
    sleep: async (ms: number) => { delays.push(ms); },
  };
}

describe('analyzeDocument', () => {
  it('runs rule checks only when there is no model client', async () => {
    const { config } = setup();
    const doc = parseDocument('INT. A\nMara waits.\n', 'fountain');
    const findings = await analyzeDocument(doc, { config });
    expect(findings.map(f => f.category)).toEqual(['missing_time_of_day']);
  });

  it('analyzes scenes one at a time, in order', async () => {
    const { config } = setup();
    const caller = new FakeCaller((_args, n) => jsonResult([{ issue_type: 'continuity', description: `call ${n}`, severity: 'medium' }]));
    const findings = await analyzeDocument(parseDocument(TWO_SCENES, 'fountain'), { config, caller });
    expect(caller.maxActive).toBe(1);
    expect(caller.calls.map(c => c.prompt.split('\n')[0])).toEqual(['Scene 1: INT. A - DAY', 'Scene 2: INT. B - NIGHT']);
    expect(findings.map(f => [f.sceneIndex, f.message])).toEqual([[1, 'call 1'], [2, 'call 2']]);
  });

  it('retries rate-limited calls, waiting as long as the server asks', async () => {
    const { config, delays, sleep } = setup();
    const caller = new FakeCaller((_args, n) => {
      if (n === 1) throw new GeminiRateLimitError('slow down', 2000);
      return jsonResult([]);
    });
    const findings = await analyzeDocument(parseDocument('INT. A - DAY\nx\n', 'fountain'), { config, caller, sleep });
    expect(caller.calls).toHaveLength(2);
    expect(delays).toEqual([2000]);
    expect(findings).toEqual([]);
  });

  it('records a finding when retries run out and moves on', async () => {
    const { config, delays, sleep } = setup({ analysis: { max_retries: 2 } });
    const caller = new FakeCaller(() => { throw new GeminiNetworkError('Network error contacting Gemini API'); });
    const findings = await analyzeDocument(parseDocument('INT. A - DAY\nx\n', 'fountain'), { config, caller, sleep });
    expect(caller.calls).toHaveLength(3);
    expect(delays).toEqual([500, 1000]);
    expect(findings).toEqual([{
      sceneIndex: 1,
      category: 'analysis_error',
      severity: 'low',
      message: 'Scene could not be analyzed: Network error contacting Gemini API',
      suggestions: ['Check the Gemini API configuration', 'Verify the API key is valid'],
    }]);
  });

  it('does not retry authentication failures', async () => {
    const { config, delays, sleep } = setup();
    const caller = new FakeCaller(() => { throw new GeminiAuthError(); });
    const findings = await analyzeDocument(parseDocument(TWO_SCENES, 'fountain'), { config, caller, sleep });
    expect(caller.calls).toHaveLength(2);
    expect(delays).toEqual([]);
    expect(findings.map(f => [f.sceneIndex, f.category, f.message])).toEqual([
      [1, 'analysis_error', 'Scene could not be analyzed: Invalid Gemini API key'],
      [2, 'analysis_error', 'Scene could not be analyzed: Invalid Gemini API key'],
    ]);
  });

  it('bounds each call by the configured timeout', async () => {
    const { config } = setup({ analysis: { timeout_ms: 20, max_retries: 0 } });
    const caller = new FakeCaller(() => new Promise<never>(() => {}));
    const findings = await analyzeDocument(parseDocument('INT. A - DAY\nx\n', 'fountain'), { config, caller });
    expect(findings.map(f => f.message)).toEqual(['Scene could not be analyzed: analysis of scene 1 timed out after 20ms']);
  });
});

describe('validateDocument', () => {
  const now = () => new Date('2026-03-04T05:06:07.000Z');

  it('merges rule and model findings into the report', async () => {
    const { config } = setup();
    const caller = new FakeCaller((_args, n) => jsonResult(n === 1 ? [{ issue_type: 'continuity', description: 'Wet coat', severity: 'high' }] : []));
    const report = await validateDocument(parseDocument('INT. A\nMara waits.\n\nINT. B - NIGHT\nRain.\n', 'fountain', 'coat.fountain'), { config, caller, now });
    expect(report.findings.map(f => [f.sceneIndex, f.category, f.severity])).toEqual([
      [1, 'missing_time_of_day', 'low'],
      [1, 'continuity', 'high'],
    ]);
    expect(report.valid).toBe(false);
    expect(report.summary).toBe('Found 2 issues: 1 high, 0 medium, 1 low severity.');
    expect(report.metadata).toMatchObject({ source: 'coat.fountain', format: 'fountain', model: 'models/fake-model', toolVersion: VERSION, generatedAt: '2026-03-04T05:06:07.000Z' });
  });

  it('reports an empty document as valid with no scenes', async () => {
    const { config } = setup();
    const caller = new FakeCaller(() => jsonResult([]));
    const report = await validateDocument(parseDocument('', 'text', 'empty.txt'), { config, caller, now });
    expect(report.scenes).toEqual([]);
    expect(report.findings).toEqual([]);
    expect(report.valid).toBe(true);
    expect(report.summary).toBe('No issues found in the script.');
    expect(caller.calls).toHaveLength(0);
  });
});

describe('runValidation', () => {
  it('loads a file and validates it without a model', async () => {
    const { config } = setup();
    const path = join(fixtures, 'harbor.fdx');
    const report = await runValidation(path, { config, caller: null });
    expect(report.metadata.source).toBe(path);
    expect(report.metadata.format).toBe('fdx');
    expect(report.metadata.model).toBeUndefined();
    expect(report.findings.map(f => [f.sceneIndex, f.category])).toEqual([[2, 'character_consistency']]);
    expect(report.valid).toBe(true);
    expect(report.summary).toBe('Found 1 issues: 0 high, 1 medium, 0 low severity.');
  });
});

describe('createCaller', () => {
  it('builds a Gemini client only when a key is configured', () => {
    expect(createCaller(resolveConfig({}, {}))).toBeUndefined();
    const caller = createCaller(resolveConfig({}, { GEMINI_API_KEY: 'test-secret' }));
    expect(caller).toBeInstanceOf(GeminiProvider);
    expect(caller?.modelId).toBe('models/gemini-1.5-flash');
  });
});
