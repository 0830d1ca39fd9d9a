import type { Config } from '../../lib/config.js';
import type { LLMCaller } from '../llm/providers.js';
import type { Finding, ScriptDocument, ScriptFormat } from '../script/types.js';
import type { Report } from '../report/types.js';
import { GeminiProvider, GeminiRateLimitError } from '../llm/providers/gemini.js';
import { loadDocument } from '../script/importer.js';
import { buildReport } from '../report/builder.js';
import { RuleAnalyzer, documentRules } from './rules.js';
import { LLMAnalyzer } from './llm-analyzer.js';
import { retry, withTimeout } from '../../lib/retry.js';
import { describeError, isRetryableError } from '../../utils/errors.js';
import { createLogger } from '../../lib/logger.js';
import { VERSION } from '../../version.js';

const log = createLogger('pipeline');

export interface PipelineOptions {
  config: Config;
  /** Model client. When omitted one is built from the config; `null` disables model analysis. */
  caller?: LLMCaller | null;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/** Gemini client for the configured model, or undefined when no API key is set. */
export function createCaller(config: Config, fetchImpl?: typeof fetch): LLMCaller | undefined {
  if (!config.gemini_api_key) return undefined;
  return new GeminiProvider({ apiKey: config.gemini_api_key, model: config.gemini_model, fetchImpl });
}

function resolveCaller(opts: PipelineOptions): LLMCaller | undefined {
  if (opts.caller === null) return undefined;
  return opts.caller ?? createCaller(opts.config);
}

/**
 * Rule checks for every scene, then model analysis scene by scene with one call
 * outstanding at a time. A scene whose call keeps failing gets an `analysis_error`
 * finding and the run moves on.
 */
export async function analyzeDocument(doc: ScriptDocument, opts: PipelineOptions): Promise<Finding[]> {
  const { config } = opts;
  const rules = new RuleAnalyzer({ format: doc.format, maxContentLength: config.generation.max_content_length });
  const findings: Finding[] = [];
  for (const scene of doc.scenes) findings.push(...rules.check(scene));
  findings.push(...documentRules(doc.scenes));

  const caller = resolveCaller(opts);
  if (!caller) {
    if (doc.scenes.length) log.info('no API key configured; model analysis skipped', { scenes: doc.scenes.length });
    return findings;
  }

  const llm = new LLMAnalyzer(caller, {
    maxContentLength: config.generation.max_content_length,
    temperature: config.analysis.temperature,
  });
  const { timeout_ms: timeoutMs, max_retries: retries } = config.analysis;

  for (const scene of doc.scenes) {
    try {
      const found = await retry(
        () => withTimeout(timeoutMs, signal => llm.analyze(scene, { signal }), `analysis of scene ${scene.index}`),
        {
          retries,
          backoffMs: 500,
          maxBackoffMs: 8000,
          shouldRetry: isRetryableError,
          retryAfterMs: e => (e instanceof GeminiRateLimitError ? e.retryAfterMs : undefined),
          onRetry: (e, attempt, delayMs) => log.warn('retrying scene analysis', { scene: scene.index, attempt, delayMs, error: describeError(e) }),
          sleep: opts.sleep,
        },
      );
      findings.push(...found);
    } catch (e) {
      log.error('scene analysis failed', { scene: scene.index, error: describeError(e) });
      findings.push({
        sceneIndex: scene.index,
        category: 'analysis_error',
        severity: 'low',
        message: `Scene could not be analyzed: ${describeError(e)}`,
        suggestions: ['Check the Gemini API configuration', 'Verify the API key is valid'],
      });
    }
  }
  return findings;
}

export async function validateDocument(doc: ScriptDocument, opts: PipelineOptions): Promise<Report> {
  const caller = resolveCaller(opts);
  const findings = await analyzeDocument(doc, { ...opts, caller: caller ?? null });
  const report = buildReport({
    document: doc,
    findings,
    toolVersion: VERSION,
    model: caller?.modelId,
    now: opts.now,
  });
  log.info('validation complete', { source: doc.source, scenes: doc.scenes.length, findings: findings.length, valid: report.valid });
  return report;
}

/** Load, analyze and report on one script file. */
export async function runValidation(path: string, opts: PipelineOptions & { format?: ScriptFormat }): Promise<Report> {
  const doc = await loadDocument(path, opts.format);
  for (const w of doc.warnings) log.warn(w, { source: doc.source });
  return validateDocument(doc, opts);
}
