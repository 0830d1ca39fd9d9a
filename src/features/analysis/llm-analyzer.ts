import type { LLMCaller } from '../llm/providers.js';
import type { Finding, SceneRecord } from '../script/types.js';
import type { AnalyzeContext, SceneAnalyzer } from './types.js';
import { ResponseFormatError, buildScenePrompt, extractJSON, parseIssues } from '../llm/prompts.js';
import { createLogger } from '../../lib/logger.js';

const log = createLogger('analysis:llm');

export interface LLMAnalyzerOptions {
  maxContentLength: number;
  temperature?: number;
}

/**
 * Sends one scene to the model and maps the returned issues to findings.
 * Provider errors propagate; a response that cannot be read becomes a finding.
 */
export class LLMAnalyzer implements SceneAnalyzer {
  readonly name = 'llm';
  constructor(private readonly caller: LLMCaller, private readonly opts: LLMAnalyzerOptions) {}

  async analyze(scene: SceneRecord, ctx: AnalyzeContext = {}): Promise<Finding[]> {
    const { system, prompt, schema } = buildScenePrompt(scene, this.opts.maxContentLength);
    const res = await this.caller.call({ system, prompt, schema, temperature: this.opts.temperature, signal: ctx.signal });

    try {
      const issues = parseIssues(res.json !== undefined ? res.json : extractJSON(res.text));
      log.debug('scene analyzed', { scene: scene.index, issues: issues.length, usage: res.usage });
      return issues.map(i => ({
        sceneIndex: scene.index,
        category: i.issue_type,
        severity: i.severity,
        message: i.location ? `${i.description} (${i.location})` : i.description,
        suggestions: i.suggestions,
      }));
    } catch (e) {
      if (!(e instanceof ResponseFormatError)) throw e;
      log.warn('unreadable analysis response', { scene: scene.index, error: e.message });
      return [{
        sceneIndex: scene.index,
        category: 'analysis_parse_error',
        severity: 'low',
        message: `Could not read the analysis response: ${e.message}`,
        suggestions: ['Check the Gemini API service status', 'Try analyzing a shorter script'],
      }];
    }
  }
}
