import { basename } from 'node:path';
import type { Config } from '../../lib/config.js';
import type { LLMCaller } from '../llm/providers.js';
import type { SceneRecord, ScriptDocument } from '../script/types.js';
import type { Storyboard, StoryboardFrame } from './types.js';
import type { ShotSuggestion } from '../llm/prompts.js';
import { ShotSuggestionSchema, buildShotPrompt, extractJSON } from '../llm/prompts.js';
import { cueName } from '../script/characters.js';
import { withTimeout } from '../../lib/retry.js';
import { describeError } from '../../utils/errors.js';
import { createLogger } from '../../lib/logger.js';

const log = createLogger('storyboard');

export const DEFAULT_MOVEMENT = 'Static';
export const MAX_DESCRIPTION = 300;

export interface StoryboardOptions {
  config: Config;
  caller?: LLMCaller;
  now?: () => Date;
}

export function frameLabel(template: string, scene: Pick<SceneRecord, 'index' | 'heading'>): string {
  return template.replace(/\{(number|heading)\}/g, (_, key: string) => (key === 'number' ? String(scene.index) : scene.heading));
}

/**
 * Action text of a scene body: paragraphs that open with a character cue are dialogue and
 * skipped. Cut at a word boundary to `max` characters.
 */
export function describeScene(body: string, max = MAX_DESCRIPTION): string {
  const action = body
    .split(/\n\s*\n/)
    .filter(p => p.trim() && !cueName(p.trim().split('\n')[0] ?? ''))
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim();
  if (action.length <= max) return action;
  const cut = action.slice(0, max);
  const space = cut.lastIndexOf(' ');
  return (space > max / 2 ? cut.slice(0, space) : cut).replace(/[\s,;:.]+$/, '') + '…';
}

async function suggestShot(caller: LLMCaller, scene: SceneRecord, config: Config): Promise<ShotSuggestion | undefined> {
  const { system, prompt, schema } = buildShotPrompt(scene, config.generation.max_content_length);
  try {
    const res = await withTimeout(
      config.analysis.timeout_ms,
      signal => caller.call({ system, prompt, schema, temperature: config.analysis.temperature, signal }),
      `shot suggestion for scene ${scene.index}`,
    );
    const parsed = ShotSuggestionSchema.safeParse(res.json !== undefined ? res.json : extractJSON(res.text));
    if (parsed.success) return parsed.data;
    log.warn('shot suggestion has unexpected shape; using defaults', { scene: scene.index });
  } catch (e) {
    log.warn('shot suggestion failed; using defaults', { scene: scene.index, error: describeError(e) });
  }
  return undefined;
}

/** One frame per scene, in scene order. Model suggestions are requested one scene at a time. */
export async function buildStoryboard(doc: ScriptDocument, opts: StoryboardOptions): Promise<Storyboard> {
  const { config, caller } = opts;
  const frames: StoryboardFrame[] = [];
  for (const scene of doc.scenes) {
    const shot = caller ? await suggestShot(caller, scene, config) : undefined;
    frames.push({
      sceneIndex: scene.index,
      label: frameLabel(config.advanced.scene_label_template, scene),
      heading: scene.heading,
      description: describeScene(scene.body),
      cameraAngle: shot?.camera_angle ?? config.advanced.default_camera_angle,
      cameraMovement: shot?.camera_movement ?? DEFAULT_MOVEMENT,
      characters: [...scene.characters],
      notes: shot?.notes ?? '',
    });
  }
  log.info('storyboard built', { source: doc.source, frames: frames.length, suggestions: !!caller });
  return {
    title: basename(doc.source),
    generatedAt: (opts.now ?? (() => new Date()))().toISOString(),
    frames,
  };
}
