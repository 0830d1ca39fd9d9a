import type { Finding, SceneRecord, ScriptFormat } from '../script/types.js';
import type { SceneAnalyzer } from './types.js';
import { isSlugline } from '../script/segmentation.js';
import { nameKey } from '../script/characters.js';

const TIME_OF_DAY_RE = /\s-\s(?:DAY|NIGHT|MORNING|AFTERNOON|EVENING|DAWN|DUSK|SUNRISE|SUNSET|NOON|MIDNIGHT|CONTINUOUS|LATER|MOMENTS LATER|SAME|SAME TIME)\b/;

export interface RuleOptions {
  format: ScriptFormat;
  maxContentLength: number;
}

/** Structural checks that look at one scene at a time. */
export class RuleAnalyzer implements SceneAnalyzer {
  readonly name = 'rules';
  constructor(private readonly opts: RuleOptions) {}

  async analyze(scene: SceneRecord): Promise<Finding[]> {
    return this.check(scene);
  }

  check(scene: SceneRecord): Finding[] {
    const out: Finding[] = [];
    const slug = isSlugline(scene.heading);

    if (this.opts.format !== 'text' && !slug) {
      out.push({
        sceneIndex: scene.index,
        category: 'missing_scene_heading',
        severity: 'medium',
        message: `Scene heading "${scene.heading}" is not a standard INT./EXT. slugline`,
        suggestions: [
          'Start scene headings with INT. or EXT.',
          'Format scene headings according to screenplay standards',
        ],
      });
    }
    if (slug && !TIME_OF_DAY_RE.test(scene.heading)) {
      out.push({
        sceneIndex: scene.index,
        category: 'missing_time_of_day',
        severity: 'low',
        message: `Scene heading "${scene.heading}" has no time of day`,
        suggestions: ['Append a time of day, e.g. "- DAY" or "- NIGHT"'],
      });
    }
    if (!scene.body.trim()) {
      out.push({
        sceneIndex: scene.index,
        category: 'empty_scene',
        severity: 'medium',
        message: 'Scene has a heading but no content',
        suggestions: ['Add action or dialogue to the scene', 'Remove the heading if the scene was cut'],
      });
    } else if (scene.body.length > this.opts.maxContentLength) {
      out.push({
        sceneIndex: scene.index,
        category: 'long_scene',
        severity: 'low',
        message: `Scene is ${scene.body.length} characters long; analysis only sees the first ${this.opts.maxContentLength}`,
        suggestions: ['Consider splitting the scene'],
      });
    }
    return out;
  }
}

/**
 * Checks that need the whole scene list. Each finding is attached to the scene where
 * the problem first shows up.
 */
export function documentRules(scenes: readonly SceneRecord[]): Finding[] {
  const out: Finding[] = [];
  const firstSeen = new Map<string, { name: string; scene: number }>();
  const reported = new Set<string>();

  for (let i = 0; i < scenes.length; i++) {
    const scene = scenes[i];
    if (!scene) continue;

    const prev = scenes[i - 1];
    if (prev && prev.heading === scene.heading) {
      out.push({
        sceneIndex: scene.index,
        category: 'duplicate_heading',
        severity: 'low',
        message: `Scene repeats the heading of scene ${prev.index} ("${scene.heading}")`,
        suggestions: ['Merge the scenes or distinguish the headings (e.g. "- LATER", "- CONTINUOUS")'],
      });
    }

    for (const name of scene.characters) {
      const key = nameKey(name);
      if (!key) continue;
      const seen = firstSeen.get(key);
      if (!seen) { firstSeen.set(key, { name, scene: scene.index }); continue; }
      if (seen.name === name || reported.has(name)) continue;
      reported.add(name);
      out.push({
        sceneIndex: scene.index,
        category: 'character_consistency',
        severity: 'medium',
        message: `Character "${name}" looks like a variant of "${seen.name}" (first seen in scene ${seen.scene})`,
        suggestions: [`Use one spelling of the name throughout, e.g. "${seen.name}"`],
      });
    }
  }
  return out;
}
