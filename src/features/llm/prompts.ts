import { z } from 'zod';
import type { SceneRecord } from '../script/types.js';
import { SEVERITIES } from '../script/types.js';

// --- System prompts --------------------------------------------------
export const systemSceneReview = `
You are a script supervisor reviewing one scene of a screenplay or prose draft.
Report continuity errors, character inconsistencies, formatting problems and unclear action.
Return JSON only: an array of issues matching the provided schema. Return [] when the scene is clean.
`;

export const systemShotSuggestion = `
You are a storyboard artist planning one frame per scene.
Suggest a camera angle, a camera movement and a short note for the artist.
Return a single JSON object matching the provided schema.
`;

export const TRUNCATION_MARKER = '...[truncated]';

// --- Schemas ---------------------------------------------------------
const SeveritySchema = z.preprocess(
  v => (typeof v === 'string' ? v.trim().toLowerCase() : v),
  z.enum(['high', 'medium', 'low']),
).catch('medium');

export const SceneIssueSchema = z.object({
  issue_type: z.string().min(1).catch('unknown'),
  description: z.string().min(1).catch('No description provided'),
  location: z.string().optional().catch(undefined),
  severity: SeveritySchema,
  suggestions: z.array(z.string()).catch([]),
});

export type SceneIssue = z.infer<typeof SceneIssueSchema>;

export const ShotSuggestionSchema = z.object({
  camera_angle: z.string().min(1).optional().catch(undefined),
  camera_movement: z.string().min(1).optional().catch(undefined),
  notes: z.string().optional().catch(undefined),
});

export type ShotSuggestion = z.infer<typeof ShotSuggestionSchema>;

// --- Templates -------------------------------------------------------
export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars) + TRUNCATION_MARKER;
}

export function buildScenePrompt(scene: SceneRecord, maxChars: number) {
  const prompt = [
    `Scene ${scene.index}: ${scene.heading}`,
    scene.characters.length ? `Characters: ${scene.characters.join(', ')}` : 'Characters: (none detected)',
    '\n== Scene text ==\n',
    truncate(scene.body, maxChars),
    '\n== Output format ==\n',
    'A JSON array of objects with keys issue_type, description, location, severity (high|medium|low), suggestions (array of strings).',
  ].join('\n');
  return { system: systemSceneReview, prompt, schema: sceneIssuesJSONSchema() } as const;
}

export function buildShotPrompt(scene: SceneRecord, maxChars: number) {
  const prompt = [
    `Scene ${scene.index}: ${scene.heading}`,
    '\n== Scene text ==\n',
    truncate(scene.body, maxChars),
    '\n== Output format ==\n',
    'A JSON object with keys camera_angle, camera_movement, notes.',
  ].join('\n');
  return { system: systemShotSuggestion, prompt, schema: shotJSONSchema() } as const;
}

// --- Response handling -------------------------------------------------
export class ResponseFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResponseFormatError';
  }
}

/** JSON from a ```json fence, else the first bare ``` fence, else the whole text. */
export function extractJSON(text: string): unknown {
  const fenced = /```json\s*([\s\S]*?)```/i.exec(text) ?? /```\s*([\s\S]*?)```/.exec(text);
  const candidate = (fenced?.[1] ?? text).trim();
  if (!candidate) throw new ResponseFormatError('empty response');
  try {
    return JSON.parse(candidate) as unknown;
  } catch (e) {
    throw new ResponseFormatError(`response is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
}

const IssueListSchema = z.union([
  z.array(z.unknown()),
  z.object({ issues: z.array(z.unknown()) }).transform(o => o.issues),
]);

/** Accepts an array of issues or `{ issues: [...] }`; items that are not objects are dropped. */
export function parseIssues(value: unknown): SceneIssue[] {
  const list = IssueListSchema.safeParse(value);
  if (!list.success) throw new ResponseFormatError('expected an array of issues or { "issues": [...] }');
  const out: SceneIssue[] = [];
  for (const item of list.data) {
    const r = SceneIssueSchema.safeParse(item);
    if (r.success) out.push(r.data);
  }
  return out;
}

function sceneIssuesJSONSchema(): Record<string, unknown> {
  return {
    type: 'array',
    items: {
      type: 'object',
      properties: {
        issue_type: { type: 'string' },
        description: { type: 'string' },
        location: { type: 'string' },
        severity: { type: 'string', enum: [...SEVERITIES] },
        suggestions: { type: 'array', items: { type: 'string' } },
      },
      required: ['issue_type', 'description', 'severity'],
    },
  };
}

function shotJSONSchema(): Record<string, unknown> {
  return {
    type: 'object',
    properties: {
      camera_angle: { type: 'string' },
      camera_movement: { type: 'string' },
      notes: { type: 'string' },
    },
  };
}
