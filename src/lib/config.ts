import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export const REPORT_FORMATS = ['json', 'html', 'markdown', 'pdf'] as const;
export type ReportFormat = typeof REPORT_FORMATS[number];

// Keys mirror the JSON config file, which is snake_case. Sections reject unknown keys;
// unknown top-level keys are dropped so config files shared with other tools still load.
const LoggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  file: z.string().min(1).optional(),
  max_size_mb: z.number().positive().default(10),
  backup_count: z.number().int().min(0).default(3),
}).strict();

const GenerationSchema = z.object({
  generate_images: z.boolean().default(true),
  image_width: z.number().int().positive().default(800),
  image_height: z.number().int().positive().default(450),
  max_content_length: z.number().int().positive().default(30_000),
}).strict();

const OutputSchema = z.object({
  default_format: z.enum(REPORT_FORMATS).default('json'),
  output_directory: z.string().min(1).default('output'),
}).strict();

const AnalysisSchema = z.object({
  timeout_ms: z.number().int().positive().default(30_000),
  max_retries: z.number().int().min(0).max(10).default(2),
  temperature: z.number().min(0).max(2).default(0.2),
}).strict();

// Cloud credentials are accepted so shared config files load, but nothing reads them.
const GoogleCloudSchema = z.object({
  project_id: z.string().optional(),
  storage_bucket: z.string().optional(),
  credentials_file: z.string().optional(),
}).passthrough();

const AdvancedSchema = z.object({
  default_camera_angle: z.string().min(1).default('Medium Shot'),
  scene_label_template: z.string().min(1).default('Scene {number}'),
}).strict();

export const ConfigSchema = z.object({
  gemini_api_key: z.string().optional(),
  gemini_model: z.string().min(1).default('gemini-1.5-flash'),
  logging: LoggingSchema.default({}),
  generation: GenerationSchema.default({}),
  output: OutputSchema.default({}),
  analysis: AnalysisSchema.default({}),
  google_cloud: GoogleCloudSchema.optional(),
  advanced: AdvancedSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

/** Validate a raw config object and layer environment overrides on top. */
export function resolveConfig(raw: unknown, env: Env = process.env): Config {
  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  const config = parsed.data;

  const apiKey = env.GEMINI_API_KEY || env.GOOGLE_API_KEY;
  if (!config.gemini_api_key && apiKey) config.gemini_api_key = apiKey;
  if (env.GEMINI_MODEL) config.gemini_model = env.GEMINI_MODEL;

  const level = env.LOG_LEVEL?.toLowerCase();
  if (level) {
    if (!isLogLevel(level)) throw new ConfigError(`Invalid LOG_LEVEL "${env.LOG_LEVEL}"`, [`expected one of ${LOG_LEVELS.join(', ')}`]);
    config.logging.level = level;
  }
  return config;
}

/** Read a JSON config file. Without a path, defaults plus env overrides are returned. */
export async function loadConfig(path?: string, env: Env = process.env): Promise<Config> {
  if (!path) return resolveConfig({}, env);
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Config file not readable: ${path}`, [e instanceof Error ? e.message : String(e)]);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Config file is not valid JSON: ${path}`, [e instanceof Error ? e.message : String(e)]);
  }
  return resolveConfig(raw, env);
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}
