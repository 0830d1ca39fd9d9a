import type { ScriptFormat } from '../features/script/types.js';
import { SCRIPT_FORMATS } from '../features/script/types.js';
import type { ReportFormat } from '../lib/config.js';
import { REPORT_FORMATS, isReportFormat } from '../lib/config.js';
import type { StoryboardFormat } from '../features/storyboard/types.js';
import { STORYBOARD_FORMATS, isStoryboardFormat } from '../features/storyboard/types.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

interface CommonArgs {
  script: string;
  config?: string;
  type?: ScriptFormat;
  output?: string;
}

export type ParsedArgs =
  | { command: 'help' }
  | { command: 'version' }
  | ({ command: 'validate'; format?: ReportFormat; stdout: boolean } & CommonArgs)
  | ({ command: 'storyboard'; format?: StoryboardFormat } & CommonArgs);

export const USAGE = `Usage:
  scenekit validate <script> [--config file] [--format ${REPORT_FORMATS.join('|')}] [--type ${SCRIPT_FORMATS.join('|')}] [--output dir] [--stdout]
  scenekit storyboard <script> [--config file] [--format ${STORYBOARD_FORMATS.join('|')}] [--type ${SCRIPT_FORMATS.join('|')}] [--output dir]
  scenekit --help | --version`;

const VALUE_FLAGS = new Set(['config', 'format', 'type', 'output']);

function isScriptFormat(v: string): v is ScriptFormat {
  return (SCRIPT_FORMATS as readonly string[]).includes(v);
}

/** Accepts `--flag value` and `--flag=value`; the first positional is the command. */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  let stdout = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '-h' || arg === '--help') return { command: 'help' };
    if (arg === '-v' || arg === '--version') return { command: 'version' };
    if (!arg.startsWith('--')) { positional.push(arg); continue; }

    const eq = arg.indexOf('=');
    const name = arg.slice(2, eq === -1 ? undefined : eq);
    if (name === 'stdout' && eq === -1) { stdout = true; continue; }
    if (!VALUE_FLAGS.has(name)) throw new UsageError(`unknown option --${name}`);
    const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
    if (value === undefined || value === '' || (eq === -1 && value.startsWith('--'))) {
      throw new UsageError(`option --${name} needs a value`);
    }
    flags.set(name, value);
  }

  const [command, script, ...rest] = positional;
  if (!command) return { command: 'help' };
  if (command !== 'validate' && command !== 'storyboard') throw new UsageError(`unknown command "${command}"`);
  if (!script) throw new UsageError(`${command}: missing <script> argument`);
  if (rest.length) throw new UsageError(`${command}: unexpected argument "${rest[0] ?? ''}"`);

  const type = flags.get('type');
  if (type !== undefined && !isScriptFormat(type)) {
    throw new UsageError(`--type must be one of ${SCRIPT_FORMATS.join(', ')} (got "${type}")`);
  }
  const common: CommonArgs = { script, config: flags.get('config'), type, output: flags.get('output') };
  const format = flags.get('format');

  if (command === 'validate') {
    if (format !== undefined && !isReportFormat(format)) {
      throw new UsageError(`--format must be one of ${REPORT_FORMATS.join(', ')} (got "${format}")`);
    }
    if (stdout && format === 'pdf') throw new UsageError('--stdout cannot be combined with --format pdf');
    return { command, ...common, format, stdout };
  }

  if (stdout) throw new UsageError('--stdout is only supported by validate');
  if (format !== undefined && !isStoryboardFormat(format)) {
    throw new UsageError(`--format must be one of ${STORYBOARD_FORMATS.join(', ')} (got "${format}")`);
  }
  return { command, ...common, format };
}
