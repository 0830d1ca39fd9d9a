import type { Env } from '../lib/config.js';
import type { LLMCaller } from '../features/llm/providers.js';
import type { PandocRunner } from '../lib/pandoc.js';
import { loadConfig } from '../lib/config.js';
import { configureLogging } from '../lib/logger.js';
import { createCaller, runValidation } from '../features/analysis/pipeline.js';
import { serializeReport } from '../features/report/formats.js';
import { writeReport } from '../features/report/writer.js';
import { loadDocument } from '../features/script/importer.js';
import { buildStoryboard } from '../features/storyboard/builder.js';
import { exportStoryboard, writeFrameImages } from '../features/storyboard/export.js';
import { categorizeError, describeErrorLine } from '../utils/errors.js';
import type { ParsedArgs } from './args.js';
import { USAGE, UsageError, parseArgs } from './args.js';
import { VERSION } from '../version.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Env;
  /** Model client override; defaults to Gemini when an API key is configured. */
  caller?: LLMCaller | null;
  /** pdf converter; defaults to pandoc on PATH. */
  pandoc?: PandocRunner;
}

const defaultIO: CliIO = {
  stdout: t => process.stdout.write(t + '\n'),
  stderr: t => process.stderr.write(t + '\n'),
  env: process.env,
};

/** Runs one command and resolves to the process exit code: 0 ok, 1 failure, 2 usage. */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    io.stderr(`error: ${e.message}\n\n${USAGE}`);
    return 2;
  }

  try {
    switch (args.command) {
      case 'help':
        io.stdout(USAGE);
        return 0;
      case 'version':
        io.stdout(VERSION);
        return 0;
      case 'validate': {
        const config = await loadConfig(args.config, io.env);
        configureLogging(config.logging);
        const format = args.format ?? config.output.default_format;
        const report = await runValidation(args.script, { config, format: args.type, caller: io.caller });
        if (args.stdout) {
          // parseArgs rejects --stdout with pdf; a pdf default from config falls back to json
          io.stdout(serializeReport(report, format === 'pdf' ? 'json' : format).trimEnd());
          return 0;
        }
        const path = await writeReport(report, format, args.output ?? config.output.output_directory, { pandoc: io.pandoc });
        io.stdout(`✅ Report saved to ${path}`);
        io.stdout(`   Status: ${report.valid ? 'Valid' : 'Invalid'}`);
        io.stdout(`   ${report.summary}`);
        return 0;
      }
      case 'storyboard': {
        const config = await loadConfig(args.config, io.env);
        configureLogging(config.logging);
        const outputDir = args.output ?? config.output.output_directory;
        const doc = await loadDocument(args.script, args.type);
        const caller = io.caller === null ? undefined : io.caller ?? createCaller(config);
        let sb = await buildStoryboard(doc, { config, caller });
        if (config.generation.generate_images) {
          sb = await writeFrameImages(sb, outputDir, { width: config.generation.image_width, height: config.generation.image_height });
        }
        const paths = await exportStoryboard(sb, args.format ?? 'all', outputDir, { pandoc: io.pandoc });
        io.stdout(`✅ Storyboard with ${sb.frames.length} frames saved:`);
        for (const p of paths) io.stdout(`   ${p}`);
        return 0;
      }
    }
  } catch (e) {
    const { title } = categorizeError(e);
    io.stderr(`❌ ${title}: ${describeErrorLine(e)}`);
    return 1;
  }
}
