export type { Finding, SceneRecord, ScriptDocument, ScriptFormat, Severity } from './features/script/types.js';
export { detectFormat, loadDocument, normalize, parseDocument } from './features/script/importer.js';

export type { CallArgs, LLMCaller, LLMResult } from './features/llm/providers.js';
export * from './features/llm/providers/gemini.js';

export type { AnalyzeContext, SceneAnalyzer } from './features/analysis/types.js';
export { RuleAnalyzer, documentRules } from './features/analysis/rules.js';
export { LLMAnalyzer } from './features/analysis/llm-analyzer.js';
export { analyzeDocument, createCaller, runValidation, validateDocument } from './features/analysis/pipeline.js';
export type { PipelineOptions } from './features/analysis/pipeline.js';

export type { Report, ReportMetadata, SceneSummary } from './features/report/types.js';
export { buildReport, summarize } from './features/report/builder.js';
export { serializeReport } from './features/report/formats.js';
export { parseReport } from './features/report/parse.js';
export { renderReportPdf } from './features/report/pdf.js';
export { writeReport } from './features/report/writer.js';

export type { Storyboard, StoryboardFormat, StoryboardFrame } from './features/storyboard/types.js';
export { buildStoryboard } from './features/storyboard/builder.js';
export { renderFrameImage } from './features/storyboard/image.js';
export { exportStoryboard, renderStoryboardPdf, writeFrameImages } from './features/storyboard/export.js';
export type { PandocRunner } from './lib/pandoc.js';

export type { Config, ConfigInput, LogLevel, ReportFormat } from './lib/config.js';
export { loadConfig, resolveConfig } from './lib/config.js';
export { configureLogging, createLogger } from './lib/logger.js';
export * from './utils/errors.js';
export { VERSION } from './version.js';
