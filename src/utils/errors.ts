import { ZodError } from 'zod';
import {
  GeminiAPIError,
  GeminiAuthError,
  GeminiNetworkError,
  GeminiQuotaExceededError,
  GeminiRateLimitError,
} from '../features/llm/providers/gemini.js';

export enum ErrorCategory {
  PARSING = 'parsing',
  CONFIGURATION = 'configuration',
  VALIDATION = 'validation',
  NETWORK = 'network',
  AUTHENTICATION = 'authentication',
  RATE_LIMIT = 'rate_limit',
  TIMEOUT = 'timeout',
  FILE_SYSTEM = 'file_system',
  EXPORT = 'export',
  LLM_PROVIDER = 'llm_provider',
  UNKNOWN = 'unknown',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

const ERROR_TITLES: Record<ErrorCategory, string> = {
  [ErrorCategory.PARSING]: 'Script could not be parsed',
  [ErrorCategory.CONFIGURATION]: 'Configuration error',
  [ErrorCategory.VALIDATION]: 'Data validation error',
  [ErrorCategory.NETWORK]: 'Connection error',
  [ErrorCategory.AUTHENTICATION]: 'Authentication failed',
  [ErrorCategory.RATE_LIMIT]: 'Rate limit exceeded',
  [ErrorCategory.TIMEOUT]: 'Request timed out',
  [ErrorCategory.FILE_SYSTEM]: 'File system error',
  [ErrorCategory.EXPORT]: 'Export failed',
  [ErrorCategory.LLM_PROVIDER]: 'Analysis service error',
  [ErrorCategory.UNKNOWN]: 'Unexpected error',
};

/** Input document is missing or lacks the structural markers of its declared format. */
export class ParseError extends Error {
  constructor(public readonly source: string, message: string, cause?: unknown) {
    super(`${source}: ${message}`, cause === undefined ? undefined : { cause });
    this.name = 'ParseError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

/** A report invariant was broken (e.g. a finding pointing at a scene that does not exist). */
export class ReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReportError';
  }
}

/** An external converter (pandoc) ran but did not produce the requested file. */
export class ExportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExportError';
  }
}

export class TimeoutError extends Error {
  constructor(public readonly ms: number, what = 'operation') {
    super(`${what} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export interface ErrorClassification {
  category: ErrorCategory;
  severity: ErrorSeverity;
  title: string;
}

export function categorizeError(error: unknown): ErrorClassification {
  const category = categoryOf(error);
  return { category, severity: severityOf(category), title: ERROR_TITLES[category] };
}

function categoryOf(error: unknown): ErrorCategory {
  if (error instanceof ParseError) return ErrorCategory.PARSING;
  if (error instanceof ConfigError) return ErrorCategory.CONFIGURATION;
  if (error instanceof ReportError || error instanceof ZodError) return ErrorCategory.VALIDATION;
  if (error instanceof TimeoutError) return ErrorCategory.TIMEOUT;
  if (error instanceof ExportError) return ErrorCategory.EXPORT;
  if (error instanceof GeminiAuthError || error instanceof GeminiQuotaExceededError) return ErrorCategory.AUTHENTICATION;
  if (error instanceof GeminiRateLimitError) return ErrorCategory.RATE_LIMIT;
  if (error instanceof GeminiNetworkError) return ErrorCategory.NETWORK;
  if (error instanceof GeminiAPIError) return ErrorCategory.LLM_PROVIDER;
  if (!(error instanceof Error)) return ErrorCategory.UNKNOWN;

  const code = 'code' in error ? error.code : undefined;
  if (code === 'ENOENT' || code === 'EACCES' || code === 'EISDIR' || code === 'EPERM') return ErrorCategory.FILE_SYSTEM;

  const message = error.message.toLowerCase();
  if (message.includes('timeout') || message.includes('timed out')) return ErrorCategory.TIMEOUT;
  if (message.includes('network') || message.includes('fetch failed') || message.includes('econnrefused')) return ErrorCategory.NETWORK;
  if (message.includes('rate limit') || message.includes('429')) return ErrorCategory.RATE_LIMIT;
  return ErrorCategory.UNKNOWN;
}

function severityOf(category: ErrorCategory): ErrorSeverity {
  switch (category) {
    case ErrorCategory.PARSING:
    case ErrorCategory.CONFIGURATION:
    case ErrorCategory.AUTHENTICATION:
      return ErrorSeverity.HIGH;
    case ErrorCategory.RATE_LIMIT:
    case ErrorCategory.TIMEOUT:
    case ErrorCategory.NETWORK:
      return ErrorSeverity.MEDIUM;
    case ErrorCategory.UNKNOWN:
      return ErrorSeverity.CRITICAL;
    default:
      return ErrorSeverity.HIGH;
  }
}

/** Errors worth another attempt: throttling, transport failures, 5xx and timeouts. */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof GeminiRateLimitError || error instanceof GeminiNetworkError || error instanceof TimeoutError) return true;
  if (error instanceof GeminiAuthError || error instanceof GeminiQuotaExceededError) return false;
  if (error instanceof GeminiAPIError) return typeof error.status === 'number' && error.status >= 500;
  return false;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** The message folded onto one line, for terminal status output. */
export function describeErrorLine(error: unknown): string {
  return describeError(error).replace(/\s*\n\s*/g, ' ').trim();
}
