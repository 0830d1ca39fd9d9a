import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  ErrorCategory,
  ExportError,
  ErrorSeverity,
  ParseError,
  ReportError,
  TimeoutError,
  categorizeError,
  describeError,
  describeErrorLine,
  isRetryableError,
} from '../errors.js';
import { GeminiAPIError, GeminiNetworkError, GeminiQuotaExceededError, GeminiRateLimitError } from '../../features/llm/providers/gemini.js';

describe('error classes', () => {
  it('prefix parse errors with their source and keep the cause', () => {
    const cause = new Error('inner');
    const err = new ParseError('a.txt', 'bad input', cause);
    expect(err.message).toBe('a.txt: bad input');
    expect(err.source).toBe('a.txt');
    expect(err.cause).toBe(cause);
  });

  it('list config issues under the message', () => {
    expect(new ConfigError('Invalid configuration', ['a: x', 'b: y']).message).toBe('Invalid configuration: a: x; b: y');
    expect(new ConfigError('plain').message).toBe('plain');
  });

  it('name what timed out', () => {
    expect(new TimeoutError(250, 'analysis of scene 2').message).toBe('analysis of scene 2 timed out after 250ms');
    expect(new TimeoutError(5).message).toBe('operation timed out after 5ms');
  });
});

describe('categorizeError', () => {
  it.each([
    [new ParseError('a', 'b'), ErrorCategory.PARSING, ErrorSeverity.HIGH],
    [new ConfigError('c'), ErrorCategory.CONFIGURATION, ErrorSeverity.HIGH],
    [new ReportError('r'), ErrorCategory.VALIDATION, ErrorSeverity.HIGH],
    [new TimeoutError(1), ErrorCategory.TIMEOUT, ErrorSeverity.MEDIUM],
    [new ExportError('pandoc failed (exit 43)'), ErrorCategory.EXPORT, ErrorSeverity.HIGH],
    [new GeminiRateLimitError(), ErrorCategory.RATE_LIMIT, ErrorSeverity.MEDIUM],
    [new GeminiQuotaExceededError(), ErrorCategory.AUTHENTICATION, ErrorSeverity.HIGH],
    [new GeminiNetworkError('down'), ErrorCategory.NETWORK, ErrorSeverity.MEDIUM],
    [new GeminiAPIError('boom', 500), ErrorCategory.LLM_PROVIDER, ErrorSeverity.HIGH],
    [Object.assign(new Error('no file'), { code: 'ENOENT' }), ErrorCategory.FILE_SYSTEM, ErrorSeverity.HIGH],
    [new Error('request timed out'), ErrorCategory.TIMEOUT, ErrorSeverity.MEDIUM],
    [new Error('fetch failed'), ErrorCategory.NETWORK, ErrorSeverity.MEDIUM],
    [new Error('something odd'), ErrorCategory.UNKNOWN, ErrorSeverity.CRITICAL],
    ['oops', ErrorCategory.UNKNOWN, ErrorSeverity.CRITICAL],
  ])('classifies %s', (error, category, severity) => {
    const c = categorizeError(error);
    expect(c.category).toBe(category);
    expect(c.severity).toBe(severity);
  });

  it('gives a readable title', () => {
    expect(categorizeError(new ParseError('a', 'b')).title).toBe('Script could not be parsed');
  });
});

describe('isRetryableError', () => {
  it('retries transient failures only', () => {
    expect(isRetryableError(new GeminiAPIError('x', 502))).toBe(true);
    expect(isRetryableError(new GeminiAPIError('x', 404))).toBe(false);
    expect(isRetryableError(new GeminiAPIError('x'))).toBe(false);
    expect(isRetryableError(new TimeoutError(1))).toBe(true);
    expect(isRetryableError(new Error('x'))).toBe(false);
  });
});

describe('describeError', () => {
  it('uses the message of errors and stringifies anything else', () => {
    expect(describeError(new Error('m'))).toBe('m');
    expect(describeError(42)).toBe('42');
  });

  it('folds multi-line messages onto one line', () => {
    expect(describeErrorLine(new Error('pandoc failed (exit 43): line one\n  line two\n'))).toBe('pandoc failed (exit 43): line one line two');
  });
});
