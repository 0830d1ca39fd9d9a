import { appendFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LogLevel } from './config.js';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LoggingOptions {
  level: LogLevel;
  file?: string;
  max_size_mb: number;
  backup_count: number;
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

interface LoggerState {
  level: LogLevel;
  file?: string;
  maxBytes: number;
  backups: number;
  now: () => Date;
}

const state: LoggerState = {
  level: readEnvLevel() ?? 'info',
  maxBytes: 10 * 1024 * 1024,
  backups: 3,
  now: () => new Date(),
};

function readEnvLevel(): LogLevel | undefined {
  const dbg = (process.env.DEBUG || '').toLowerCase();
  if (dbg === '1' || dbg === 'true') return 'debug';
  return undefined;
}

/** Apply the `logging` config section. Safe to call more than once. */
export function configureLogging(opts: LoggingOptions, clock?: () => Date): void {
  state.level = opts.level;
  state.file = opts.file;
  state.maxBytes = Math.max(1, Math.floor(opts.max_size_mb * 1024 * 1024));
  state.backups = opts.backup_count;
  if (clock) state.now = clock;
  if (opts.file) mkdirSync(dirname(opts.file), { recursive: true });
}

export function resetLogging(): void {
  state.level = readEnvLevel() ?? 'info';
  state.file = undefined;
  state.maxBytes = 10 * 1024 * 1024;
  state.backups = 3;
  state.now = () => new Date();
}

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, msg: string, data?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[state.level]) return;
    const line = formatLine(state.now(), scope, level, msg, data);
    // stdout carries command output (e.g. `validate --stdout`); log lines go to stderr
    if (level === 'warn') console.warn(line); else console.error(line);
    if (state.file) writeToFile(state.file, line + '\n');
  };
  return {
    debug: (msg, data) => emit('debug', msg, data),
    info: (msg, data) => emit('info', msg, data),
    warn: (msg, data) => emit('warn', msg, data),
    error: (msg, data) => emit('error', msg, data),
  };
}

export function formatLine(at: Date, scope: string, level: LogLevel, msg: string, data?: Record<string, unknown>): string {
  const ctx = data && Object.keys(data).length ? ' ' + JSON.stringify(data) : '';
  return `${at.toISOString()} - ${scope} - ${level.toUpperCase()} - ${msg}${ctx}`;
}

function writeToFile(file: string, text: string): void {
  try {
    if (existsSync(file) && statSync(file).size + Buffer.byteLength(text) > state.maxBytes) rotate(file, state.backups);
    appendFileSync(file, text, 'utf-8');
  } catch (e) {
    // on I/O failure the file sink is dropped; console output continues
    console.error(`[logger] file sink disabled: ${e instanceof Error ? e.message : String(e)}`);
    state.file = undefined;
  }
}

/** file -> file.1 -> file.2 ... ; the oldest beyond `backups` is removed. */
export function rotate(file: string, backups: number): void {
  if (backups <= 0) { rmSync(file, { force: true }); return; }
  const oldest = `${file}.${backups}`;
  if (existsSync(oldest)) rmSync(oldest, { force: true });
  for (let i = backups - 1; i >= 1; i--) {
    const from = `${file}.${i}`;
    if (existsSync(from)) renameSync(from, `${file}.${i + 1}`);
  }
  renameSync(file, `${file}.1`);
}
