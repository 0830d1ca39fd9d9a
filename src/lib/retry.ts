import { TimeoutError } from '../utils/errors.js';

export interface RetryOptions {
  retries?: number;
  backoffMs?: number;
  maxBackoffMs?: number;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  /** Server-suggested wait (e.g. Retry-After), takes precedence when larger than the backoff. */
  retryAfterMs?: (err: unknown) => number | undefined;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export async function retry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const retries = opts.retries ?? 3;
  const maxBackoff = opts.maxBackoffMs ?? 5000;
  const wait = opts.sleep ?? sleep;
  let delay = opts.backoffMs ?? 300;
  let lastErr: unknown;
  for (let attempt = 0; attempt <= retries; attempt++) {
    try { return await fn(attempt); } catch (e) { lastErr = e; }
    if (attempt === retries) break;
    if (opts.shouldRetry && !opts.shouldRetry(lastErr, attempt)) break;
    const suggested = opts.retryAfterMs?.(lastErr);
    const actual = suggested && suggested > delay ? suggested : delay;
    opts.onRetry?.(lastErr, attempt + 1, actual);
    await wait(actual);
    delay = Math.min(maxBackoff, Math.floor(delay * 2));
  }
  throw lastErr;
}

/**
 * Run `fn` with an AbortSignal that fires after `ms`. The returned promise rejects with
 * TimeoutError at the deadline even if `fn` ignores the signal.
 */
export async function withTimeout<T>(ms: number, fn: (signal: AbortSignal) => Promise<T>, what?: string): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(ms, what);
      controller.abort(err);
      reject(err);
    }, ms);
  });
  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
