import type { CallArgs, LLMCaller, LLMResult } from '../providers.js';
import { createLogger } from '../../../lib/logger.js';

const log = createLogger('gemini');

// --- Error types -----------------------------------------------------
export class GeminiAPIError extends Error { status?: number; code?: string; raw?: unknown; constructor(msg: string, status?: number, code?: string, raw?: unknown) { super(msg); this.name = 'GeminiAPIError'; this.status = status; this.code = code; this.raw = raw; } }
export class GeminiAuthError extends GeminiAPIError { constructor(msg = 'Invalid Gemini API key', raw?: unknown) { super(msg, 401, 'unauthorized', raw); this.name = 'GeminiAuthError'; } }
export class GeminiRateLimitError extends GeminiAPIError { retryAfterMs?: number; constructor(msg = 'Gemini rate limit exceeded', retryAfterMs?: number, raw?: unknown) { super(msg, 429, 'resource_exhausted', raw); this.name = 'GeminiRateLimitError'; this.retryAfterMs = retryAfterMs; } }
export class GeminiQuotaExceededError extends GeminiAPIError { constructor(msg = 'Gemini quota exceeded', raw?: unknown) { super(msg, 403, 'quota_exceeded', raw); this.name = 'GeminiQuotaExceededError'; } }
export class GeminiInvalidRequestError extends GeminiAPIError { constructor(msg = 'Invalid request to Gemini API', raw?: unknown) { super(msg, 400, 'invalid_request', raw); this.name = 'GeminiInvalidRequestError'; } }
export class GeminiNetworkError extends Error { constructor(msg: string, cause?: unknown) { super(msg, cause === undefined ? undefined : { cause }); this.name = 'GeminiNetworkError'; } }

// --- Types (subset of the REST surface) ------------------------------
interface UsageMetadata { promptTokenCount?: number; candidatesTokenCount?: number; totalTokenCount?: number }
interface PartText { text?: string }
interface Content { role?: string; parts?: PartText[] }
interface Candidate { content?: Content; finishReason?: string }
interface PromptFeedback { safetyRatings?: Array<{ category?: string; probability?: string; blocked?: boolean }>; blockReason?: string }
interface GenerateResponse { candidates?: Candidate[]; usageMetadata?: UsageMetadata; promptFeedback?: PromptFeedback }
type ErrorBody = { error?: { code?: number; status?: string; message?: string } };

export interface GeminiOptions {
  apiKey?: string;
  model?: string;
  apiBase?: string;
  maxOutputTokens?: number;
  fetchImpl?: typeof fetch;
}

export const DEFAULT_API_BASE = 'https://generativelanguage.googleapis.com';

export class GeminiProvider implements LLMCaller {
  readonly modelId: string;
  private apiBase: string;
  private apiKey?: string;
  private maxOutputTokens: number;
  private fetchImpl: typeof fetch;

  constructor(opts: GeminiOptions = {}) {
    const m = opts.model || 'gemini-1.5-flash';
    this.modelId = m.startsWith('models/') ? m : `models/${m}`;
    this.apiKey = opts.apiKey;
    this.apiBase = (opts.apiBase || DEFAULT_API_BASE).replace(/\/+$/, '');
    this.maxOutputTokens = opts.maxOutputTokens ?? 4096;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async call(args: CallArgs): Promise<LLMResult> {
    const start = Date.now();
    const url = this.buildURL();
    const res = await this.doFetch(url, this.buildRequest(args), args.signal);
    if (!res.ok) await this.throwForResponse(res);
    const data = (await res.json()) as GenerateResponse;
    const { text, blocked } = this.extractText(data);
    const usage = this.toUsage(data.usageMetadata);
    if (blocked) log.warn('response blocked by safety filter', { reason: data.promptFeedback?.blockReason });
    const json = args.schema && !blocked ? maybeParseJSON(text) : undefined;
    log.debug('call:success', { model: this.modelId, ms: Date.now() - start, usage, blocked });
    return { text: blocked ? '' : text, json, usage, raw: data };
  }

  // --- Helpers -------------------------------------------------------
  private buildURL(): string {
    return `${this.apiBase}/v1beta/${this.modelId}:generateContent?key=${encodeURIComponent(this.apiKey || '')}`;
  }

  buildRequest(args: CallArgs): Record<string, unknown> {
    const temperature = typeof args.temperature === 'number' ? args.temperature : 0.2;
    const generationConfig: Record<string, unknown> = {
      temperature,
      maxOutputTokens: this.maxOutputTokens,
      ...(args.schema ? { responseMimeType: 'application/json', responseSchema: args.schema } : {}),
    };
    const contents: Content[] = [{ role: 'user', parts: [{ text: args.prompt }] }];
    return {
      contents,
      ...(args.system ? { systemInstruction: { parts: [{ text: args.system }] } } : {}),
      generationConfig,
      safetySettings: safetySettings(),
    };
  }

  private extractText(resp: GenerateResponse): { text: string; blocked: boolean } {
    const blocked = !!(resp.promptFeedback?.blockReason || resp.promptFeedback?.safetyRatings?.some(r => r.blocked));
    const parts = resp.candidates?.[0]?.content?.parts || [];
    return { text: parts.map(p => p.text || '').join(''), blocked };
  }

  private toUsage(u?: UsageMetadata): { in: number; out: number } { return { in: Math.max(0, u?.promptTokenCount || 0), out: Math.max(0, u?.candidatesTokenCount || 0) }; }

  private async doFetch(url: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<Response> {
    if (!this.apiKey) throw new GeminiAuthError('Missing Gemini API key (gemini_api_key / GEMINI_API_KEY)');
    try {
      return await this.fetchImpl(url, { method: 'POST', headers: { 'content-type': 'application/json' }, body: JSON.stringify(body), signal });
    } catch (e) {
      if (signal?.aborted) throw signal.reason;
      throw new GeminiNetworkError('Network error contacting Gemini API', e);
    }
  }

  private async throwForResponse(res: Response): Promise<never> {
    const bodyText = await res.text().catch(() => '');
    const body = maybeParseJSON(bodyText);
    const eb: ErrorBody = isErrorBody(body) ? body : {};
    const status = eb.error?.status || `${res.status}`;
    const msg = eb.error?.message || `${res.status} ${res.statusText}`.trim();
    if (res.status === 401) throw new GeminiAuthError(msg, body);
    if (res.status === 429 || status === 'RESOURCE_EXHAUSTED') {
      const ra = Number(res.headers.get('retry-after'));
      throw new GeminiRateLimitError(msg, Number.isFinite(ra) && ra > 0 ? ra * 1000 : undefined, body);
    }
    if (res.status === 403 && /quota/i.test(msg)) throw new GeminiQuotaExceededError(msg, body);
    if (res.status === 403) throw new GeminiAuthError(msg, body);
    if (res.status === 400) throw new GeminiInvalidRequestError(msg, body);
    throw new GeminiAPIError(msg, res.status, status, body ?? bodyText);
  }
}

function safetySettings(): Array<Record<string, string>> {
  // Scripts routinely depict violence; only block the highest-probability content.
  const threshold = 'BLOCK_ONLY_HIGH';
  const categories = [
    'HARM_CATEGORY_HATE_SPEECH',
    'HARM_CATEGORY_HARASSMENT',
    'HARM_CATEGORY_SEXUALLY_EXPLICIT',
    'HARM_CATEGORY_DANGEROUS_CONTENT',
  ];
  return categories.map(cat => ({ category: cat, threshold }));
}

function isErrorBody(v: unknown): v is ErrorBody {
  return typeof v === 'object' && v !== null && 'error' in v;
}

function maybeParseJSON(text: string): unknown {
  if (!text) return undefined;
  try { return JSON.parse(text) as unknown; } catch { return undefined; }
}
