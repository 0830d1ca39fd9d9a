// Provider abstraction: the analysis code talks to an LLMCaller, never to a concrete vendor API.

export interface LLMResult {
  text: string;
  json?: unknown;                   // parsed body when the provider was asked for JSON
  usage: { in: number; out: number }; // normalized token counts
  raw: unknown;                     // provider raw response for debugging
}

export interface CallArgs {
  system?: string;
  prompt: string;
  /** JSON schema for structured output; providers that cannot enforce it just request JSON. */
  schema?: Record<string, unknown>;
  temperature?: number;
  signal?: AbortSignal;
}

export interface LLMCaller {
  readonly modelId: string;
  /** One request, one result. Retries and timeouts are the caller's policy. */
  call(args: CallArgs): Promise<LLMResult>;
}
