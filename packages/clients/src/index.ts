import fetch, { Response } from 'node-fetch';
import { z } from 'zod';

export type ClientOptions = { baseUrl: string; apiKey?: string; requestId?: string };

export type Task = 'translate' | 'paraphrase' | 'summarize' | 'custom';

export interface ProcessRequest {
  html: string;
  task?: Task;
  source_language?: string;
  language?: string; // alias of source_language
  target_language?: string;
  model?: string;
  temperature?: number;
  max_tokens?: number;
  preserve_formatting?: boolean;
  use_cache?: boolean;
  extra_prompt?: string;
  prompt?: string; // alias of extra_prompt
  min_text_length?: number;
  timeout_ms?: number;
}

const ProcessStatsSchema = z.object({
  total_tokens_in: z.number(),
  total_tokens_out: z.number(),
  processing_time: z.number(),
  cache_hits: z.number(),
  retries_performed: z.number(),
  spans_extracted: z.number(),
  spans_processed: z.number(),
  batches: z.number(),
  provider_calls: z.number(),
});

const ProcessResponseSchema = z.object({ id: z.string(), html: z.string(), stats: ProcessStatsSchema });
const CacheInfoSchema = z.object({ ttl_seconds: z.number(), entries: z.number() });
const HealthSchema = z.object({ ok: z.boolean() });

export type ProcessStats = z.infer<typeof ProcessStatsSchema>;
export type ProcessResponse = z.infer<typeof ProcessResponseSchema>;
export type CacheInfo = z.infer<typeof CacheInfoSchema>;

export class ApiClientError extends Error {
  constructor(readonly status: number, readonly body: unknown, message = `API request failed with HTTP ${status}`) {
    super(message);
    this.name = 'ApiClientError';
  }
}

export class HtmlProcessorClient {
  constructor(private opts: ClientOptions) {}

  private headers() {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.opts.apiKey) h['authorization'] = `Bearer ${this.opts.apiKey}`;
    if (this.opts.requestId) h['x-request-id'] = this.opts.requestId;
    return h;
  }

  private url(path: string) {
    return `${this.opts.baseUrl.replace(/\/+$/, '')}${path}`;
  }

  private async send<T>(schema: z.ZodType<T>, method: string, path: string, body?: unknown): Promise<T> {
    const r = await fetch(this.url(path), {
      method,
      headers: this.headers(),
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const payload = await readBody(r);
    if (!r.ok) throw new ApiClientError(r.status, payload);
    const parsed = schema.safeParse(payload);
    if (!parsed.success) throw new ApiClientError(r.status, payload, `Unexpected response from ${path}`);
    return parsed.data;
  }

  health() {
    return this.send(HealthSchema, 'GET', '/health');
  }

  process(body: ProcessRequest) {
    return this.send(ProcessResponseSchema, 'POST', '/process', body);
  }

  cacheInfo() {
    return this.send(CacheInfoSchema, 'GET', '/cache');
  }

  setCacheTtl(ttlSeconds: number) {
    return this.send(CacheInfoSchema, 'PUT', '/cache/ttl', { ttl_seconds: ttlSeconds });
  }

  clearCache() {
    return this.send(CacheInfoSchema, 'DELETE', '/cache');
  }
}

async function readBody(r: Response): Promise<unknown> {
  const text = await r.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
