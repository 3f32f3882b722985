import { z } from "zod";
import { ConfigError } from "./errors";
import { Level, LogFormat } from "./logger";
import { DEFAULT_MODEL, formatIssues } from "./options";
import { CacheSettings, DEFAULT_CACHE_MAX_ENTRIES } from "./rewrite/cache";
import { BatchOptions } from "./rewrite/batcher";
import { GEMINI_BASE_URL } from "./rewrite/backends/gemini";
import { LOCAL_BASE_URL } from "./rewrite/backends/local";
import { OPENAI_BASE_URL } from "./rewrite/backends/openai";
import { DEFAULT_RETRY_POLICY, RetryPolicy } from "./rewrite/retry";
import { ProviderKind } from "./types";

export interface AppConfig {
  default_model: string;
  provider?: ProviderKind;
  openai: { api_key?: string; base_url: string };
  gemini: { api_key?: string; base_url: string };
  local: { base_url: string };
  request_timeout_ms: number;
  retry: RetryPolicy;
  max_concurrency: number;
  batching: Required<BatchOptions>;
  cache: CacheSettings;
  api_port: number;
  log: { level: Level; format: LogFormat; file?: string };
}

// Blank env values count as unset.
const blank = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);
const str = () => z.preprocess(blank, z.string().trim().optional());
const int = (min: number) => z.preprocess(blank, z.coerce.number().int().min(min).optional());

const EnvSchema = z.object({
  DEFAULT_MODEL: str(),
  LLM_PROVIDER: z.preprocess(blank, z.enum(["openai", "gemini", "local"]).optional()),
  OPENAI_API_KEY: str(),
  OPENAI_BASE_URL: z.preprocess(blank, z.string().url().optional()),
  GEMINI_API_KEY: str(),
  GOOGLE_API_KEY: str(),
  GEMINI_BASE_URL: z.preprocess(blank, z.string().url().optional()),
  LOCAL_LLM_URL: z.preprocess(blank, z.string().url().optional()),
  OLLAMA_HOST: z.preprocess(blank, z.string().url().optional()),
  LLM_TIMEOUT_MS: int(1),
  LLM_MAX_RETRIES: int(1),
  LLM_RETRY_BASE_MS: int(0),
  LLM_RETRY_MAX_MS: int(0),
  LLM_MAX_CONCURRENCY: int(1),
  BATCH_MAX_SPANS: int(1),
  BATCH_MAX_TOKENS: int(1),
  CACHE_TTL_SECONDS: int(1),
  CACHE_MAX_ENTRIES: int(1),
  CACHE_DIR: str(),
  API_PORT: z.preprocess(blank, z.coerce.number().int().min(0).max(65535).optional()),
  LOG_LEVEL: z.preprocess(blank, z.enum(["trace", "debug", "info", "warn", "error", "silent"]).optional()),
  LOG_FORMAT: z.preprocess(blank, z.enum(["json", "pretty"]).optional()),
  LLM_LOG_FILE: str(),
});

/** Reads the environment once. Invalid values raise ConfigError naming every offending variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));
  const e = parsed.data;

  return {
    default_model: e.DEFAULT_MODEL ?? DEFAULT_MODEL,
    provider: e.LLM_PROVIDER,
    openai: { api_key: e.OPENAI_API_KEY, base_url: e.OPENAI_BASE_URL ?? OPENAI_BASE_URL },
    gemini: { api_key: e.GEMINI_API_KEY ?? e.GOOGLE_API_KEY, base_url: e.GEMINI_BASE_URL ?? GEMINI_BASE_URL },
    local: { base_url: e.LOCAL_LLM_URL ?? e.OLLAMA_HOST ?? LOCAL_BASE_URL },
    request_timeout_ms: e.LLM_TIMEOUT_MS ?? 30_000,
    retry: {
      ...DEFAULT_RETRY_POLICY,
      max_attempts: e.LLM_MAX_RETRIES ?? DEFAULT_RETRY_POLICY.max_attempts,
      base_delay_ms: e.LLM_RETRY_BASE_MS ?? DEFAULT_RETRY_POLICY.base_delay_ms,
      max_delay_ms: e.LLM_RETRY_MAX_MS ?? DEFAULT_RETRY_POLICY.max_delay_ms,
    },
    max_concurrency: e.LLM_MAX_CONCURRENCY ?? 4,
    batching: { maxSpans: e.BATCH_MAX_SPANS ?? 10, maxTokens: e.BATCH_MAX_TOKENS ?? 3000 },
    cache: {
      ttl_seconds: e.CACHE_TTL_SECONDS ?? 86_400,
      max_entries: e.CACHE_MAX_ENTRIES ?? DEFAULT_CACHE_MAX_ENTRIES,
      dir: e.CACHE_DIR,
    },
    api_port: e.API_PORT ?? 3001,
    log: { level: e.LOG_LEVEL ?? "info", format: e.LOG_FORMAT ?? "pretty", file: e.LLM_LOG_FILE },
  };
}
