import { describe, it, expect } from "@jest/globals";
import { loadConfig } from "../config";
import { ConfigError, OptionsError } from "../errors";
import { hasRtlScript, isRtlLanguage, primarySubtag, sameLanguage } from "../lang";
import { resolveOptions } from "../options";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof OptionsError || e instanceof ConfigError) return e.issues;
    throw e;
  }
  return [];
}

describe("resolveOptions", () => {
  it("fills defaults and freezes the result", () => {
    const options = resolveOptions({});
    expect(options).toEqual({
      task: "paraphrase",
      source_language: "he",
      target_language: "he",
      model: "gpt-4o-mini",
      temperature: 0.7,
      max_tokens: 2048,
      preserve_formatting: true,
      use_cache: true,
      min_text_length: 2,
    });
    expect(Object.isFrozen(options)).toBe(true);
  });

  it("requires a target language for translation", () => {
    expect(issuesOf(() => resolveOptions({ task: "translate" }))).toEqual([
      "target_language: required when task is translate",
    ]);
    expect(resolveOptions({ task: "translate", target_language: "en" }).target_language).toBe("en");
  });

  it("requires an instruction for the custom task", () => {
    expect(issuesOf(() => resolveOptions({ task: "custom" }))).toEqual(["extra_prompt: required when task is custom"]);
  });

  it("rejects out-of-range numbers", () => {
    expect(() => resolveOptions({ temperature: 3 })).toThrow(OptionsError);
    expect(() => resolveOptions({ max_tokens: 0 })).toThrow(OptionsError);
  });
});

describe("language helpers", () => {
  it("compares primary subtags case-insensitively", () => {
    expect(primarySubtag("he-IL")).toBe("he");
    expect(sameLanguage("EN-us", "en")).toBe(true);
    expect(sameLanguage("en", "es")).toBe(false);
  });

  it("knows right-to-left languages and scripts", () => {
    expect(isRtlLanguage("fa")).toBe(true);
    expect(isRtlLanguage("fr")).toBe(false);
    expect(isRtlLanguage(undefined)).toBe(false);
    expect(hasRtlScript("abc")).toBe(false);
    expect(hasRtlScript("abc שלום")).toBe(true);
  });
});

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.default_model).toBe("gpt-4o-mini");
    expect(config.provider).toBeUndefined();
    expect(config.local.base_url).toBe("http://localhost:11434");
    expect(config.request_timeout_ms).toBe(30000);
    expect(config.retry).toMatchObject({ max_attempts: 3, base_delay_ms: 1000, max_delay_ms: 10000 });
    expect(config.max_concurrency).toBe(4);
    expect(config.batching).toEqual({ maxSpans: 10, maxTokens: 3000 });
    expect(config.cache).toEqual({ ttl_seconds: 86400, max_entries: 1000, dir: undefined });
    expect(config.api_port).toBe(3001);
    expect(config.log).toEqual({ level: "info", format: "pretty" });
  });

  it("reads overrides and fallbacks", () => {
    const config = loadConfig({
      LLM_PROVIDER: "gemini",
      GOOGLE_API_KEY: "test-secret",
      OLLAMA_HOST: "http://ollama.test:11434",
      LLM_MAX_RETRIES: "5",
      CACHE_DIR: "/tmp/llm-cache",
      API_PORT: "",
      LOG_FORMAT: "json",
      LLM_LOG_FILE: "/tmp/llm-html.log",
    });
    expect(config.provider).toBe("gemini");
    expect(config.gemini.api_key).toBe("test-secret");
    expect(config.local.base_url).toBe("http://ollama.test:11434");
    expect(config.retry.max_attempts).toBe(5);
    expect(config.cache.dir).toBe("/tmp/llm-cache");
    expect(config.api_port).toBe(3001);
    expect(config.log).toEqual({ level: "info", format: "json", file: "/tmp/llm-html.log" });
  });

  it("names every invalid variable", () => {
    const issues = issuesOf(() => loadConfig({ LLM_MAX_RETRIES: "zero", LLM_PROVIDER: "azure" }));
    expect(issues).toHaveLength(2);
    expect(issues.some((i) => i.startsWith("LLM_MAX_RETRIES:"))).toBe(true);
    expect(issues.some((i) => i.startsWith("LLM_PROVIDER:"))).toBe(true);
    expect(() => loadConfig({ OPENAI_BASE_URL: "not a url" })).toThrow(ConfigError);
  });
});
