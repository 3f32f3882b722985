import { ProviderKind } from "../types";
import { AppConfig } from "../config";
import { Logger, getLogger } from "../logger";
import { callGemini } from "./backends/gemini";
import { callLocal } from "./backends/local";
import { callOpenAI } from "./backends/openai";
import { HttpFetch, defaultFetch } from "./http";
import { LLMProvider, ProviderSettings } from "./provider";

export function resolveProviderKind(model: string, preferred?: ProviderKind): ProviderKind {
  if (preferred) return preferred;
  const m = model.trim().toLowerCase();
  if (/^(gpt-|o1|o3|o4|text-|chatgpt-)/.test(m)) return "openai";
  if (m.startsWith("gemini")) return "gemini";
  return "local";
}

export function createProvider(settings: ProviderSettings, fetchImpl: HttpFetch = defaultFetch): LLMProvider {
  switch (settings.kind) {
    case "openai":
      return { kind: "openai", submit: (prompt, config) => callOpenAI(settings, prompt, config, fetchImpl) };
    case "gemini":
      return { kind: "gemini", submit: (prompt, config) => callGemini(settings, prompt, config, fetchImpl) };
    case "local":
      return { kind: "local", submit: (prompt, config) => callLocal(settings, prompt, config, fetchImpl) };
  }
}

export function providerSettingsFor(config: AppConfig, model: string): ProviderSettings {
  const kind = resolveProviderKind(model, config.provider);
  switch (kind) {
    case "openai":
      return { kind, api_key: config.openai.api_key, base_url: config.openai.base_url };
    case "gemini":
      return { kind, api_key: config.gemini.api_key, base_url: config.gemini.base_url };
    case "local":
      return { kind, base_url: config.local.base_url };
  }
}

export function createProviderFromConfig(
  config: AppConfig,
  model: string,
  fetchImpl?: HttpFetch,
  logger?: Logger
): LLMProvider {
  const settings = providerSettingsFor(config, model);
  (logger ?? getLogger("core")).debug("backend.selected", {
    provider: settings.kind,
    model,
    has_api_key: settings.kind === "local" ? undefined : Boolean(settings.api_key),
  });
  return createProvider(settings, fetchImpl);
}
