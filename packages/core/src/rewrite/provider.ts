import { Logger } from "../logger";
import { ProviderKind, TokenUsage } from "../types";

export interface Prompt {
  system: string;
  user: string;
}

export interface SubmitConfig {
  model: string;
  temperature: number;
  max_tokens?: number;
  timeout_ms?: number; // per attempt
  signal?: AbortSignal; // cancels the in-flight request
  logger?: Logger;
}

export interface Completion {
  text: string;
  usage: TokenUsage;
}

export interface LLMProvider {
  readonly kind: ProviderKind;
  submit(prompt: Prompt, config: SubmitConfig): Promise<Completion>;
}

export interface OpenAISettings {
  kind: "openai";
  api_key?: string;
  base_url: string;
}

export interface GeminiSettings {
  kind: "gemini";
  api_key?: string;
  base_url: string;
}

export interface LocalSettings {
  kind: "local";
  base_url: string;
}

export type ProviderSettings = OpenAISettings | GeminiSettings | LocalSettings;
