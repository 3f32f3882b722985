export * from "./types";
export * from "./errors";
export * from "./options";
export * from "./config";
export * from "./lang";
export { fileSink, getLogger, isLevel } from "./logger";
export type { Level, LogFormat, LogFields, LogOptions, LogSink, Logger } from "./logger";

export { detectMode, normalizeHtml } from "./html/dom";
export { extractSpans, MAX_HTML_SIZE, DEFAULT_MIN_TEXT_LENGTH } from "./html/extractor";
export type { ExtractOptions } from "./html/extractor";
export { reinject, identitySpans } from "./html/reinjector";
export type { ReinjectOptions } from "./html/reinjector";

export * from "./rewrite/provider";
export { processHtml, DEFAULT_MAX_CONCURRENCY } from "./rewrite/index";
export type { PipelineContext } from "./rewrite/index";
export { batchSpans, estimateTokens } from "./rewrite/batcher";
export type { BatchOptions, SpanBatch } from "./rewrite/batcher";
export { buildPrompt } from "./rewrite/prompts";
export { encodeSegments, decodeSegments, mergeBatch } from "./rewrite/merge";
export * from "./rewrite/retry";
export * from "./rewrite/cache";
export { mapWithConcurrency, withDeadline } from "./rewrite/pool";
export { classifyStatus, defaultFetch } from "./rewrite/http";
export type { HttpFetch, HttpRequest, HttpResponse } from "./rewrite/http";
export { resolveProviderKind, createProvider, providerSettingsFor, createProviderFromConfig } from "./rewrite/router";
export { callOpenAI, OPENAI_BASE_URL } from "./rewrite/backends/openai";
export { callGemini, GEMINI_BASE_URL } from "./rewrite/backends/gemini";
export { callLocal, LOCAL_BASE_URL } from "./rewrite/backends/local";
