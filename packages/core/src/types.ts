export type Task = "translate" | "paraphrase" | "summarize" | "custom";

export type ProviderKind = "openai" | "gemini" | "local";

export interface ProcessingOptions {
  readonly task: Task;
  readonly source_language: string;
  readonly target_language: string; // resolved; equals source_language unless translating
  readonly model: string;
  readonly temperature: number;
  readonly max_tokens: number;
  readonly preserve_formatting: boolean;
  readonly use_cache: boolean;
  readonly extra_prompt?: string;
  readonly min_text_length: number;
  readonly timeout_ms?: number;
}

// Child indices from the parse root (document or fragment) down to a text node.
export type NodePath = readonly number[];

export interface TextSpan {
  id: number; // document order
  text: string; // trimmed
  leading: string;
  trailing: string;
  path: NodePath;
  container: string; // parent tag name, lower-case
  dir?: string; // nearest inherited dir attribute
  lang?: string; // nearest inherited lang attribute
  rtl: boolean;
}

export type PlacementMap = ReadonlyMap<number, NodePath>;

export type ParseMode = "document" | "fragment";

export interface Extraction {
  source: string;
  mode: ParseMode;
  spans: TextSpan[];
  placement: PlacementMap;
}

export interface TransformedSpan {
  id: number;
  text: string;
}

export interface TokenUsage {
  tokens_in: number;
  tokens_out: number;
}

export interface ProcessingStats {
  total_tokens_in: number;
  total_tokens_out: number;
  processing_time: number; // seconds
  cache_hits: number; // spans served from cache
  retries_performed: number;
  spans_extracted: number;
  spans_processed: number;
  batches: number;
  provider_calls: number;
}

export interface ProcessingResult {
  html: string;
  stats: ProcessingStats;
}

export type PipelineStage =
  | "extracted"
  | "prompted"
  | "cached"
  | "called"
  | "merged"
  | "reinjected"
  | "done"
  | "errored";
