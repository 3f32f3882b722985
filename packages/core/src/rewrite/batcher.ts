import { TextSpan } from "../types";

// naive token estimator: ~4 chars per token
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export interface BatchOptions {
  maxSpans?: number; // default 10
  maxTokens?: number; // default 3000
}

export interface SpanBatch {
  index: number;
  spans: TextSpan[];
}

/**
 * Groups consecutive spans into batches bounded by span count and estimated tokens.
 * A span is never split; one larger than `maxTokens` travels alone.
 */
export function batchSpans(spans: TextSpan[], opts: BatchOptions = {}): SpanBatch[] {
  const maxSpans = Math.max(1, opts.maxSpans ?? 10);
  const maxTokens = Math.max(1, opts.maxTokens ?? 3000);
  if (spans.length === 0) return [];

  const batches: SpanBatch[] = [];
  let current: TextSpan[] = [];
  let tokens = 0;
  for (const span of spans) {
    const cost = estimateTokens(span.text);
    if (current.length > 0 && (current.length >= maxSpans || tokens + cost > maxTokens)) {
      batches.push({ index: batches.length, spans: current });
      current = [];
      tokens = 0;
    }
    current.push(span);
    tokens += cost;
  }
  batches.push({ index: batches.length, spans: current });
  return batches;
}
