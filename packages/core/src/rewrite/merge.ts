import { ReinjectionError } from "../errors";
import { TransformedSpan } from "../types";
import { SpanBatch } from "./batcher";

export function encodeSegments(texts: string[]): string {
  return JSON.stringify(texts);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function tryParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Reads the model's answer back into segments. Accepts a bare JSON array, one wrapped in a
 * code fence or surrounded by prose, and for single-segment batches a plain-text answer.
 * Returns null when nothing usable is found.
 */
export function decodeSegments(raw: string, expected: number): string[] | null {
  const trimmed = raw.trim();
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed)?.[1];
  const bracketed = /\[[\s\S]*\]/.exec(trimmed)?.[0];

  for (const candidate of [trimmed, fenced, bracketed]) {
    if (!candidate) continue;
    const parsed = tryParse(candidate);
    if (isStringArray(parsed)) return parsed.map((s) => s.trim());
    if (expected === 1 && typeof parsed === "string") return [parsed.trim()];
  }
  if (expected === 1 && trimmed) return [trimmed];
  return null;
}

export function mergeBatch(batch: SpanBatch, segments: string[]): TransformedSpan[] {
  if (segments.length !== batch.spans.length) {
    throw new ReinjectionError(
      "count_mismatch",
      `Batch ${batch.index} returned ${segments.length} segments for ${batch.spans.length} spans`
    );
  }
  return batch.spans.map((span, i) => ({ id: span.id, text: segments[i] }));
}
