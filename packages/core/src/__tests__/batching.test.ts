import { describe, it, expect } from "@jest/globals";
import { ReinjectionError } from "../errors";
import { batchSpans, estimateTokens } from "../rewrite/batcher";
import { decodeSegments, mergeBatch } from "../rewrite/merge";
import { buildPrompt } from "../rewrite/prompts";
import { resolveOptions } from "../options";
import { TextSpan } from "../types";

function span(id: number, text: string, rtl = false): TextSpan {
  return { id, text, leading: "", trailing: "", path: [id], container: "p", rtl };
}

const sizes = (spans: TextSpan[], opts?: { maxSpans?: number; maxTokens?: number }) =>
  batchSpans(spans, opts).map((b) => b.spans.length);

describe("batchSpans", () => {
  it("caps batches at ten spans by default", () => {
    const spans = Array.from({ length: 25 }, (_, i) => span(i, `item ${i}`));
    expect(sizes(spans)).toEqual([10, 10, 5]);
    expect(batchSpans(spans).map((b) => b.index)).toEqual([0, 1, 2]);
  });

  it("starts a new batch when the token estimate would overflow", () => {
    const spans = Array.from({ length: 5 }, (_, i) => span(i, "abcdefgh"));
    expect(estimateTokens("abcdefgh")).toBe(2);
    expect(sizes(spans, { maxTokens: 5 })).toEqual([2, 2, 1]);
  });

  it("sends an oversized span alone and keeps order", () => {
    const spans = [span(0, "ab"), span(1, "x".repeat(40)), span(2, "cd")];
    const batches = batchSpans(spans, { maxTokens: 3 });
    expect(batches.map((b) => b.spans.map((s) => s.id))).toEqual([[0], [1], [2]]);
  });

  it("returns no batches for no spans", () => {
    expect(batchSpans([])).toEqual([]);
  });
});

describe("decodeSegments", () => {
  it("reads a bare JSON array and trims entries", () => {
    expect(decodeSegments('["a", " b "]', 2)).toEqual(["a", "b"]);
  });

  it("reads an array inside a code fence or surrounding prose", () => {
    expect(decodeSegments('```json\n["x", "y"]\n```', 2)).toEqual(["x", "y"]);
    expect(decodeSegments('Here you go: ["one","two"] hope it helps', 2)).toEqual(["one", "two"]);
  });

  it("accepts plain text or a JSON string for a single segment", () => {
    expect(decodeSegments("  Bonjour  ", 1)).toEqual(["Bonjour"]);
    expect(decodeSegments('"Salut"', 1)).toEqual(["Salut"]);
  });

  it("returns null when there is no array for several segments", () => {
    expect(decodeSegments("Sorry, I cannot do that", 2)).toBeNull();
  });
});

describe("mergeBatch", () => {
  const batch = { index: 3, spans: [span(4, "first"), span(5, "second")] };

  it("pairs segments with span ids in order", () => {
    expect(mergeBatch(batch, ["uno", "dos"])).toEqual([
      { id: 4, text: "uno" },
      { id: 5, text: "dos" },
    ]);
  });

  it("fails on a segment count mismatch", () => {
    expect(() => mergeBatch(batch, ["uno"])).toThrow(ReinjectionError);
    expect(() => mergeBatch(batch, ["uno"])).toThrow("Batch 3 returned 1 segments for 2 spans");
  });
});

describe("buildPrompt", () => {
  it("puts instructions in the system message and segments in the user message", () => {
    const options = resolveOptions({ task: "translate", source_language: "he", target_language: "en" });
    const prompt = buildPrompt([span(0, "שלום", true), span(1, "עולם", true)], options);
    expect(prompt.user).toBe('["שלום","עולם"]');
    expect(prompt.system).toContain('Translate each segment from language "he" to language "en".');
    expect(prompt.system).toContain("right-to-left");
  });

  it("adds the custom instruction and omits the RTL note for left-to-right text", () => {
    const options = resolveOptions({ task: "custom", source_language: "en", extra_prompt: "Make it formal" });
    const prompt = buildPrompt([span(0, "hey there")], options);
    expect(prompt.system).toContain("Instruction: Make it formal");
    expect(prompt.system).not.toContain("right-to-left");
  });
});
