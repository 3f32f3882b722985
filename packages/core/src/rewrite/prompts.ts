import { ProcessingOptions, TextSpan } from "../types";
import { Prompt } from "./provider";
import { encodeSegments } from "./merge";

function taskInstruction(options: ProcessingOptions): string {
  const lang = options.source_language;
  switch (options.task) {
    case "translate":
      return `You are a professional translator. Translate each segment from language "${lang}" to language "${options.target_language}".`;
    case "paraphrase":
      return [
        `You are an expert editor for text in language "${lang}".`,
        "Rewrite each segment with different wording while keeping its original meaning, tone and level of formality.",
      ].join(" ");
    case "summarize":
      return [
        `You are an expert at summarizing text in language "${lang}".`,
        "Summarize each segment, keeping its key points and essential meaning.",
      ].join(" ");
    case "custom":
      return [
        `You process text in language "${lang}". Follow the instruction exactly for each segment.`,
        `Instruction: ${options.extra_prompt ?? ""}`,
      ].join(" ");
  }
}

const FORMAT_RULES = [
  "The user message is a JSON array of text segments taken, in order, from an HTML document.",
  "Reply with ONLY a JSON array of strings: exactly one output string per input segment, in the same order.",
  "Never merge, split, add or drop segments, and do not add HTML markup or commentary.",
];

const RTL_NOTE = "Some segments are written right-to-left; keep them right-to-left and keep their punctuation order.";

export function buildPrompt(spans: TextSpan[], options: ProcessingOptions): Prompt {
  const lines = [taskInstruction(options), ...FORMAT_RULES];
  if (spans.some((s) => s.rtl)) lines.push(RTL_NOTE);
  return {
    system: lines.join("\n"),
    user: encodeSegments(spans.map((s) => s.text)),
  };
}
