import { z } from "zod";
import { OptionsError } from "./errors";
import { ProcessingOptions } from "./types";

export const DEFAULT_MODEL = "gpt-4o-mini";

export const ProcessingOptionsSchema = z
  .object({
    task: z.enum(["translate", "paraphrase", "summarize", "custom"]).default("paraphrase"),
    source_language: z.string().trim().min(1).default("he"),
    target_language: z.string().trim().min(1).optional(),
    model: z.string().trim().min(1).default(DEFAULT_MODEL),
    temperature: z.number().min(0).max(2).default(0.7),
    max_tokens: z.number().int().positive().default(2048),
    preserve_formatting: z.boolean().default(true),
    use_cache: z.boolean().default(true),
    extra_prompt: z.string().trim().min(1).optional(),
    min_text_length: z.number().int().min(1).default(2),
    timeout_ms: z.number().int().positive().optional(),
  })
  .superRefine((v, ctx) => {
    if (v.task === "custom" && !v.extra_prompt) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["extra_prompt"], message: "required when task is custom" });
    }
    if (v.task === "translate" && !v.target_language) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["target_language"], message: "required when task is translate" });
    }
  });

export type ProcessingOptionsInput = z.input<typeof ProcessingOptionsSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
}

/** Applies defaults, validates, and freezes the options for one invocation. */
export function resolveOptions(input: ProcessingOptionsInput = {}): ProcessingOptions {
  const parsed = ProcessingOptionsSchema.safeParse(input);
  if (!parsed.success) throw new OptionsError(formatIssues(parsed.error));
  const v = parsed.data;
  return Object.freeze({ ...v, target_language: v.target_language ?? v.source_language });
}
