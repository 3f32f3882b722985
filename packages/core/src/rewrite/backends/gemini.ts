import { z } from "zod";
import { getLogger } from "../../logger";
import { estimateTokens } from "../batcher";
import { HttpFetch, StatusClass, invalidResponse, joinUrl, postJson, requireApiKey } from "../http";
import { Completion, GeminiSettings, Prompt, SubmitConfig } from "../provider";

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })) }).optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
  usageMetadata: z
    .object({ promptTokenCount: z.number(), candidatesTokenCount: z.number() })
    .partial()
    .optional(),
});

// Gemini answers 400 INVALID_ARGUMENT for a bad key instead of 401.
function classifyGeminiStatus(status: number, body: string): StatusClass | undefined {
  if (status === 400 && /API_KEY_INVALID|API key not valid/i.test(body)) return { code: "auth", retryable: false };
  return undefined;
}

export async function callGemini(
  settings: GeminiSettings,
  prompt: Prompt,
  config: SubmitConfig,
  fetchImpl: HttpFetch
): Promise<Completion> {
  const log = (config.logger ?? getLogger("core")).child({ model: config.model });
  const apiKey = requireApiKey(settings.api_key, "gemini", "GEMINI_API_KEY", config.model);
  log.debug("backend.gemini.call", { chars: prompt.user.length });

  const data = await postJson({
    fetchImpl,
    url: joinUrl(settings.base_url, `/models/${encodeURIComponent(config.model)}:generateContent`),
    headers: { "x-goog-api-key": apiKey },
    body: {
      systemInstruction: { parts: [{ text: prompt.system }] },
      contents: [{ role: "user", parts: [{ text: prompt.user }] }],
      generationConfig: { temperature: config.temperature, maxOutputTokens: config.max_tokens },
    },
    timeoutMs: config.timeout_ms,
    signal: config.signal,
    provider: "gemini",
    model: config.model,
    classify: classifyGeminiStatus,
  });

  const parsed = GenerateContentSchema.safeParse(data);
  if (!parsed.success) throw invalidResponse("gemini", config.model, parsed.error.issues[0]?.message ?? "schema mismatch");
  const { candidates, promptFeedback, usageMetadata } = parsed.data;
  const first = candidates?.[0];
  if (!first?.content) {
    const reason = promptFeedback?.blockReason ?? first?.finishReason ?? "no candidates";
    throw invalidResponse("gemini", config.model, `empty completion (${reason})`);
  }
  const text = first.content.parts.map((p) => p.text ?? "").join("");
  return {
    text,
    usage: {
      tokens_in: usageMetadata?.promptTokenCount ?? estimateTokens(prompt.system + prompt.user),
      tokens_out: usageMetadata?.candidatesTokenCount ?? estimateTokens(text),
    },
  };
}
