import { z } from "zod";
import { getLogger } from "../../logger";
import { estimateTokens } from "../batcher";
import { HttpFetch, invalidResponse, joinUrl, postJson, requireApiKey } from "../http";
import { Completion, OpenAISettings, Prompt, SubmitConfig } from "../provider";

export const OPENAI_BASE_URL = "https://api.openai.com/v1";

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
  usage: z
    .object({ prompt_tokens: z.number(), completion_tokens: z.number() })
    .partial()
    .optional(),
});

export async function callOpenAI(
  settings: OpenAISettings,
  prompt: Prompt,
  config: SubmitConfig,
  fetchImpl: HttpFetch
): Promise<Completion> {
  const log = (config.logger ?? getLogger("core")).child({ model: config.model });
  const apiKey = requireApiKey(settings.api_key, "openai", "OPENAI_API_KEY", config.model);
  log.debug("backend.openai.call", { chars: prompt.user.length });

  const data = await postJson({
    fetchImpl,
    url: joinUrl(settings.base_url, "/chat/completions"),
    headers: { Authorization: `Bearer ${apiKey}` },
    body: {
      model: config.model,
      temperature: config.temperature,
      max_tokens: config.max_tokens,
      messages: [
        { role: "system", content: prompt.system },
        { role: "user", content: prompt.user },
      ],
    },
    timeoutMs: config.timeout_ms,
    signal: config.signal,
    provider: "openai",
    model: config.model,
  });

  const parsed = ChatCompletionSchema.safeParse(data);
  if (!parsed.success) throw invalidResponse("openai", config.model, parsed.error.issues[0]?.message ?? "schema mismatch");
  const text = parsed.data.choices[0].message.content ?? "";
  const usage = parsed.data.usage;
  return {
    text,
    usage: {
      tokens_in: usage?.prompt_tokens ?? estimateTokens(prompt.system + prompt.user),
      tokens_out: usage?.completion_tokens ?? estimateTokens(text),
    },
  };
}
