import { z } from "zod";
import { getLogger } from "../../logger";
import { estimateTokens } from "../batcher";
import { HttpFetch, invalidResponse, joinUrl, postJson } from "../http";
import { Completion, LocalSettings, Prompt, SubmitConfig } from "../provider";

export const LOCAL_BASE_URL = "http://localhost:11434";

// Ollama /api/chat, non-streaming
const ChatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export async function callLocal(
  settings: LocalSettings,
  prompt: Prompt,
  config: SubmitConfig,
  fetchImpl: HttpFetch
): Promise<Completion> {
  const log = (config.logger ?? getLogger("core")).child({ model: config.model });
  log.debug("backend.local.call", { host: settings.base_url, chars: prompt.user.length });

  const data = await postJson({
    fetchImpl,
    url: joinUrl(settings.base_url, "/api/chat"),
    body: {
      model: config.model,
      stream: false,
      messages: [
        { role: "system", content: prompt.system },
        { role: "user", content: prompt.user },
      ],
      options: { temperature: config.temperature, num_predict: config.max_tokens },
    },
    timeoutMs: config.timeout_ms,
    signal: config.signal,
    provider: "local",
    model: config.model,
  });

  const parsed = ChatResponseSchema.safeParse(data);
  if (!parsed.success) throw invalidResponse("local", config.model, parsed.error.issues[0]?.message ?? "schema mismatch");
  const text = parsed.data.message.content;
  return {
    text,
    usage: {
      tokens_in: parsed.data.prompt_eval_count ?? estimateTokens(prompt.system + prompt.user),
      tokens_out: parsed.data.eval_count ?? estimateTokens(text),
    },
  };
}
