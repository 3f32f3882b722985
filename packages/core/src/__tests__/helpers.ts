import { getLogger } from "../logger";
import { LLMProvider, Prompt } from "../rewrite/provider";
import { TokenUsage } from "../types";

export const silentLogger = getLogger("test", { level: "silent" });

export function segmentsOf(prompt: Prompt): string[] {
  const parsed: unknown = JSON.parse(prompt.user);
  if (!Array.isArray(parsed) || !parsed.every((s): s is string => typeof s === "string")) {
    throw new Error("user message is not a JSON array of strings");
  }
  return parsed;
}

export interface StubProvider extends LLMProvider {
  prompts: Prompt[];
}

export function stubProvider(
  respond: (prompt: Prompt, call: number) => string | Promise<string>,
  usage: TokenUsage = { tokens_in: 10, tokens_out: 5 }
): StubProvider {
  const prompts: Prompt[] = [];
  return {
    kind: "local",
    prompts,
    async submit(prompt) {
      prompts.push(prompt);
      const text = await respond(prompt, prompts.length);
      return { text, usage };
    },
  };
}

// Answers with the segments it was sent.
export const echoProvider = () => stubProvider((p) => p.user);

export const upperCaseProvider = () =>
  stubProvider((p) => JSON.stringify(segmentsOf(p).map((s) => s.toUpperCase())));
