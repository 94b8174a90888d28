import type { LlmConfig } from "../config";
import { errorMessage, log } from "../utils/logging";
import { GeminiProvider } from "./providers/geminiClient";
import { OpenAIProvider } from "./providers/openaiClient";
import type { LlmPrompt, LlmProvider } from "./providers/types";

/** Tries each configured provider/model in order until one answers with text. */
export class LlmClient {
  constructor(
    private readonly providers: LlmProvider[],
    private readonly timeoutMs: number
  ) {
    if (providers.length === 0) throw new Error("LlmClient needs at least one provider");
  }

  async complete(prompt: LlmPrompt, timeoutMs: number = this.timeoutMs): Promise<string> {
    let lastErr: unknown = null;
    for (const provider of this.providers) {
      try {
        const text = await provider.complete(prompt, timeoutMs);
        if (text) return text;
        lastErr = new Error(`${provider.name} returned empty output`);
      } catch (err) {
        lastErr = err;
        log.warn("LLM", `${provider.name} failed: ${errorMessage(err)}`);
      }
    }
    throw lastErr instanceof Error ? lastErr : new Error("all LLM providers failed");
  }
}

export function createLlmClient(config: LlmConfig): LlmClient | null {
  const providers: LlmProvider[] = [];
  if (config.geminiApiKey) {
    for (const model of config.geminiModels) providers.push(new GeminiProvider(config.geminiApiKey, model));
  }
  if (config.openaiApiKey) {
    for (const model of config.openaiModels) providers.push(new OpenAIProvider(config.openaiApiKey, model));
  }
  if (providers.length === 0) {
    log.info("LLM", "no model keys configured; replies use the scripted fallback");
    return null;
  }
  return new LlmClient(providers, config.timeoutMs);
}
