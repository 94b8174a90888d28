import OpenAI from "openai";
import type { LlmPrompt, LlmProvider } from "./types";

export class OpenAIProvider implements LlmProvider {
  readonly name: string;
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string
  ) {
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
    this.name = `openai:${model}`;
  }

  async complete(prompt: LlmPrompt, timeoutMs: number): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user }
          ],
          max_tokens: prompt.maxOutputTokens ?? 200,
          temperature: prompt.temperature ?? 0.6
        },
        { signal: controller.signal, timeout: timeoutMs }
      );
      return response.choices[0]?.message?.content?.trim() ?? "";
    } finally {
      clearTimeout(timer);
    }
  }
}
