import { GoogleGenerativeAI } from "@google/generative-ai";
import { withTimeout } from "../../utils/timeout";
import type { LlmPrompt, LlmProvider } from "./types";

export class GeminiProvider implements LlmProvider {
  readonly name: string;
  private readonly client: GoogleGenerativeAI;

  constructor(
    apiKey: string,
    private readonly model: string
  ) {
    this.client = new GoogleGenerativeAI(apiKey);
    this.name = `gemini:${model}`;
  }

  async complete(prompt: LlmPrompt, timeoutMs: number): Promise<string> {
    const model = this.client.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: prompt.system,
        generationConfig: {
          temperature: prompt.temperature ?? 0.6,
          maxOutputTokens: prompt.maxOutputTokens ?? 200
        }
      },
      { timeout: timeoutMs }
    );
    const result = await withTimeout(model.generateContent(prompt.user), timeoutMs, this.name);
    return result.response.text().trim();
  }
}
