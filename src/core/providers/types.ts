export type LlmPrompt = {
  system: string;
  user: string;
  maxOutputTokens?: number;
  temperature?: number;
};

export interface LlmProvider {
  readonly name: string;
  complete(prompt: LlmPrompt, timeoutMs: number): Promise<string>;
}
