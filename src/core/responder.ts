import type { Persona, Rules } from "../config";
import { extractJson } from "../utils/json";
import type { Message, ScamLevel } from "../utils/types";
import { CompiledTerm, compileLexicon } from "./lexicon";
import type { LlmClient } from "./llm";
import { levelGoal, personaSystemPrompt } from "./persona";
import { guardPromptText } from "./promptGuard";

export type ResponderInput = {
  text: string;
  level: ScamLevel;
  turnCount: number;
  history: readonly Message[];
};

/** Produces the outbound reply. The orchestrator bounds every call with a timeout. */
export interface Responder {
  reply(input: ResponderInput): Promise<string>;
}

const MAX_REPLY_CHARS = 170;

export function enforceSingleQuestion(reply: string): string {
  const parts = reply.split("?");
  if (parts.length <= 2) return reply.trim();
  return `${parts[0].trim()}?`;
}

/** Deterministic reply used when no model is configured and on responder timeout or failure. */
export function scriptedReply(rules: Pick<Rules, "fallbackReplies" | "neutralReply">, level: ScamLevel, turnCount: number): string {
  if (level === "safe") return rules.neutralReply;
  const replies = rules.fallbackReplies;
  return replies[Math.abs(turnCount) % replies.length];
}

export class ScriptedResponder implements Responder {
  constructor(private readonly rules: Pick<Rules, "fallbackReplies" | "neutralReply">) {}

  async reply(input: ResponderInput): Promise<string> {
    return scriptedReply(this.rules, input.level, input.turnCount);
  }
}

export class LlmResponder implements Responder {
  private readonly system: string;
  private readonly injection: CompiledTerm[];

  constructor(
    private readonly llm: LlmClient,
    persona: Persona,
    rules: Pick<Rules, "injectionPatterns">
  ) {
    this.system = personaSystemPrompt(persona);
    this.injection = compileLexicon(rules.injectionPatterns);
  }

  async reply(input: ResponderInput): Promise<string> {
    const transcript = input.history
      .slice(-4)
      .map((m) => `${m.sender === "agent" ? "You" : "Them"}: ${guardPromptText(m.text, this.injection)}`)
      .join("\n");
    const user = [
      transcript ? `Conversation so far:\n${transcript}` : "",
      `Them: ${guardPromptText(input.text, this.injection)}`,
      `Goal: ${levelGoal(input.level)}`
    ]
      .filter(Boolean)
      .join("\n\n");

    const raw = await this.llm.complete({ system: this.system, user, temperature: 0.8, maxOutputTokens: 120 });
    const parsed = extractJson(raw);
    const text = parsed && typeof parsed.reply === "string" ? parsed.reply : raw;
    const reply = enforceSingleQuestion(text.replace(/\s+/g, " "));
    if (!reply) throw new Error("model returned an empty reply");
    return reply.length > MAX_REPLY_CHARS ? reply.slice(0, MAX_REPLY_CHARS).trim() : reply;
  }
}
