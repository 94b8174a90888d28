import type { Rules } from "../config";
import { errorMessage, log } from "../utils/logging";
import type { Message, ScamLevel } from "../utils/types";
import { CompiledTerm, compileLexicon, matchLexicon } from "./lexicon";
import type { LlmClient } from "./llm";
import type { FieldPatterns } from "./patterns";
import { guardPromptText } from "./promptGuard";

export const LEVEL_RANK: Record<ScamLevel, number> = { safe: 0, suspected: 1, confirmed: 2 };

export const TIER_CONFIDENCE: Record<ScamLevel, number> = { safe: 0.1, suspected: 0.6, confirmed: 0.9 };

export type Classification = {
  level: ScamLevel;
  confidence: number;
  matched: string[];
  /** No rule fired for this message; a secondary signal may be consulted. */
  ambiguous: boolean;
};

export type ClassifierInput = {
  text: string;
  sender?: string;
};

export function maxLevel(a: ScamLevel, b: ScamLevel): ScamLevel {
  return LEVEL_RANK[a] >= LEVEL_RANK[b] ? a : b;
}

export function coerceLevel(raw: string): ScamLevel {
  const text = raw.toLowerCase();
  if (/\bconfirmed\b/.test(text)) return "confirmed";
  if (/\bsuspected\b/.test(text)) return "suspected";
  return "safe";
}

const DETECTOR_SYSTEM_PROMPT = [
  "You are a scam detection system. Classify the latest message using the conversation for context.",
  'Answer with JSON only: {"scam_level":"safe"|"suspected"|"confirmed"}',
  'Only answer "confirmed" when the sender clearly asks for money, credentials or payment details.'
].join("\n");

type ClassifierOptions = {
  rules: Pick<Rules, "confirmedKeywords" | "suspectedKeywords" | "anomalousSenderPatterns" | "injectionPatterns">;
  patterns: FieldPatterns;
  llm?: LlmClient | null;
};

/**
 * Rule tiers, strongest first. Confirmed: credential or money asks from the confirmed lexicon,
 * or a UPI id / link in the text. Suspected: urgency and fear lexicon, or an anomalous sender id.
 * The session level only ever moves up.
 */
export class Classifier {
  private readonly confirmed: CompiledTerm[];
  private readonly suspected: CompiledTerm[];
  private readonly senderPatterns: RegExp[];
  private readonly injection: CompiledTerm[];

  constructor(private readonly options: ClassifierOptions) {
    this.confirmed = compileLexicon(options.rules.confirmedKeywords);
    this.suspected = compileLexicon(options.rules.suspectedKeywords);
    this.senderPatterns = options.rules.anomalousSenderPatterns.map((p) => new RegExp(p));
    this.injection = compileLexicon(options.rules.injectionPatterns);
  }

  classify(message: ClassifierInput, _history: readonly Message[], currentLevel: ScamLevel): Classification {
    const confirmedHits = [
      ...matchLexicon(message.text, this.confirmed),
      ...this.options.patterns.upiIds(message.text).map((id) => `upi:${id}`),
      ...this.options.patterns.links(message.text).map((url) => `link:${url}`)
    ];

    let ruleLevel: ScamLevel = "safe";
    let matched: string[] = [];
    if (confirmedHits.length > 0) {
      ruleLevel = "confirmed";
      matched = confirmedHits;
    } else {
      const sender = (message.sender ?? "").trim();
      const suspectedHits = matchLexicon(message.text, this.suspected);
      if (sender && this.senderPatterns.some((p) => p.test(sender))) {
        suspectedHits.push(`sender:${sender}`);
      }
      if (suspectedHits.length > 0) {
        ruleLevel = "suspected";
        matched = suspectedHits;
      }
    }

    const level = maxLevel(ruleLevel, currentLevel);
    return { level, confidence: TIER_CONFIDENCE[level], matched, ambiguous: matched.length === 0 };
  }

  /** Model opinion for messages no rule fired on; null when no model is configured or it fails. */
  async secondarySignal(text: string, history: readonly Message[], timeoutMs: number): Promise<ScamLevel | null> {
    const llm = this.options.llm;
    if (!llm) return null;
    const recent = history
      .slice(-5)
      .map((m) => `- ${m.sender}: ${guardPromptText(m.text, this.injection).slice(0, 100)}`)
      .join("\n");
    const user = [`Current message: ${guardPromptText(text, this.injection)}`, recent ? `Recent history:\n${recent}` : ""]
      .filter(Boolean)
      .join("\n");
    try {
      const raw = await llm.complete({ system: DETECTOR_SYSTEM_PROMPT, user, temperature: 0, maxOutputTokens: 60 }, timeoutMs);
      return coerceLevel(raw);
    } catch (err) {
      log.warn("DETECT", `secondary signal unavailable: ${errorMessage(err)}`);
      return null;
    }
  }

  combine(current: Classification, signal: ScamLevel | null): Classification {
    if (!signal || !current.ambiguous) return current;
    const level = maxLevel(current.level, signal);
    return { level, confidence: TIER_CONFIDENCE[level], matched: [`model:${signal}`], ambiguous: false };
  }
}
