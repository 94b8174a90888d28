import type { Rules } from "../config";
import { extractJson, stringArray } from "../utils/json";
import { errorMessage, log } from "../utils/logging";
import { ExtractedIntelligence, HIGH_VALUE_FIELDS, Message, emptyIntelligence } from "../utils/types";
import { CompiledTerm, compileLexicon, matchLexicon } from "./lexicon";
import type { LlmClient } from "./llm";
import { FieldPatterns } from "./patterns";
import { guardPromptText } from "./promptGuard";

const EXTRACT_SYSTEM_PROMPT = [
  "Extract suspicious payment and contact data from the message.",
  "Return JSON only:",
  '{"upiIds":[],"phoneNumbers":[],"phishingLinks":[],"bankAccounts":[]}',
  "Use empty lists when nothing is present. Copy values exactly as written."
].join("\n");

const MAX_VALUES_PER_FIELD = 3;
const MAX_KEYWORDS = 8;

function dedupeKey(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Ordered union: keeps first-seen spelling, drops blanks and case/whitespace duplicates.
 * Values past `limit` are dropped, so the earliest findings win.
 */
export function uniqueMerge(base: readonly string[], next: readonly string[], limit = Infinity): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of [...base, ...next]) {
    const value = raw.trim();
    const key = dedupeKey(value);
    if (!key || seen.has(key)) continue;
    if (out.length >= limit) break;
    seen.add(key);
    out.push(value);
  }
  return out;
}

export function mergeIntelligence(
  existing: ExtractedIntelligence,
  incoming: ExtractedIntelligence
): ExtractedIntelligence {
  return {
    bankAccounts: uniqueMerge(existing.bankAccounts, incoming.bankAccounts, MAX_VALUES_PER_FIELD),
    upiIds: uniqueMerge(existing.upiIds, incoming.upiIds, MAX_VALUES_PER_FIELD),
    phishingLinks: uniqueMerge(existing.phishingLinks, incoming.phishingLinks, MAX_VALUES_PER_FIELD),
    phoneNumbers: uniqueMerge(existing.phoneNumbers, incoming.phoneNumbers, MAX_VALUES_PER_FIELD),
    suspiciousKeywords: uniqueMerge(existing.suspiciousKeywords, incoming.suspiciousKeywords, MAX_KEYWORDS)
  };
}

export function countHighValue(intel: ExtractedIntelligence): number {
  return HIGH_VALUE_FIELDS.reduce((total, field) => total + intel[field].length, 0);
}

/** Number of non-keyword fields holding at least one value. */
export function populatedHighValueFields(intel: ExtractedIntelligence): number {
  return HIGH_VALUE_FIELDS.filter((field) => intel[field].length > 0).length;
}

export type ExtractorOptions = {
  rules: Pick<Rules, "suspiciousKeywords" | "emailDomains" | "bankContextWords" | "injectionPatterns">;
  sufficiencyThreshold: number;
  llm?: LlmClient | null;
};

export class IntelligenceExtractor {
  readonly patterns: FieldPatterns;
  private readonly keywords: CompiledTerm[];
  private readonly injection: CompiledTerm[];

  constructor(private readonly options: ExtractorOptions) {
    this.patterns = new FieldPatterns(options.rules);
    this.keywords = compileLexicon(options.rules.suspiciousKeywords);
    this.injection = compileLexicon(options.rules.injectionPatterns);
  }

  extractPrimary(text: string): ExtractedIntelligence {
    return {
      bankAccounts: uniqueMerge([], this.patterns.bankAccounts(text)),
      upiIds: uniqueMerge([], this.patterns.upiIds(text)),
      phishingLinks: uniqueMerge([], this.patterns.links(text)),
      phoneNumbers: uniqueMerge([], this.patterns.phoneNumbers(text)),
      suspiciousKeywords: matchLexicon(text, this.keywords)
    };
  }

  /** Model-proposed values, kept only when they pass the primary format checks. */
  private async extractSecondary(text: string, history: readonly Message[]): Promise<ExtractedIntelligence> {
    const llm = this.options.llm;
    if (!llm) return emptyIntelligence();

    const recent = history
      .slice(-3)
      .map((m) => guardPromptText(m.text, this.injection))
      .join(" | ");
    const user = [
      `Message to analyze: ${guardPromptText(text, this.injection)}`,
      recent ? `Recent context: ${recent}` : ""
    ]
      .filter(Boolean)
      .join("\n\n");

    let raw: string;
    try {
      raw = await llm.complete({ system: EXTRACT_SYSTEM_PROMPT, user, temperature: 0, maxOutputTokens: 200 });
    } catch (err) {
      log.warn("EXTRACT", `secondary extraction skipped: ${errorMessage(err)}`);
      return emptyIntelligence();
    }

    const parsed = extractJson(raw);
    if (!parsed) return emptyIntelligence();

    const accepted = emptyIntelligence();
    let rejected = 0;
    for (const field of HIGH_VALUE_FIELDS) {
      for (const candidate of stringArray(parsed[field])) {
        const valid = this.patterns.validate(field, candidate, text);
        if (valid) accepted[field].push(valid);
        else rejected += 1;
      }
    }
    if (rejected > 0) log.debug("EXTRACT", `dropped ${rejected} model candidates failing format checks`);
    return accepted;
  }

  async extract(
    text: string,
    existing: ExtractedIntelligence,
    history: readonly Message[] = []
  ): Promise<ExtractedIntelligence> {
    const primary = this.extractPrimary(text);
    let merged = mergeIntelligence(existing, primary);
    if (countHighValue(primary) < this.options.sufficiencyThreshold) {
      merged = mergeIntelligence(merged, await this.extractSecondary(text, history));
    }
    return merged;
  }
}
