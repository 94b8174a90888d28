import type { HighValueField } from "../utils/types";
import { CompiledTerm, compileLexicon, normalizeText } from "./lexicon";

const upiRegex = /(?<![a-zA-Z0-9._-])([a-zA-Z0-9._-]{2,256})@([a-zA-Z][a-zA-Z0-9]{1,63})(?![a-zA-Z0-9@])(?!\.[a-zA-Z])/g;
const urlRegex = /\b(?:https?:\/\/|www\.)[^\s<>"']+/gi;
const phoneRegex = /(?<![\d+])(?:\+91[\s-]?)?([6-9]\d{9})(?!\d)/g;
const digitRunRegex = /(?<!\d)\d{9,18}(?!\d)/g;
const trailingPunctuation = /[.,;:!?)\]}'"]+$/;
const CONTEXT_WINDOW = 40;

export type PatternOptions = {
  emailDomains: readonly string[];
  bankContextWords: readonly string[];
};

function isPhoneShaped(digits: string): boolean {
  if (digits.length === 10) return /^[6-9]/.test(digits);
  if (digits.length === 12) return /^91[6-9]/.test(digits);
  return false;
}

export function normalizeUrl(url: string): string {
  return url.trim().replace(trailingPunctuation, "");
}

/**
 * Field matchers shared by the extractor (primary pass and candidate validation)
 * and the classifier (payment identifier / link detection).
 */
export class FieldPatterns {
  private readonly emailDomains: Set<string>;
  private readonly context: CompiledTerm[];

  constructor(options: PatternOptions) {
    this.emailDomains = new Set(options.emailDomains.map((d) => d.toLowerCase()));
    this.context = compileLexicon(options.bankContextWords);
  }

  upiIds(text: string): string[] {
    const found: string[] = [];
    for (const match of text.matchAll(upiRegex)) {
      const handle = match[2].toLowerCase();
      if (this.emailDomains.has(handle)) continue;
      found.push(match[0]);
    }
    return found;
  }

  links(text: string): string[] {
    const found: string[] = [];
    for (const match of text.matchAll(urlRegex)) {
      const url = normalizeUrl(match[0]);
      if (/^(?:https?:\/\/[^\s/]+|www\.[^\s/]+\.[a-z]+)/i.test(url)) {
        found.push(url);
      }
    }
    return found;
  }

  phoneNumbers(text: string): string[] {
    return Array.from(text.matchAll(phoneRegex), (match) => match[1]);
  }

  bankAccounts(text: string): string[] {
    const found: string[] = [];
    for (const match of text.matchAll(digitRunRegex)) {
      const digits = match[0];
      const start = match.index ?? 0;
      if (isPhoneShaped(digits)) continue;
      if (text.slice(Math.max(0, start - 3), start).includes("+")) continue;
      const before = normalizeText(text.slice(Math.max(0, start - CONTEXT_WINDOW), start));
      if (!this.context.some((entry) => entry.pattern.test(before))) continue;
      found.push(digits);
    }
    return found;
  }

  /**
   * Checks a value proposed by a secondary source against the primary format of its field.
   * Returns the canonical form, or null when the value must be discarded.
   * Digit fields must also occur in `sourceText`; bank accounts only where the primary
   * pass would accept them there, with account context before the number.
   */
  validate(field: HighValueField, candidate: string, sourceText: string): string | null {
    const value = candidate.trim();
    if (!value) return null;
    switch (field) {
      case "upiIds": {
        const found = this.upiIds(value);
        return found.length === 1 && found[0] === value ? value : null;
      }
      case "phishingLinks": {
        const found = this.links(value);
        return found.length === 1 && found[0] === normalizeUrl(value) ? found[0] : null;
      }
      case "phoneNumbers": {
        const compact = value.replace(/[\s-]/g, "");
        const found = this.phoneNumbers(compact);
        if (found.length !== 1 || !/^(?:\+91)?[6-9]\d{9}$/.test(compact)) return null;
        return sourceText.replace(/[\s-]/g, "").includes(found[0]) ? found[0] : null;
      }
      case "bankAccounts": {
        const digits = value.replace(/[\s-]/g, "");
        if (!/^\d{9,18}$/.test(digits) || isPhoneShaped(digits)) return null;
        return this.bankAccounts(sourceText).includes(digits) ? digits : null;
      }
    }
  }
}
