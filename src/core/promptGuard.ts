import { CompiledTerm, matchLexicon } from "./lexicon";

const PLACEHOLDER = "[message withheld: contained instructions aimed at the assistant]";
const MAX_PROMPT_TEXT = 600;

export function hasInjection(text: string, lexicon: readonly CompiledTerm[]): boolean {
  return matchLexicon(text, lexicon).length > 0;
}

/** Text that is safe to interpolate into a model prompt. Rule engines keep using the raw text. */
export function guardPromptText(text: string, lexicon: readonly CompiledTerm[]): string {
  if (hasInjection(text, lexicon)) return PLACEHOLDER;
  const flat = text.replace(/[\r\n]+/g, " ").trim();
  return flat.length > MAX_PROMPT_TEXT ? flat.slice(0, MAX_PROMPT_TEXT) : flat;
}
