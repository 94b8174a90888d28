export type CompiledTerm = {
  term: string;
  pattern: RegExp;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Terms match on lowercase text and only as whole words ("pin" does not hit "spinning"). */
export function compileLexicon(terms: readonly string[]): CompiledTerm[] {
  const seen = new Set<string>();
  const compiled: CompiledTerm[] = [];
  for (const raw of terms) {
    const term = raw.trim().toLowerCase();
    if (!term || seen.has(term)) continue;
    seen.add(term);
    compiled.push({ term, pattern: new RegExp(`(?<![a-z0-9])${escapeRegExp(term)}(?![a-z0-9])`) });
  }
  return compiled;
}

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

/** Lexicon terms present in `text`, in lexicon order. */
export function matchLexicon(text: string, lexicon: readonly CompiledTerm[]): string[] {
  const normalized = normalizeText(text);
  return lexicon.filter((entry) => entry.pattern.test(normalized)).map((entry) => entry.term);
}
