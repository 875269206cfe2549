import { tokenize } from "@/lib/tokenize";
import type { SpellCorrector } from "./corrector";
import type { Misspelling } from "./types";

const PUNCTUATION = new Set(Array.from("!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~"));

/** Curly apostrophes become straight ones, the form dictionaries store. */
export function normalizeApostrophes(word: string): string {
  return word.replace(/’/g, "'");
}

/** False for lone punctuation and for numbers (12, 3.5, -4, 1e3), which are never misspelled. */
export function shouldCheck(word: string): boolean {
  if (word.length === 1 && PUNCTUATION.has(word)) return false;
  if (word.trim() !== "" && Number.isFinite(Number(word))) return false;
  return true;
}

export interface FindMisspellingsOptions {
  maxSuggestions?: number;
}

/** Every checkable word of `text` missing from the vocabulary, with its ranked suggestions. */
export function findMisspellings(
  corrector: SpellCorrector,
  text: string,
  { maxSuggestions = 5 }: FindMisspellingsOptions = {},
): Misspelling[] {
  const out: Misspelling[] = [];
  for (const tok of tokenize(text)) {
    const word = normalizeApostrophes(tok.raw);
    if (tok.type !== "WORD" || !shouldCheck(word) || corrector.contains(word)) continue;
    const ranked = corrector.rankedCandidates(word);
    out.push({
      word: tok.raw,
      offset: tok.start,
      length: tok.end - tok.start,
      correction: ranked?.[0] ?? null,
      candidates: ranked ? ranked.slice(0, maxSuggestions) : [],
    });
  }
  return out;
}
