import { normalizeApostrophes as normalize, shouldCheck } from "./check-text";
import type { SpellCorrector } from "./corrector";
import type { SpellChecker } from "./types";

/** Exposes a corrector through the plain `SpellChecker` interface. */
export function createFrequencySpellChecker(corrector: SpellCorrector): SpellChecker {
  return {
    isCorrect(word: string) {
      const w = normalize(word);
      return !shouldCheck(w) || corrector.contains(w);
    },
    suggestions(word: string, max = 5) {
      const ranked = corrector.rankedCandidates(normalize(word)) ?? [];
      return ranked.slice(0, max);
    },
  };
}
