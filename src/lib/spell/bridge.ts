import { getSpellConfig } from "./config";
import type { SpellCorrector } from "./corrector";
import { createSpellCorrector } from "./create-corrector";

let current: Promise<SpellCorrector> | null = null;

/** Replaces the process-wide corrector (tests, or a caller with its own vocabulary). */
export function setSharedCorrector(corrector: SpellCorrector | null) {
  current = corrector ? Promise.resolve(corrector) : null;
}

/** The process-wide corrector, built from the environment on first use. */
export function getSharedCorrector(): Promise<SpellCorrector> {
  if (!current) {
    const config = getSpellConfig();
    const pending = createSpellCorrector({
      language: config.languages,
      localDictionary: config.dictionaryPath,
      dictionaryDir: config.dictionaryDir,
      distance: config.distance,
      caseSensitive: config.caseSensitive,
      longWordCeiling: config.longWordCeiling,
    });
    // a failed load is retried on the next call instead of being cached
    void pending.catch(() => {
      if (current === pending) current = null;
    });
    current = pending;
  }
  return current;
}
