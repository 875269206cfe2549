/**
 * Frequency-driven spelling correction.
 */

export { WordFrequency } from "./word-frequency";
export type { WordCounts, WordFrequencyOptions } from "./word-frequency";
export { SpellCorrector, toEditDistance } from "./corrector";
export type { EditDistance, SpellCorrectorOptions } from "./corrector";
export { createSpellCorrector } from "./create-corrector";
export type { CreateSpellCorrectorOptions } from "./create-corrector";
export {
  DEFAULT_LONG_WORD_CEILING,
  edits1,
  edits2,
  knownEdits2,
  knownEditsOf,
} from "./edits";
export {
  exportDictionaryFile,
  loadDictionaryFile,
  loadTextFile,
  parseWordCounts,
} from "./dictionary-io";
export { BUNDLED_DICTIONARY_DIR, resolveLanguageDictionary } from "./languages";
export { findMisspellings, shouldCheck } from "./check-text";
export { createFrequencySpellChecker } from "./frequency-adapter";
export { DictionaryFormatError, InvalidCountError, UnknownLanguageError } from "./errors";
export type { Misspelling, SpellChecker } from "./types";
