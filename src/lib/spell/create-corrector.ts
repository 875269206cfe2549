import { dgroup, dlog } from "@/lib/utils";
import { SpellCorrector, type SpellCorrectorOptions } from "./corrector";
import { loadDictionaryFile } from "./dictionary-io";
import { BUNDLED_DICTIONARY_DIR, normalizeLanguages, resolveLanguageDictionary } from "./languages";
import { WordFrequency, type WordFrequencyOptions } from "./word-frequency";

export interface CreateSpellCorrectorOptions extends SpellCorrectorOptions, WordFrequencyOptions {
  /**
   * Bundled language(s) to load; several are merged into one store.
   * `null` or an empty list starts from an empty vocabulary.
   */
  language?: string | readonly string[] | null;
  /** A local word-frequency file; when given no language is loaded. */
  localDictionary?: string | null;
  /** Where `<lang>.json[.gz]` files are looked up. */
  dictionaryDir?: string | null;
}

/**
 * Builds a corrector over a freshly loaded vocabulary.
 *
 * Example:
 *   const spell = await createSpellCorrector({ language: ["en", "es"] });
 *   spell.correction("speling");
 */
export async function createSpellCorrector(options: CreateSpellCorrectorOptions = {}): Promise<SpellCorrector> {
  const wordFrequency = new WordFrequency({
    caseSensitive: options.caseSensitive,
    threshold: options.threshold,
  });

  if (options.localDictionary) {
    await loadDictionaryFile(wordFrequency, options.localDictionary);
  } else {
    const languages = normalizeLanguages(options.language === undefined ? "en" : options.language);
    const dir = options.dictionaryDir ?? BUNDLED_DICTIONARY_DIR;
    // resolve everything first so a bad code fails before anything is read
    const paths = await Promise.all(languages.map(lang => resolveLanguageDictionary(lang, dir)));
    for (const path of paths) await loadDictionaryFile(wordFrequency, path);
  }

  const removed = wordFrequency.compact();
  dgroup("[spell] corrector ready", () => {
    dlog("words:", wordFrequency.size, "total:", wordFrequency.totalWords);
    dlog("letters:", Array.from(wordFrequency.letters).join(""));
    if (removed) dlog("purged below threshold:", removed);
  });

  return new SpellCorrector(wordFrequency, options);
}
