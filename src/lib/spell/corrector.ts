import { splitWords } from "@/lib/tokenize";
import type { Tokenizer } from "@/lib/types";
import { DEBUG, dlog, dtable } from "@/lib/utils";
import { exportDictionaryFile, type ExportOptions } from "./dictionary-io";
import {
  DEFAULT_LONG_WORD_CEILING,
  edits1,
  edits2,
  charLength,
  exceedsLongWordCeiling,
  knownEditsOf,
} from "./edits";
import type { WordFrequency } from "./word-frequency";

export type EditDistance = 1 | 2;

export interface SpellCorrectorOptions {
  /** Maximum edit distance searched; anything but 1 or 2 falls back to 2. */
  distance?: number;
  /** Letters used for replacements and insertions. Defaults to the vocabulary's letters. */
  alphabet?: Iterable<string>;
  tokenizer?: Tokenizer;
  /** Words longer than this only get a distance-1 search. */
  longWordCeiling?: number;
}

export function toEditDistance(value: unknown): EditDistance {
  return value === 1 ? 1 : 2;
}

/**
 * Frequency-ranked spelling correction over a shared `WordFrequency`.
 *
 * The store is held by reference: words added to or removed from it show up
 * in the next query. `null` from `candidates`/`correction` means no known word
 * is in reach, which is different from the word already being correct.
 */
export class SpellCorrector {
  readonly wordFrequency: WordFrequency;
  readonly tokenizer: Tokenizer;
  readonly longWordCeiling: number;

  private readonly fixedAlphabet: string[] | null;
  private maxDistance: EditDistance;

  constructor(wordFrequency: WordFrequency, options: SpellCorrectorOptions = {}) {
    this.wordFrequency = wordFrequency;
    this.tokenizer = options.tokenizer ?? splitWords;
    this.longWordCeiling = options.longWordCeiling ?? DEFAULT_LONG_WORD_CEILING;
    // letters go through the store's case policy so edits stay vocabulary keys
    this.fixedAlphabet = options.alphabet
      ? Array.from(new Set(Array.from(options.alphabet, l => wordFrequency.normalize(l))))
      : null;
    this.maxDistance = toEditDistance(options.distance ?? 2);
  }

  get distance(): EditDistance {
    return this.maxDistance;
  }

  set distance(value: number) {
    const next = toEditDistance(value);
    if (next !== value) dlog("[spell] invalid distance, using 2:", value);
    this.maxDistance = next;
  }

  get alphabet(): readonly string[] {
    return this.fixedAlphabet ?? Array.from(this.wordFrequency.letters);
  }

  contains(word: string): boolean {
    return this.wordFrequency.contains(word);
  }

  count(word: string): number {
    return this.wordFrequency.query(word);
  }

  splitWords(text: string): string[] {
    return Array.from(this.tokenizer(text));
  }

  /** The normalized members of `words` found in the vocabulary. */
  known(words: Iterable<string>): Set<string> {
    const out = new Set<string>();
    for (const word of words) {
      const key = this.wordFrequency.normalize(word);
      if (this.wordFrequency.contains(key)) out.add(key);
    }
    return out;
  }

  /** The normalized members of `words` missing from the vocabulary. */
  unknown(words: Iterable<string>): Set<string> {
    const out = new Set<string>();
    for (const word of words) {
      const key = this.wordFrequency.normalize(word);
      if (!this.wordFrequency.contains(key)) out.add(key);
    }
    return out;
  }

  editDistance1(word: string): Set<string> {
    return edits1(this.wordFrequency.normalize(word), this.alphabet);
  }

  editDistance2(word: string): Set<string> {
    return edits2(this.wordFrequency.normalize(word), this.alphabet);
  }

  /**
   * Known words within the configured distance, or `null` when there are none.
   * A known word yields just itself. Under distance 2 the one-edit matches are
   * always part of the result alongside the two-edit ones.
   */
  candidates(word: string): Set<string> | null {
    const target = this.wordFrequency.normalize(word);
    if (this.wordFrequency.contains(target)) return new Set([target]);

    // each edit changes the length by at most one
    if (charLength(target) > this.wordFrequency.longestWordLength + this.maxDistance) return null;

    const letters = this.alphabet;
    const isKnown = (w: string) => this.wordFrequency.contains(w);
    const oneEdit = edits1(target, letters);
    const found = new Set<string>();
    for (const edit of oneEdit) {
      if (isKnown(edit)) found.add(edit);
    }

    if (this.maxDistance === 2) {
      if (exceedsLongWordCeiling(target, this.longWordCeiling)) {
        dlog("[spell] skipping distance 2 for long word:", target);
      } else {
        for (const edit of knownEditsOf(oneEdit, letters, isKnown)) found.add(edit);
      }
    }

    return found.size > 0 ? found : null;
  }

  /** Candidates ordered by frequency, most frequent first; ties sort alphabetically. */
  rankedCandidates(word: string): string[] | null {
    const found = this.candidates(word);
    if (!found) return null;
    const ranked = Array.from(found).sort((a, b) => {
      const diff = this.wordFrequency.query(b) - this.wordFrequency.query(a);
      if (diff !== 0) return diff;
      return a < b ? -1 : a > b ? 1 : 0;
    });
    if (DEBUG) {
      dtable(`[spell] candidates for "${word}"`, ranked.map(w => ({ word: w, count: this.wordFrequency.query(w) })));
    }
    return ranked;
  }

  /** The most probable spelling of `word`, or `null` when nothing is in reach. */
  correction(word: string): string | null {
    return this.rankedCandidates(word)?.[0] ?? null;
  }

  wordProbability(word: string, totalWords?: number): number {
    const total = totalWords ?? this.wordFrequency.totalWords;
    return total > 0 ? this.wordFrequency.query(word) / total : 0;
  }

  /** Saves the vocabulary for a later `createSpellCorrector({ localDictionary })`. */
  exportDictionary(path: string, options?: ExportOptions): Promise<void> {
    return exportDictionaryFile(this.wordFrequency, path, options);
  }
}
