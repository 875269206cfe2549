import { splitWords } from "@/lib/tokenize";
import type { Tokenizer } from "@/lib/types";
import { assertCount } from "./errors";
import { charLength } from "./edits";

/** Word → count, in the shape the dictionary loader reads and `export()` writes. */
export type WordCounts = Record<string, number>;

export interface WordFrequencyOptions {
  /** Keep words as written instead of lower-casing them. */
  caseSensitive?: boolean;
  /** Counts strictly below this are purged by `compact()`. */
  threshold?: number;
}

/**
 * Word-frequency store backing the corrector. Counts only ever hold positive
 * integers and `totalWords` always equals their sum.
 */
export class WordFrequency {
  readonly caseSensitive: boolean;
  readonly threshold: number | null;

  private readonly counts = new Map<string, number>();
  private readonly seenLetters = new Set<string>();
  private total = 0;
  private longest = 0;
  private longestStale = false;

  constructor(options: WordFrequencyOptions = {}) {
    this.caseSensitive = options.caseSensitive ?? false;
    if (options.threshold !== undefined) assertCount(options.threshold);
    this.threshold = options.threshold ?? null;
  }

  normalize(word: string): string {
    return this.caseSensitive ? word : word.toLowerCase();
  }

  /** Sum of all counts. */
  get totalWords(): number {
    return this.total;
  }

  /** Number of distinct words. */
  get size(): number {
    return this.counts.size;
  }

  /** Every character seen in an added word; removals leave it untouched. */
  get letters(): ReadonlySet<string> {
    return this.seenLetters;
  }

  get longestWordLength(): number {
    if (this.longestStale) {
      this.longest = 0;
      for (const word of this.counts.keys()) this.longest = Math.max(this.longest, charLength(word));
      this.longestStale = false;
    }
    return this.longest;
  }

  query(word: string): number {
    return this.counts.get(this.normalize(word)) ?? 0;
  }

  contains(word: string): boolean {
    return this.query(word) > 0;
  }

  add(word: string, count: number = 1): void {
    assertCount(count, word);
    this.increment(this.normalize(word), count);
  }

  /**
   * Adds a list of words (one occurrence each) or a word → count mapping.
   * A mapping is validated as a whole before anything is added.
   */
  addMany(words: Iterable<string> | WordCounts | Map<string, number>): void {
    if (typeof words === "string") {
      this.add(words);
      return;
    }
    if (words instanceof Map) {
      this.addCounts(Array.from(words));
      return;
    }
    if (isIterable(words)) {
      for (const word of words) this.increment(this.normalize(word), 1);
      return;
    }
    this.addCounts(Object.entries(words));
  }

  /** Corpus ingestion: repeated words accumulate one count per appearance. */
  loadWords(words: Iterable<string>): void {
    for (const word of words) this.increment(this.normalize(word), 1);
  }

  loadText(text: string, tokenizer: Tokenizer = splitWords): void {
    this.loadWords(tokenizer(text));
  }

  /** Deletes the whole entry. Absent words are ignored. */
  remove(word: string): void {
    this.delete(this.normalize(word));
  }

  removeMany(words: Iterable<string>): void {
    for (const word of words) this.remove(word);
  }

  /** Removes every word whose count is strictly below `minCount`; returns how many went. */
  removeByThreshold(minCount: number): number {
    assertCount(minCount);
    let removed = 0;
    for (const [word, count] of this.counts) {
      if (count < minCount) {
        this.delete(word);
        removed += 1;
      }
    }
    return removed;
  }

  /** `removeByThreshold` with the configured threshold, if any. */
  compact(): number {
    return this.threshold === null ? 0 : this.removeByThreshold(this.threshold);
  }

  pop(word: string): number | undefined;
  pop<T>(word: string, fallback: T): number | T;
  pop<T>(word: string, fallback?: T): number | T | undefined {
    const key = this.normalize(word);
    const count = this.counts.get(key);
    if (count === undefined) return fallback;
    this.delete(key);
    return count;
  }

  wordUsageFrequency(word: string): number {
    return this.total > 0 ? this.query(word) / this.total : 0;
  }

  *uniqueWords(): IterableIterator<string> {
    yield* this.counts.keys();
  }

  keys(): IterableIterator<string> {
    return this.uniqueWords();
  }

  words(): IterableIterator<string> {
    return this.uniqueWords();
  }

  *items(): IterableIterator<[string, number]> {
    yield* this.counts.entries();
  }

  /** Snapshot with sorted keys, ready for `JSON.stringify` and reloading. */
  export(): WordCounts {
    const keys = Array.from(this.counts.keys()).sort();
    // fromEntries defines own properties, so a "__proto__" word survives
    return Object.fromEntries(keys.map((key): [string, number] => [key, this.counts.get(key) ?? 0]));
  }

  private addCounts(entries: Array<[string, unknown]>): void {
    const checked: Array<[string, number]> = [];
    for (const [word, count] of entries) {
      assertCount(count, word);
      checked.push([this.normalize(word), count]);
    }
    for (const [word, count] of checked) this.increment(word, count);
  }

  private increment(word: string, count: number): void {
    this.counts.set(word, (this.counts.get(word) ?? 0) + count);
    this.total += count;
    let length = 0;
    for (const ch of word) {
      this.seenLetters.add(ch);
      length += 1;
    }
    if (!this.longestStale && length > this.longest) this.longest = length;
  }

  private delete(word: string): void {
    const count = this.counts.get(word);
    if (count === undefined) return;
    this.counts.delete(word);
    this.total -= count;
    if (charLength(word) >= this.longest) this.longestStale = true;
  }
}

function isIterable(value: object): value is Iterable<string> {
  return Symbol.iterator in value;
}
