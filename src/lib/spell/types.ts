export interface SpellChecker {
  /** Return true if `word` is spelled correctly, or is not a word worth checking. */
  isCorrect(word: string): boolean;
  /** Optional suggestions for UI, most probable first. */
  suggestions?(word: string, max?: number): string[];
}

export interface Misspelling {
  word: string;
  offset: number;     // 0-based char start in the checked text
  length: number;
  correction: string | null;  // null: nothing known within reach
  candidates: string[];
}
