/**
 * Edit-distance candidate generation over an explicit alphabet.
 * Words are handled as code points so accented letters are never split.
 */

/** Words longer than this skip the distance-2 search. */
export const DEFAULT_LONG_WORD_CEILING = 20;

export function charLength(word: string): number {
  return Array.from(word).length;
}

export function exceedsLongWordCeiling(word: string, ceiling = DEFAULT_LONG_WORD_CEILING): boolean {
  return charLength(word) > ceiling;
}

/**
 * Calls `visit` for every string one edit away from `word`:
 * deletions, adjacent transpositions, replacements and insertions.
 * The same string may be visited more than once.
 */
export function forEachEdit(word: string, alphabet: readonly string[], visit: (edit: string) => void): void {
  const chars = Array.from(word);
  const n = chars.length;
  const left = (i: number) => chars.slice(0, i).join("");
  const right = (i: number) => chars.slice(i).join("");

  for (let i = 0; i <= n; i++) {
    const head = left(i);

    // Insertions (add one letter at each position, ends included)
    const tail = right(i);
    for (const letter of alphabet) visit(head + letter + tail);

    if (i === n) break;
    const rest = right(i + 1);

    // Deletions
    visit(head + rest);

    // Replacements
    for (const letter of alphabet) {
      if (letter !== chars[i]) visit(head + letter + rest);
    }

    // Transpositions (swap adjacent characters)
    if (i < n - 1) visit(head + chars[i + 1] + chars[i] + right(i + 2));
  }
}

/** All strings exactly one edit away from `word`. */
export function edits1(word: string, alphabet: Iterable<string>): Set<string> {
  const edits = new Set<string>();
  forEachEdit(word, toLetters(alphabet), edit => edits.add(edit));
  return edits;
}

/**
 * All strings within two edits of `word` (one-edit strings included).
 * For long words this easily reaches tens of thousands of entries; prefer
 * `knownEdits2` when only dictionary words are wanted.
 */
export function edits2(word: string, alphabet: Iterable<string>): Set<string> {
  const letters = toLetters(alphabet);
  const edits = new Set<string>();
  for (const first of edits1(word, letters)) {
    forEachEdit(first, letters, edit => edits.add(edit));
  }
  return edits;
}

/**
 * Known strings one edit away from any of `words`. Filtering happens while
 * generating, so the expanded set is never held in memory.
 */
export function knownEditsOf(
  words: Iterable<string>,
  alphabet: Iterable<string>,
  isKnown: (word: string) => boolean,
): Set<string> {
  const letters = toLetters(alphabet);
  const found = new Set<string>();
  for (const word of words) {
    forEachEdit(word, letters, edit => {
      if (!found.has(edit) && isKnown(edit)) found.add(edit);
    });
  }
  return found;
}

/** Known strings within two edits of `word`. Same result as filtering `edits2`. */
export function knownEdits2(
  word: string,
  alphabet: Iterable<string>,
  isKnown: (word: string) => boolean,
): Set<string> {
  const letters = toLetters(alphabet);
  return knownEditsOf(edits1(word, letters), letters, isKnown);
}

function toLetters(alphabet: Iterable<string>): string[] {
  return Array.from(new Set(alphabet)).filter(letter => letter !== "");
}
