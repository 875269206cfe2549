import type { Token } from "./types";

/**
 * Deterministic tokenizer (manual scan) that yields WORD/PUNCT tokens.
 * - Letters from any script count, so accented dictionaries tokenize the same way
 * - Contractions/possessives stay as one WORD: don't, we're, Alex's, children’s
 * - Hyphens split words: dictionaries carry the parts, not the compound
 * - Numbers are WORD tokens; the checker decides later whether to skip them
 * - Spaces are skipped (we don't emit SPACE tokens)
 */
export function tokenize(text: string): Token[] {
  const out: Token[] = [];
  let idx = 0;
  const isLetter = (ch: string) => /\p{L}|\p{M}/u.test(ch);
  const isDigit  = (ch: string) => /\p{Nd}/u.test(ch);
  const isWordChar = (ch: string) => isLetter(ch) || isDigit(ch) || ch === "_";
  const isJoiner = (ch: string) => ch === "'" || ch === "’";

  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    const start = i;

    // Skip whitespace
    if (/\s/.test(ch)) { i += 1; continue; }

    if (isWordChar(ch)) {
      let j = i + 1;
      while (j < text.length) {
        const cj = text[j];
        if (isWordChar(cj)) { j += 1; continue; }
        // Permit an apostrophe followed by a word character (don't, o'clock)
        if (isJoiner(cj) && j + 1 < text.length && isWordChar(text[j + 1])) { j += 2; continue; }
        break;
      }
      out.push({ idx: idx++, raw: text.slice(i, j), type: "WORD", start: i, end: j });
      i = j;
      continue;
    }

    // Single-character punctuation fallback (surrogate pairs stay whole)
    const cp = text.codePointAt(i) ?? 0;
    const width = cp > 0xffff ? 2 : 1;
    out.push({ idx: idx++, raw: text.slice(i, i + width), type: "PUNCT", start, end: start + width });
    i += width;
  }

  return out;
}

/** The WORD tokens of `text`, in order. */
export function splitWords(text: string): string[] {
  return tokenize(text).filter(t => t.type === "WORD").map(t => t.raw);
}
