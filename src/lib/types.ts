export type Token = {
  idx: number;
  raw: string;      // word or single punctuation character
  type: "WORD" | "PUNCT";
  start: number;
  end: number;      // exclusive
};

/** Splits free text into word strings. */
export type Tokenizer = (text: string) => Iterable<string>;
