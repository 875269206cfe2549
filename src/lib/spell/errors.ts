export class InvalidCountError extends Error {
  readonly count: unknown;

  constructor(count: unknown, word?: string) {
    const target = word === undefined ? "" : ` for "${word}"`;
    super(`Invalid count${target}: expected a positive integer, got ${JSON.stringify(count) ?? String(count)}`);
    this.name = "InvalidCountError";
    this.count = count;
  }
}

export class UnknownLanguageError extends Error {
  readonly language: string;

  constructor(language: string) {
    super(`The provided dictionary language (${language}) does not exist!`);
    this.name = "UnknownLanguageError";
    this.language = language;
  }
}

export class DictionaryFormatError extends Error {
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Malformed dictionary ${source}: ${reason}`);
    this.name = "DictionaryFormatError";
    this.source = source;
  }
}

/** Throws `InvalidCountError` unless `count` is a positive integer. */
export function assertCount(count: unknown, word?: string): asserts count is number {
  if (typeof count !== "number" || !Number.isInteger(count) || count <= 0) {
    throw new InvalidCountError(count, word);
  }
}
