import { access } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { UnknownLanguageError } from "./errors";

/** Directory of the dictionaries that ship with the package, one `<lang>.json[.gz]` each. */
export const BUNDLED_DICTIONARY_DIR = fileURLToPath(new URL("../../data/dictionaries/", import.meta.url));

const EXTENSIONS = [".json.gz", ".json"] as const;

export function normalizeLanguages(language: string | readonly string[] | null | undefined): string[] {
  if (!language) return [];
  const list = typeof language === "string" ? language.split(",") : language;
  const out: string[] = [];
  for (const code of list) {
    const clean = code.trim().toLowerCase();
    if (clean && !out.includes(clean)) out.push(clean);
  }
  return out;
}

/** Path of the dictionary file for `language`, preferring the gzipped one. */
export async function resolveLanguageDictionary(language: string, dir = BUNDLED_DICTIONARY_DIR): Promise<string> {
  const code = language.trim().toLowerCase();
  // codes are file names; anything path-like is never a bundled language
  if (!/^[a-z]{2,3}(?:[-_][a-z0-9]{2,8})?$/.test(code)) throw new UnknownLanguageError(code);
  for (const ext of EXTENSIONS) {
    const path = join(dir, code + ext);
    try {
      await access(path);
      return path;
    } catch {
      continue;
    }
  }
  throw new UnknownLanguageError(code);
}
