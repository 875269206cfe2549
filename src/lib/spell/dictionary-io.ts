import { readFile, writeFile } from "node:fs/promises";
import { gunzipSync, gzipSync } from "node:zlib";
import type { Tokenizer } from "@/lib/types";
import { dlog } from "@/lib/utils";
import { DictionaryFormatError, assertCount } from "./errors";
import type { WordCounts, WordFrequency } from "./word-frequency";

const isGzipPath = (path: string) => path.toLowerCase().endsWith(".gz");

/** Reads a text file, gunzipping it when the name ends in `.gz`. */
export async function readTextFile(path: string, encoding: BufferEncoding = "utf-8"): Promise<string> {
  const buf = await readFile(path);
  return (isGzipPath(path) ? gunzipSync(buf) : buf).toString(encoding);
}

/**
 * Parses a word-frequency JSON object. Keys must be strings and values
 * positive integers; a bad count raises `InvalidCountError`.
 */
export function parseWordCounts(json: string, source = "input"): Map<string, number> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DictionaryFormatError(source, reason);
  }
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw new DictionaryFormatError(source, "expected an object of word counts");
  }

  const out = new Map<string, number>();
  for (const [word, count] of Object.entries(data)) {
    assertCount(count, word);
    out.set(word, count);
  }
  return out;
}

export async function loadDictionaryFile(
  wordFrequency: WordFrequency,
  path: string,
  encoding: BufferEncoding = "utf-8",
): Promise<void> {
  const counts = parseWordCounts(await readTextFile(path, encoding), path);
  wordFrequency.addMany(counts);
  dlog("[spell] loaded dictionary", path, { words: counts.size, total: wordFrequency.totalWords });
}

/** Builds frequencies from a plain-text corpus file. */
export async function loadTextFile(
  wordFrequency: WordFrequency,
  path: string,
  tokenizer?: Tokenizer,
  encoding: BufferEncoding = "utf-8",
): Promise<void> {
  wordFrequency.loadText(await readTextFile(path, encoding), tokenizer);
}

export function serializeWordCounts(counts: WordCounts): string {
  return JSON.stringify(counts);
}

export interface ExportOptions {
  gzipped?: boolean;
  encoding?: BufferEncoding;
}

/** Writes the store in the same shape `loadDictionaryFile` reads. Gzipped unless told otherwise. */
export async function exportDictionaryFile(
  wordFrequency: WordFrequency,
  path: string,
  { gzipped = true, encoding = "utf-8" }: ExportOptions = {},
): Promise<void> {
  const data = Buffer.from(serializeWordCounts(wordFrequency.export()), encoding);
  await writeFile(path, gzipped ? gzipSync(data) : data);
}
