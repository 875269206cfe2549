import { warnIfInvalidDistance } from "@/lib/runtimeWarnings";
import { toEditDistance, type EditDistance } from "./corrector";
import { DEFAULT_LONG_WORD_CEILING } from "./edits";
import { normalizeLanguages } from "./languages";

export type SpellConfig = {
  languages: string[];
  dictionaryPath: string | null;
  dictionaryDir: string | null;
  distance: EditDistance;
  caseSensitive: boolean;
  longWordCeiling: number;
};

function readFlag(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

function readPositiveInt(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return value && Number.isInteger(n) && n > 0 ? n : fallback;
}

function readPath(value: string | undefined): string | null {
  return value && value.trim() ? value.trim() : null;
}

export function getSpellConfig(env: NodeJS.ProcessEnv = process.env): SpellConfig {
  warnIfInvalidDistance(env.SPELL_DISTANCE);
  return {
    languages: normalizeLanguages(env.SPELL_LANGUAGE ?? "en"),
    dictionaryPath: readPath(env.SPELL_DICTIONARY_PATH),
    dictionaryDir: readPath(env.SPELL_DICTIONARY_DIR),
    distance: toEditDistance(Number(env.SPELL_DISTANCE ?? 2)),
    caseSensitive: readFlag(env.SPELL_CASE_SENSITIVE),
    longWordCeiling: readPositiveInt(env.SPELL_LONG_WORD_CEILING, DEFAULT_LONG_WORD_CEILING),
  };
}
