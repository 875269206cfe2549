let warned = false;

export function warnIfInvalidDistance(raw: string | undefined) {
  if (warned || raw === undefined || raw.trim() === "") return;
  const value = Number(raw);
  if (value !== 1 && value !== 2) {
    warned = true;
    console.warn("[spell] SPELL_DISTANCE must be 1 or 2, falling back to 2:", raw);
  }
}

export function resetRuntimeWarnings() {
  warned = false;
}
