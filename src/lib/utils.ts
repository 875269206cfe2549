export const DEBUG =
  // env switch, e.g. SPELL_DEBUG=1 npm run dev
  process.env.SPELL_DEBUG === "1";

export function dlog(...args: unknown[]) {
  if (DEBUG) console.log(...args);
}
export function dgroup(label: string, fn: () => void) {
  if (!DEBUG) return;
  console.group(label);
  try { fn(); } finally { console.groupEnd(); }
}
export function dtable(label: string, rows: unknown[]) {
  if (DEBUG) {
    console.log(label);
    console.table(rows);
  }
}
