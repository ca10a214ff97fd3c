export function parseNumber(v: unknown): number | undefined {
  if (v === undefined || v === "") return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}
/** Finite number clamped to [min, max]; undefined when absent or invalid. */
export function parseBounded(v: unknown, min: number, max: number): number | undefined {
  const n = parseNumber(v);
  return n === undefined ? undefined : Math.min(max, Math.max(min, n));
}
