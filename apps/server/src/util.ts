/**
 * Optional non-negative integer query parameter.
 * Returns `fallback` when absent, null when present but not a valid count.
 */
export function parseCountParam(v: unknown, fallback: number): number | null {
  if (typeof v === "undefined") return fallback;
  const n = typeof v === "number" ? v : typeof v === "string" && v.trim() !== "" ? Number(v) : NaN;
  if (!Number.isFinite(n) || !Number.isInteger(n) || n < 0) return null;
  return n;
}
