/**
 * Coerces a loosely-typed value (number, numeric string from a DECIMAL column, null)
 * to a finite number, or returns the fallback.
 */
export function finiteOr(value: unknown, fallback: number): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : fallback;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : fallback;
  }
  return fallback;
}
