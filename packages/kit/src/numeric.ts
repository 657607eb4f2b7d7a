export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Half-away-from-zero rounding to a fixed number of decimals. */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = Math.abs(value) * factor;
  // nudge by one ulp so 1.005 * 100 = 100.49999... still rounds up
  const rounded = Math.round(scaled + Number.EPSILON * scaled) / factor;
  return value < 0 ? -rounded : rounded;
}
