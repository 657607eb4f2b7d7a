/**
 * Exponential backoff for loop retries: base * 2^(attempt-1), capped at maxMs.
 * Attempts below 1 are treated as the first attempt.
 */
export function backoffDelay(
  attempt: number,
  baseMs: number = 5000,
  maxMs: number = 60000,
): number {
  const n = Math.max(1, Math.floor(attempt));
  return Math.min(baseMs * Math.pow(2, n - 1), maxMs);
}
