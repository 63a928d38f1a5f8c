export type TokenEstimator = (text: string) => number;

const CHARS_PER_TOKEN = 3;

/**
 * Character-based token approximation. Deterministic, monotonic in length and
 * sub-additive, so the sum of fragment estimates bounds the estimate of the
 * joined payload.
 */
export function estimateTokens(text?: string | null): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
