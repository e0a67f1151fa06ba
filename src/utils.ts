// Shared numeric helpers used by the extraction, fusion, temporal and decision stages.

/** Round to a fixed number of decimal places (default 4). */
export function roundTo(value: number, decimals = 4): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/**
 * Maximum score among `keys` (case-insensitive key match), clamped to [0, 1].
 * Missing keys and non-finite values count as 0.
 */
export function maxOfKeys(scores: Record<string, number>, keys: readonly string[]): number {
  const wanted = new Set(keys.map((k) => k.toLowerCase()));
  let max = 0;
  for (const [key, value] of Object.entries(scores)) {
    if (wanted.has(key.toLowerCase()) && Number.isFinite(value) && value > max) {
      max = value;
    }
  }
  return clamp01(max);
}
