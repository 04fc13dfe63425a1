/**
 * Fractional Kelly for a binary outcome, scaled by signal confidence.
 * `edgePct` is in percentage points; the sign is ignored.
 */
export function kellyFraction(confidence: number, edgePct: number, fraction: number): number {
  if (!Number.isFinite(confidence) || !Number.isFinite(edgePct)) return 0;
  const c = Math.min(1, Math.max(0, confidence));
  return (Math.abs(edgePct) / 100) * c * fraction;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Floor to whole cents. */
export function floorCents(usd: number): number {
  return Math.floor(usd * 100 + 1e-9) / 100;
}
