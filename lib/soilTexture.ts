export type Percent = number | null;

/**
 * Simplified USDA texture triangle.
 * Clay is consulted first; a rule that needs a missing percentage yields "Unknown".
 */
export function determineTexture(clay: Percent, sand: Percent, silt: Percent): string {
  if (clay === null) return 'Unknown';
  if (clay >= 40) return 'Clay';

  if (clay >= 20) {
    if (sand === null) return 'Unknown';
    if (clay >= 27) return sand > 45 ? 'Sandy Clay' : 'Clay Loam';
    return sand > 45 ? 'Sandy Clay Loam' : 'Loam';
  }

  if (sand === null) return 'Unknown';
  if (sand >= 70) return clay >= 15 ? 'Sandy Clay Loam' : 'Sandy Loam';

  if (silt === null) return 'Unknown';
  if (silt >= 50) return clay < 12 ? 'Silt Loam' : 'Silty Clay Loam';

  return 'Loam';
}

/** Survey values arrive as strings, numbers or "None". */
export function toPercent(value: unknown): Percent {
  if (value === null || value === undefined || value === '' || value === 'None') return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export const roundOne = (value: Percent): Percent =>
  value === null ? null : Math.round(value * 10) / 10;
