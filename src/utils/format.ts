/**
 * Number formatting shared by pattern notes and reports
 */

/**
 * Format a fraction as a percentage, e.g. 0.0512 -> "+5.12%"
 */
export function formatPercent(fraction: number, signed = true): string {
  const value = (fraction * 100).toFixed(2);
  return signed && fraction > 0 ? `+${value}%` : `${value}%`;
}

export function formatScore(score: number): string {
  return score.toFixed(2);
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
