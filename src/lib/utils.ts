export function formatPercentage(value: number, decimals: number = 2): string {
  return `${(value * 100).toFixed(decimals)}%`;
}

/**
 * Percentage points with an explicit sign, e.g. +4.7pp
 */
export function formatPercentagePoints(value: number, decimals: number = 1): string {
  const points = value * 100;
  return `${points >= 0 ? '+' : ''}${points.toFixed(decimals)}pp`;
}

export function formatSignedPercentage(value: number, decimals: number = 1): string {
  const percent = value * 100;
  return `${percent >= 0 ? '+' : ''}${percent.toFixed(decimals)}%`;
}

export function formatDecimalOdds(odds: number): string {
  return `$${odds.toFixed(2)}`;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
