// packages/engine/src/inflation.ts

/**
 * Expresses a nominal cost paid over `years` in today's money. Deflation
 * (a negative rate) raises the figure above nominal. Not rounded here.
 */
export function adjustForInflation(
  nominalCost: number,
  annualInflationRatePercent: number,
  years: number,
): number {
  return nominalCost / Math.pow(1 + annualInflationRatePercent / 100, years);
}
