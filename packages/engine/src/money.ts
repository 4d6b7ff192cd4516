// packages/engine/src/money.ts

export const roundToCents = (value: number): number => Math.round(value * 100) / 100;

/**
 * Converts an annual percentage rate to the nominal monthly rate (APR / 12).
 */
export const monthlyRateFromAnnual = (annualPercent: number): number => annualPercent / 100 / 12;
