// packages/engine/src/investment.ts

import { InvalidArgumentError } from './errors';
import { monthlyRateFromAnnual, roundToCents } from './money';

function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(name, `${name} cannot be negative (got ${value})`);
  }
}

/**
 * Future value of a lump sum plus an end-of-month contribution stream,
 * compounded monthly at the nominal annual rate. `years` may be fractional.
 */
export function computeBalance(
  initialAmount: number,
  monthlyContribution: number,
  annualRatePercent: number,
  years: number,
): number {
  requireNonNegative('initialAmount', initialAmount);
  requireNonNegative('monthlyContribution', monthlyContribution);
  requireNonNegative('annualRatePercent', annualRatePercent);
  if (!Number.isFinite(years) || years <= 0) {
    throw new InvalidArgumentError('years', `years must be positive (got ${years})`);
  }

  const r = monthlyRateFromAnnual(annualRatePercent);
  const months = years * 12;

  const lumpSum = initialAmount * Math.pow(1 + r, months);
  const stream = r === 0
    ? monthlyContribution * months
    : monthlyContribution * ((Math.pow(1 + r, months) - 1) / r);

  return roundToCents(lumpSum + stream);
}
