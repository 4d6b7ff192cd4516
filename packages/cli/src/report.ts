// packages/cli/src/report.ts

import { computeBalance } from '@credit-terms/engine';
import type { LoanParameters, SweepResults, TermResult, TermResults } from '@credit-terms/engine';
import type { ParameterFile } from './input';

const fmt = (n: number) => n.toFixed(2);

const termLine = (years: number, data: TermResult) =>
  `${years} years: Monthly payment: ${fmt(data.monthlyPayment)}, Total cost: ${fmt(data.totalCost)}, Inflation-adjusted cost: ${fmt(data.totalCostAdjusted)}`;

export function formatParameters(file: ParameterFile): string[] {
  return Object.entries(file).map(([key, value]) =>
    `${key}: ${Array.isArray(value) ? `[${value.join(', ')}]` : String(value)}`);
}

/**
 * Plain schedule, followed for each affordable term by what the unused part of
 * the acceptable budget would grow to over that term.
 */
export function formatCreditResults(results: TermResults, params: LoanParameters): string[] {
  const { acceptableMonthlyPayment: budget, investmentRatePercent: investRate } = params;
  const lines = ['Credit calculations:'];
  for (const [years, data] of results) {
    lines.push(termLine(years, data));
    if (budget !== undefined && investRate !== undefined && budget >= data.monthlyPayment) {
      const balance = computeBalance(0, budget - data.monthlyPayment, investRate, years);
      lines.push(`  Investment account balance after ${years} years: ${fmt(balance)}`);
    }
  }
  return lines;
}

export function formatModeResults(title: string, results: TermResults): string[] {
  return [
    `${title}:`,
    ...[...results].map(([years, data]) => `${termLine(years, data)}, Investment balance: ${fmt(data.investmentBalance)}`),
  ];
}

export function formatSweep(sweep: SweepResults, params: LoanParameters): string[] {
  const lines = formatCreditResults(sweep.plain, params);
  if (sweep.overpayment) {
    lines.push('', ...formatModeResults('Credit with overpayment calculations', sweep.overpayment));
  }
  if (sweep.investment) {
    lines.push('', ...formatModeResults('Credit with investment calculations', sweep.investment));
  }
  return lines;
}
