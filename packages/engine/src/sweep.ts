// packages/engine/src/sweep.ts

import { computeOverpaymentTerm, computeStandardTerm } from './amortization';
import { InvalidArgumentError } from './errors';
import { adjustForInflation } from './inflation';
import { computeBalance } from './investment';
import { monthlyRateFromAnnual, roundToCents } from './money';
import type { LoanParameters, SweepResults, TermResult, TermResults } from './types';

export const TERM_YEARS = { first: 3, last: 30 } as const;

export const termYears = (): number[] =>
  Array.from({ length: TERM_YEARS.last - TERM_YEARS.first + 1 }, (_, i) => TERM_YEARS.first + i);

interface BudgetParameters {
  acceptablePayment: number;
  investmentRatePercent: number;
}

function requireBudget(params: LoanParameters): BudgetParameters {
  const { acceptableMonthlyPayment, investmentRatePercent } = params;
  if (acceptableMonthlyPayment === undefined) {
    throw new InvalidArgumentError('acceptableMonthlyPayment', 'An acceptable monthly payment is required for this mode');
  }
  if (investmentRatePercent === undefined) {
    throw new InvalidArgumentError('investmentRatePercent', 'An investment interest rate is required for this mode');
  }
  return { acceptablePayment: acceptableMonthlyPayment, investmentRatePercent };
}

function sweep(compute: (years: number) => TermResult): TermResults {
  const results = new Map<number, TermResult>();
  for (const years of termYears()) {
    results.set(years, Object.freeze(compute(years)));
  }
  return results;
}

// ---------- modes ----------
export function calculatePlainCredit(params: Readonly<LoanParameters>): TermResults {
  const r = monthlyRateFromAnnual(params.annualRatePercent);
  return sweep((years) => {
    const { monthlyPayment, totalCost } = computeStandardTerm(params.principal, r, years);
    return {
      monthlyPayment,
      totalCost,
      totalCostAdjusted: roundToCents(adjustForInflation(totalCost, params.inflationRatePercent, years)),
      investmentBalance: 0,
    };
  });
}

/**
 * Overpay up to the acceptable budget and reinvest it once the loan is cleared.
 * Costs are discounted over the nominal term, not the actual payoff time.
 */
export function calculateCreditWithOverpayment(params: Readonly<LoanParameters>): TermResults {
  const { acceptablePayment, investmentRatePercent } = requireBudget(params);
  const r = monthlyRateFromAnnual(params.annualRatePercent);
  return sweep((years) => {
    const term = computeOverpaymentTerm(params.principal, r, years, acceptablePayment, investmentRatePercent);
    return {
      monthlyPayment: term.monthlyPayment,
      totalCost: term.totalCost,
      totalCostAdjusted: roundToCents(adjustForInflation(term.totalCost, params.inflationRatePercent, years)),
      investmentBalance: term.investmentBalance,
    };
  });
}

/**
 * Pay the required instalment for the full term and invest whatever the
 * acceptable budget leaves over.
 */
export function calculateCreditWithInvestment(params: Readonly<LoanParameters>): TermResults {
  const { acceptablePayment, investmentRatePercent } = requireBudget(params);
  const r = monthlyRateFromAnnual(params.annualRatePercent);
  return sweep((years) => {
    const standard = computeStandardTerm(params.principal, r, years);
    const surplus = Math.max(0, acceptablePayment - standard.monthlyPayment);
    const investmentBalance = computeBalance(0, surplus, investmentRatePercent, years);
    const totalCost = roundToCents(standard.totalCost - investmentBalance);
    return {
      monthlyPayment: roundToCents(Math.max(acceptablePayment, standard.monthlyPayment)),
      totalCost,
      totalCostAdjusted: roundToCents(adjustForInflation(totalCost, params.inflationRatePercent, years)),
      investmentBalance,
    };
  });
}

/**
 * Runs every mode the parameters allow. Without an acceptable payment and an
 * investment rate only the plain schedule is produced.
 */
export function runSweep(params: Readonly<LoanParameters>): SweepResults {
  const plain = calculatePlainCredit(params);
  if (params.acceptableMonthlyPayment === undefined || params.investmentRatePercent === undefined) {
    return { plain };
  }
  return {
    plain,
    overpayment: calculateCreditWithOverpayment(params),
    investment: calculateCreditWithInvestment(params),
  };
}
