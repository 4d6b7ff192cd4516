// packages/engine/src/types.ts

export interface LoanParameters {
  principal: number;                  // currency units, >= 0
  annualRatePercent: number;          // nominal %, >= 0
  inflationRatePercent: number;       // annual %, may be negative
  acceptableMonthlyPayment?: number;  // currency units, >= 0
  investmentRatePercent?: number;     // annual %, >= 0
}

export interface StandardTerm {
  monthlyPayment: number;
  totalCost: number;
}

export interface OverpaymentTerm extends StandardTerm {
  investmentBalance: number;
  monthsToPayoff: number;
}

export interface TermResult {
  monthlyPayment: number;
  totalCost: number;
  totalCostAdjusted: number;
  investmentBalance: number;          // 0 when the mode does not invest
}

// Keyed by term in years, 3..30 in ascending order.
export type TermResults = ReadonlyMap<number, TermResult>;

export type CalculationMode = 'plain' | 'overpayment' | 'investment';

export interface SweepResults {
  plain: TermResults;
  overpayment?: TermResults;
  investment?: TermResults;
}
