// packages/engine/src/index.ts

export { computeBalance } from './investment';
export { computeStandardTerm, computeOverpaymentTerm } from './amortization';
export { adjustForInflation } from './inflation';
export {
  TERM_YEARS,
  termYears,
  calculatePlainCredit,
  calculateCreditWithOverpayment,
  calculateCreditWithInvestment,
  runSweep,
} from './sweep';
export { InvalidArgumentError } from './errors';
export { monthlyRateFromAnnual, roundToCents } from './money';
export type {
  LoanParameters,
  StandardTerm,
  OverpaymentTerm,
  TermResult,
  TermResults,
  CalculationMode,
  SweepResults,
} from './types';
