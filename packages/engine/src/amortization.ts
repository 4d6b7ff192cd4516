// packages/engine/src/amortization.ts

import { computeBalance } from './investment';
import { roundToCents } from './money';
import type { OverpaymentTerm, StandardTerm } from './types';

// Balances never land exactly on zero in floating point.
const PAID_OFF_EPSILON = 0.01;

// ---------- helpers ----------
/**
 * Fixed payment that amortizes `principal` over `months` equal payments.
 */
function monthlyPaymentFor(principal: number, monthlyRate: number, months: number): number {
  if (monthlyRate === 0) return principal / months;
  const growth = Math.pow(1 + monthlyRate, months);
  return principal * (monthlyRate * growth) / (growth - 1);
}

class LoanLedger {
  private balance: number;
  private readonly r: number;

  constructor(principal: number, monthlyRate: number) {
    this.balance = principal;
    this.r = monthlyRate;
  }

  get remaining(): number {
    return this.balance;
  }

  // Returns false when the payment does not cover the month's interest.
  step(payment: number): boolean {
    const interest = this.balance * this.r;
    const principal = payment - interest;
    if (principal <= 0) return false;
    this.balance -= principal;
    return true;
  }
}

// ---------- schedules ----------
export function computeStandardTerm(principal: number, monthlyRate: number, termYears: number): StandardTerm {
  const months = termYears * 12;
  const payment = monthlyPaymentFor(principal, monthlyRate, months);
  return {
    monthlyPayment: roundToCents(payment),
    totalCost: roundToCents(payment * months),
  };
}

/**
 * Pays a fixed `acceptablePayment` each month until the loan is cleared or the
 * nominal term runs out. Once cleared, the same budget is invested for the rest
 * of the nominal term and its balance is netted off the amount paid.
 */
export function computeOverpaymentTerm(
  principal: number,
  monthlyRate: number,
  termYears: number,
  acceptablePayment: number,
  investmentRatePercent: number,
): OverpaymentTerm {
  const nominalMonths = termYears * 12;
  const standard = computeStandardTerm(principal, monthlyRate, termYears);

  if (acceptablePayment <= standard.monthlyPayment) {
    return { ...standard, investmentBalance: 0, monthsToPayoff: nominalMonths };
  }

  const loan = new LoanLedger(principal, monthlyRate);
  let totalPaid = 0;
  let elapsed = 0;
  let stalled = false;
  while (loan.remaining > PAID_OFF_EPSILON && elapsed < nominalMonths) {
    if (!loan.step(acceptablePayment)) {
      stalled = true;
      break;
    }
    totalPaid += acceptablePayment;
    elapsed++;
  }

  // A stalled loan is never cleared, so no budget is freed for investing.
  const remainingMonths = nominalMonths - elapsed;
  const investmentBalance = !stalled && remainingMonths > 0
    ? computeBalance(0, acceptablePayment, investmentRatePercent, remainingMonths / 12)
    : 0;

  return {
    monthlyPayment: roundToCents(acceptablePayment),
    totalCost: roundToCents(totalPaid - investmentBalance),
    investmentBalance: roundToCents(investmentBalance),
    monthsToPayoff: elapsed,
  };
}
