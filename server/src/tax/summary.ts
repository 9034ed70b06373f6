/**
 * Summary Composer
 *
 * total tax     = income tax after credits + total FICA
 * payments      = all W-2 withholding (Boxes 2, 4, 6) + estimated payments
 * refund / owed = payments + refundable credit - total tax (positive = refund)
 *
 * Effective rate is total tax over total income, unclamped. A capital loss
 * reduces total income but not the wages FICA is charged on, so a return whose
 * loss nearly cancels its wages can report a rate above 1.
 */

import { ZERO, roundCents, roundRate, sum, sumBy } from '../utils/decimal.js';
import { rateForNextDollar } from './bracketTax.js';
import type { RateTable } from './rateTable.js';
import type {
  AgiResult,
  CreditsResult,
  DeductionResult,
  FicaResult,
  IncomeResult,
  TaxComputationResult,
  TaxReturnInput,
  TaxSummary
} from './types.js';

export interface SummaryInput {
  readonly input: TaxReturnInput;
  readonly income: IncomeResult;
  readonly fica: FicaResult;
  readonly agi: AgiResult;
  readonly deductions: DeductionResult;
  readonly taxComputation: TaxComputationResult;
  readonly credits: CreditsResult;
}

export function composeSummary(stages: SummaryInput, table: RateTable): TaxSummary {
  const { input, income, fica, agi, deductions, taxComputation, credits } = stages;

  const totalTax = credits.taxAfterCredits.plus(fica.totalFica);
  const totalIncome = income.totalGrossIncome;

  const totalWithholding = sumBy(input.w2s, w2 =>
    sum(w2.federalWithholding, w2.socialSecurityTaxWithheld, w2.medicareTaxWithheld)
  );
  const totalPayments = totalWithholding.plus(input.estimatedPayments);

  return {
    filingStatus: input.filingStatus,
    totalIncome,
    agi: agi.agi,
    deductionAmount: deductions.deductionAmount,
    taxableIncome: deductions.taxableIncome,
    totalIncomeTaxBeforeCredits: taxComputation.totalIncomeTax,
    totalCredits: credits.totalCreditsApplied,
    incomeTaxAfterCredits: credits.taxAfterCredits,
    totalFica: fica.totalFica,
    totalTax: roundCents(totalTax),
    effectiveRate: totalIncome.greaterThan(0) ? roundRate(totalTax.dividedBy(totalIncome)) : ZERO,
    marginalRate: rateForNextDollar(deductions.ordinaryTaxableIncome, input.filingStatus, table),
    totalWithholding: roundCents(totalWithholding),
    estimatedPayments: roundCents(input.estimatedPayments),
    totalPayments: roundCents(totalPayments),
    refundableCredits: credits.refundableApplied,
    refundOrOwed: roundCents(totalPayments.plus(credits.refundableApplied).minus(totalTax))
  };
}
