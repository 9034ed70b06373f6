import type { FilingStatus } from '../../../shared/types/index.js';
import { decimal, nonNegative, roundCents, type Decimal, type DecimalInput } from '../utils/decimal.js';
import { calculateBracketTax } from './bracketTax.js';
import { calculateStandardDeduction } from './deductions.js';
import type { RateTable } from './rateTable.js';

export interface TaxEstimate {
  readonly grossIncome: Decimal;
  readonly filingStatus: FilingStatus;
  readonly standardDeduction: Decimal;
  readonly taxableIncome: Decimal;
  readonly estimatedTax: Decimal;
  readonly effectiveRate: Decimal;
  readonly marginalRate: Decimal;
}

/**
 * Quick estimate from gross income and filing status alone:
 * standard deduction and bracket tax, no FICA, credits or investment income.
 * Effective rate is relative to taxable income, as the bracket calculator reports it.
 */
export function estimateTax(
  grossIncome: DecimalInput,
  filingStatus: FilingStatus,
  table: RateTable
): TaxEstimate {
  const gross = decimal(grossIncome);
  const { totalDeduction } = calculateStandardDeduction(filingStatus, false, false, table);
  const taxableIncome = roundCents(nonNegative(gross.minus(totalDeduction)));
  const bracket = calculateBracketTax(taxableIncome, filingStatus, table);

  return {
    grossIncome: roundCents(gross),
    filingStatus,
    standardDeduction: totalDeduction,
    taxableIncome,
    estimatedTax: bracket.totalTax,
    effectiveRate: bracket.effectiveRate,
    marginalRate: bracket.marginalRate
  };
}
