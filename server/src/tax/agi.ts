/**
 * Adjusted Gross Income
 *
 * AGI = gross income - above-the-line deductions (including half of SE tax).
 * Not floored: a negative AGI is rejected at the input boundary instead.
 */

import { roundCents, sum } from '../utils/decimal.js';
import type { AboveLineDeductions, AgiResult, FicaResult, IncomeResult } from './types.js';

export function calculateAgi(
  income: IncomeResult,
  fica: FicaResult,
  aboveLine: AboveLineDeductions
): AgiResult {
  const totalAboveLineDeductions = sum(
    aboveLine.hsaDeduction,
    aboveLine.studentLoanInterest,
    aboveLine.educatorExpenses,
    aboveLine.iraDeduction,
    aboveLine.selfEmployedHealthInsurance,
    fica.selfEmploymentTaxDeduction
  );

  return {
    totalGrossIncome: income.totalGrossIncome,
    totalAboveLineDeductions: roundCents(totalAboveLineDeductions),
    agi: roundCents(income.totalGrossIncome.minus(totalAboveLineDeductions))
  };
}
