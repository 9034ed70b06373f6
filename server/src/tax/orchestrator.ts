/**
 * Tax Calculation Pipeline
 *
 * Income -> FICA -> AGI -> Deductions -> Income tax (brackets, preferential
 * stacking, NIIT) -> Credits -> Summary.
 *
 * Pure: the result depends only on the return and the rate table, nothing is
 * read from or written to module state, and no stage performs I/O. Calls may
 * run concurrently.
 */

import { calculateAgi } from './agi.js';
import { applyCredits } from './credits.js';
import { selectDeduction } from './deductions.js';
import { calculateFica } from './fica.js';
import { aggregateIncome } from './income.js';
import { computeIncomeTax } from './preferential.js';
import type { RateTable } from './rateTable.js';
import { composeSummary } from './summary.js';
import type { FullTaxCalculationResult, TaxReturnInput } from './types.js';

export function calculateTaxReturn(input: TaxReturnInput, table: RateTable): FullTaxCalculationResult {
  const { filingStatus } = input;

  const income = aggregateIncome(input);
  const fica = calculateFica(income, filingStatus, table);
  const agi = calculateAgi(income, fica, input.aboveLineDeductions);
  const deductions = selectDeduction(input, income, agi, table);
  const taxComputation = computeIncomeTax(income, agi, deductions, filingStatus, table);
  const credits = applyCredits(
    {
      qualifyingChildren: input.qualifyingChildren,
      agi: agi.agi,
      filingStatus,
      liabilityBeforeCredits: taxComputation.totalIncomeTax
    },
    table
  );
  const summary = composeSummary({ input, income, fica, agi, deductions, taxComputation, credits }, table);

  return {
    taxYear: table.year,
    income,
    fica,
    agi,
    deductions,
    taxComputation,
    credits,
    summary
  };
}
