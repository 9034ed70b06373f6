/**
 * FICA and Self-Employment Tax
 *
 * - Social Security: 6.2% of W-2 Social Security wages up to the wage base
 * - Medicare: 1.45% of W-2 Medicare wages, no cap
 * - Self-employment: 92.35% of net SE income, taxed at 12.4% up to whatever
 *   wage base W-2 wages left unused, plus 2.9% on all of it
 * - Additional Medicare: 0.9% of Medicare wages plus SE base above the
 *   filing-status threshold, evaluated once on the combined amount
 *
 * Half of SE tax is an above-the-line deduction (see agi.ts).
 */

import type { FilingStatus } from '../../../shared/types/index.js';
import { min, nonNegative, roundCents, sum } from '../utils/decimal.js';
import { ratesFor, type RateTable } from './rateTable.js';
import type { FicaResult, IncomeResult } from './types.js';

export function calculateFica(
  income: IncomeResult,
  filingStatus: FilingStatus,
  table: RateTable
): FicaResult {
  const { fica } = table;
  const { additionalMedicareThreshold } = ratesFor(table, filingStatus);

  const socialSecurityTax = roundCents(
    min(income.socialSecurityWages, fica.socialSecurityWageBase).times(fica.socialSecurityRate)
  );
  const medicareTax = roundCents(income.medicareWages.times(fica.medicareRate));

  // Net SE earnings
  const seBase = nonNegative(income.selfEmploymentIncome).times(fica.selfEmploymentTaxableFraction);

  // W-2 wages consume the Social Security wage base first
  const remainingWageBase = nonNegative(fica.socialSecurityWageBase.minus(income.socialSecurityWages));
  const selfEmploymentSocialSecurityTax = roundCents(
    min(seBase, remainingWageBase).times(fica.selfEmploymentSocialSecurityRate)
  );
  const selfEmploymentMedicareTax = roundCents(seBase.times(fica.selfEmploymentMedicareRate));
  const selfEmploymentTax = selfEmploymentSocialSecurityTax.plus(selfEmploymentMedicareTax);
  const selfEmploymentTaxDeduction = roundCents(selfEmploymentTax.times(fica.selfEmploymentDeductibleFraction));

  const additionalMedicareTax = roundCents(
    nonNegative(income.medicareWages.plus(seBase).minus(additionalMedicareThreshold))
      .times(fica.additionalMedicareRate)
  );

  return {
    socialSecurityTax,
    medicareTax,
    additionalMedicareTax,
    selfEmploymentTaxableBase: roundCents(seBase),
    selfEmploymentSocialSecurityTax,
    selfEmploymentMedicareTax,
    selfEmploymentTax,
    selfEmploymentTaxDeduction,
    totalFica: sum(socialSecurityTax, medicareTax, additionalMedicareTax, selfEmploymentTax)
  };
}
