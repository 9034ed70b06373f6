/**
 * Income Aggregation
 *
 * Totals every information return by category. Qualified dividends are a
 * subset of ordinary dividends and are never added to gross income twice.
 */

import { max, min, roundCents, sum, sumBy, type Decimal } from '../utils/decimal.js';
import type { IncomeResult, TaxReturnInput } from './types.js';

export function aggregateIncome(input: TaxReturnInput): IncomeResult {
  const wages = sumBy(input.w2s, w2 => w2.wages);
  const socialSecurityWages = sumBy(input.w2s, w2 => w2.socialSecurityWages);
  const medicareWages = sumBy(input.w2s, w2 => w2.medicareWages);
  const selfEmploymentIncome = sumBy(input.form1099Nec, nec => nec.compensation);
  const interestIncome = sumBy(input.form1099Int, int => int.interest);
  const ordinaryDividends = sumBy(input.form1099Div, div => div.ordinaryDividends);
  const qualifiedDividends = sumBy(input.form1099Div, div => div.qualifiedDividends);
  const shortTermGains = sumBy(input.form1099B, b => b.shortTermGains);
  const longTermGains = sumBy(input.form1099B, b => b.longTermGains);

  const totalGrossIncome = sum(
    wages,
    selfEmploymentIncome,
    interestIncome,
    ordinaryDividends,
    shortTermGains,
    longTermGains
  );

  const netInvestmentIncome = sum(interestIncome, ordinaryDividends, shortTermGains, longTermGains);

  return {
    wages: roundCents(wages),
    socialSecurityWages: roundCents(socialSecurityWages),
    medicareWages: roundCents(medicareWages),
    selfEmploymentIncome: roundCents(selfEmploymentIncome),
    interestIncome: roundCents(interestIncome),
    ordinaryDividends: roundCents(ordinaryDividends),
    qualifiedDividends: roundCents(qualifiedDividends),
    shortTermGains: roundCents(shortTermGains),
    longTermGains: roundCents(longTermGains),
    totalGrossIncome: roundCents(totalGrossIncome),
    netInvestmentIncome: roundCents(netInvestmentIncome)
  };
}

/**
 * Capital gain eligible for preferential rates: net long-term gain,
 * reduced by any net short-term loss, never below zero.
 */
export function netCapitalGain(income: Pick<IncomeResult, 'shortTermGains' | 'longTermGains'>): Decimal {
  const { shortTermGains, longTermGains } = income;
  return max(0, min(longTermGains, longTermGains.plus(shortTermGains)));
}

/**
 * Net loss across both holding periods (positive number), zero when gains net positive
 */
export function netCapitalLoss(income: Pick<IncomeResult, 'shortTermGains' | 'longTermGains'>): Decimal {
  return max(0, income.shortTermGains.plus(income.longTermGains).negated());
}
