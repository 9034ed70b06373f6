/**
 * Progressive Bracket Tax
 *
 * Taxes the slice of income falling in each tier [min, max) at the tier rate.
 * The top tier has no upper bound.
 */

import type { FilingStatus } from '../../../shared/types/index.js';
import { AppError } from '../utils/AppError.js';
import { Decimal, ZERO, decimal, min, nonNegative, roundCents, roundRate, type DecimalInput } from '../utils/decimal.js';
import { ratesFor, type RateTable, type TaxBracket } from './rateTable.js';
import type { BracketDetail } from './types.js';

export interface BracketTaxResult {
  readonly filingStatus: FilingStatus;
  readonly taxableIncome: Decimal;
  readonly totalTax: Decimal;
  readonly effectiveRate: Decimal;
  readonly marginalRate: Decimal;
  readonly breakdown: readonly BracketDetail[];
}

/**
 * Amount of income that falls inside one bracket
 */
function amountInBracket(income: Decimal, bracket: TaxBracket): Decimal {
  const top = bracket.max === null ? income : min(income, bracket.max);
  return nonNegative(top.minus(bracket.min));
}

/**
 * Exact bracket tax, no rounding. Callers stacking several amounts
 * round once on the combined figure.
 */
export function bracketTaxUnrounded(income: Decimal, brackets: readonly TaxBracket[]): Decimal {
  return brackets.reduce<Decimal>(
    (total, bracket) => total.plus(amountInBracket(income, bracket).times(bracket.rate)),
    ZERO
  );
}

function assertNonNegative(income: Decimal): void {
  if (income.isNegative()) {
    throw AppError.internal(`Bracket tax requested for negative income ${income.toFixed(2)}`);
  }
}

/**
 * Rate of the tier containing `income`. An amount exactly on a boundary
 * belongs to the lower tier it completes.
 */
export function marginalRate(income: Decimal, filingStatus: FilingStatus, table: RateTable): Decimal {
  const { brackets } = ratesFor(table, filingStatus);
  const tier = brackets.find(bracket => bracket.max === null || income.lessThanOrEqualTo(bracket.max));
  return (tier ?? brackets[brackets.length - 1]).rate;
}

/**
 * Rate applied to one more dollar on top of `income`: the tier with min <= income < max
 */
export function rateForNextDollar(income: Decimal, filingStatus: FilingStatus, table: RateTable): Decimal {
  const { brackets } = ratesFor(table, filingStatus);
  const tier = brackets.find(bracket => bracket.max === null || income.lessThan(bracket.max));
  return (tier ?? brackets[brackets.length - 1]).rate;
}

/**
 * Tax on ordinary taxable income with a per-tier breakdown
 */
export function calculateBracketTax(
  taxableIncome: DecimalInput,
  filingStatus: FilingStatus,
  table: RateTable
): BracketTaxResult {
  const income = decimal(taxableIncome);
  assertNonNegative(income);

  const { brackets } = ratesFor(table, filingStatus);

  const breakdown: BracketDetail[] = [];
  for (const bracket of brackets) {
    const inBracket = amountInBracket(income, bracket);
    if (inBracket.isZero()) break;

    breakdown.push({
      rate: bracket.rate,
      bracketMin: bracket.min,
      bracketMax: bracket.max,
      taxableInBracket: inBracket,
      taxInBracket: roundCents(inBracket.times(bracket.rate))
    });
  }

  const totalTax = roundCents(bracketTaxUnrounded(income, brackets));

  return {
    filingStatus,
    taxableIncome: income,
    totalTax,
    effectiveRate: income.isZero() ? ZERO : roundRate(totalTax.dividedBy(income)),
    marginalRate: marginalRate(income, filingStatus, table),
    breakdown
  };
}
