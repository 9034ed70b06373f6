/**
 * Preferential-Rate Stacking and Net Investment Income Tax
 *
 * Ordinary taxable income O fills the brackets first. The preferential pool
 * P (long-term gain L, then qualified dividends Q) is stacked on [O, O + P)
 * and each slice is taxed at the capital-gains rate of the breakpoint
 * interval it overlaps:
 *
 *   [0, B0)   0%
 *   [B0, B1)  15%
 *   [B1, ∞)   20%
 *
 * Qualified-dividend tax is the tranche tax of [O + L, O + P); capital-gains
 * tax is the remainder of the pooled figure, so the two always add up to the
 * tax on P and never double-count.
 */

import type { FilingStatus } from '../../../shared/types/index.js';
import { Decimal, ZERO, max, min, nonNegative, roundCents, sum } from '../utils/decimal.js';
import { calculateBracketTax } from './bracketTax.js';
import { ratesFor, type RateTable } from './rateTable.js';
import type {
  AgiResult,
  BracketDetail,
  DeductionResult,
  IncomeResult,
  RateTranche,
  TaxComputationResult,
  TrancheDetail
} from './types.js';

export interface PreferentialTaxResult {
  readonly ordinaryTax: Decimal;
  readonly qualifiedDividendTax: Decimal;
  readonly capitalGainsTax: Decimal;
  readonly ordinaryBreakdown: readonly BracketDetail[];
  readonly tranches: readonly TrancheDetail[];
}

export function capitalGainsTranches(filingStatus: FilingStatus, table: RateTable): RateTranche[] {
  const { zeroRateMax, fifteenRateMax } = ratesFor(table, filingStatus).capitalGainsBreakpoints;
  const rates = table.capitalGainsRates;
  return [
    { rate: rates.zero, min: ZERO, max: zeroRateMax },
    { rate: rates.fifteen, min: zeroRateMax, max: fifteenRateMax },
    { rate: rates.twenty, min: fifteenRateMax, max: null }
  ];
}

/**
 * Part of [base, base + amount) inside one tranche
 */
function overlap(base: Decimal, amount: Decimal, tranche: RateTranche): Decimal {
  const top = base.plus(amount);
  const upper = tranche.max === null ? top : min(top, tranche.max);
  return nonNegative(upper.minus(max(base, tranche.min)));
}

/**
 * Exact tax on `amount` stacked on top of `base`
 */
export function stackedTax(base: Decimal, amount: Decimal, tranches: readonly RateTranche[]): Decimal {
  return tranches.reduce<Decimal>(
    (total, tranche) => total.plus(overlap(base, amount, tranche).times(tranche.rate)),
    ZERO
  );
}

function trancheBreakdown(base: Decimal, amount: Decimal, tranches: readonly RateTranche[]): TrancheDetail[] {
  return tranches
    .map(tranche => {
      const inTranche = overlap(base, amount, tranche);
      return { ...tranche, amount: inTranche, tax: roundCents(inTranche.times(tranche.rate)) };
    })
    .filter(detail => !detail.amount.isZero());
}

export function calculatePreferentialTax(
  deductions: Pick<DeductionResult, 'ordinaryTaxableIncome' | 'preferentialLongTermGains' | 'preferentialQualifiedDividends'>,
  filingStatus: FilingStatus,
  table: RateTable
): PreferentialTaxResult {
  const ordinary = calculateBracketTax(deductions.ordinaryTaxableIncome, filingStatus, table);
  const tranches = capitalGainsTranches(filingStatus, table);

  const base = deductions.ordinaryTaxableIncome;
  const longTerm = deductions.preferentialLongTermGains;
  const qualified = deductions.preferentialQualifiedDividends;
  const pool = longTerm.plus(qualified);

  const pooledTax = roundCents(stackedTax(base, pool, tranches));
  const qualifiedDividendTax = roundCents(stackedTax(base.plus(longTerm), qualified, tranches));

  return {
    ordinaryTax: ordinary.totalTax,
    qualifiedDividendTax,
    capitalGainsTax: pooledTax.minus(qualifiedDividendTax),
    ordinaryBreakdown: ordinary.breakdown,
    tranches: trancheBreakdown(base, pool, tranches)
  };
}

/**
 * Net investment income tax: rate x the lesser of NII (floored at zero)
 * and MAGI above the filing-status threshold. MAGI equals AGI here.
 */
export function calculateNiit(
  netInvestmentIncome: Decimal,
  magi: Decimal,
  filingStatus: FilingStatus,
  table: RateTable
): Decimal {
  const excessMagi = nonNegative(magi.minus(ratesFor(table, filingStatus).niitThreshold));
  return roundCents(min(nonNegative(netInvestmentIncome), excessMagi).times(table.niitRate));
}

/**
 * Income tax before credits: ordinary + capital gains + qualified dividends + NIIT
 */
export function computeIncomeTax(
  income: IncomeResult,
  agi: AgiResult,
  deductions: DeductionResult,
  filingStatus: FilingStatus,
  table: RateTable
): TaxComputationResult {
  const preferential = calculatePreferentialTax(deductions, filingStatus, table);
  const niit = calculateNiit(income.netInvestmentIncome, agi.agi, filingStatus, table);

  return {
    ordinaryTax: preferential.ordinaryTax,
    qualifiedDividendTax: preferential.qualifiedDividendTax,
    capitalGainsTax: preferential.capitalGainsTax,
    niit,
    totalIncomeTax: sum(
      preferential.ordinaryTax,
      preferential.capitalGainsTax,
      preferential.qualifiedDividendTax,
      niit
    ),
    ordinaryBreakdown: preferential.ordinaryBreakdown,
    preferentialTranches: preferential.tranches
  };
}

