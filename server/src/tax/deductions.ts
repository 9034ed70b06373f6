/**
 * Deduction Selection
 *
 * Standard deduction = filing-status base + one add-on per over-65 / blind flag.
 * Itemized deduction = plain sum of the six categories.
 * The larger wins, a tie going to standard, unless standard is forced.
 *
 * Taxable income is then split into the ordinary part taxed by the brackets
 * and the preferential part (net capital gain + qualified dividends).
 */

import type { FilingStatus } from '../../../shared/types/index.js';
import { ZERO, min, nonNegative, roundCents, sum, type Decimal } from '../utils/decimal.js';
import { netCapitalGain } from './income.js';
import { ratesFor, type RateTable } from './rateTable.js';
import type {
  AgiResult,
  DeductionResult,
  IncomeResult,
  ItemizedDeductions,
  StandardDeductionResult,
  TaxReturnInput
} from './types.js';

export function calculateStandardDeduction(
  filingStatus: FilingStatus,
  isOver65: boolean,
  isBlind: boolean,
  table: RateTable
): StandardDeductionResult {
  const rates = ratesFor(table, filingStatus);
  const flags = Number(isOver65) + Number(isBlind);
  const additionalAmount = rates.additionalStandardDeduction.times(flags);

  return {
    baseAmount: rates.standardDeduction,
    additionalAmount,
    totalDeduction: rates.standardDeduction.plus(additionalAmount)
  };
}

export function totalItemized(itemized: ItemizedDeductions | null): Decimal {
  if (!itemized) return ZERO;
  return roundCents(sum(
    itemized.medical,
    itemized.stateAndLocalTaxes,
    itemized.mortgageInterest,
    itemized.charitable,
    itemized.casualty,
    itemized.other
  ));
}

export interface IncomePartition {
  readonly ordinaryTaxableIncome: Decimal;
  readonly preferentialLongTermGains: Decimal;
  readonly preferentialQualifiedDividends: Decimal;
}

/**
 * Split taxable income into ordinary and preferential parts.
 * The preferential pool never exceeds taxable income; any excess is
 * trimmed from qualified dividends first, then long-term gain.
 */
export function partitionTaxableIncome(taxableIncome: Decimal, income: IncomeResult): IncomePartition {
  const longTerm = min(netCapitalGain(income), taxableIncome);
  const qualified = min(nonNegative(income.qualifiedDividends), taxableIncome.minus(longTerm));

  return {
    ordinaryTaxableIncome: taxableIncome.minus(longTerm).minus(qualified),
    preferentialLongTermGains: longTerm,
    preferentialQualifiedDividends: qualified
  };
}

export function selectDeduction(
  input: TaxReturnInput,
  income: IncomeResult,
  agi: AgiResult,
  table: RateTable
): DeductionResult {
  const standard = calculateStandardDeduction(input.filingStatus, input.isOver65, input.isBlind, table);
  const itemizedTotal = totalItemized(input.itemizedDeductions);

  const useItemized = !input.forceStandardDeduction
    && input.itemizedDeductions !== null
    && itemizedTotal.greaterThan(standard.totalDeduction);
  const deductionAmount = useItemized ? itemizedTotal : standard.totalDeduction;

  const taxableIncome = roundCents(nonNegative(agi.agi.minus(deductionAmount)));
  const partition = partitionTaxableIncome(taxableIncome, income);

  return {
    standardDeductionAmount: standard.totalDeduction,
    itemizedTotal,
    method: useItemized ? 'ITEMIZED' : 'STANDARD',
    deductionAmount,
    taxableIncome,
    ordinaryTaxableIncome: roundCents(partition.ordinaryTaxableIncome),
    preferentialLongTermGains: roundCents(partition.preferentialLongTermGains),
    preferentialQualifiedDividends: roundCents(partition.preferentialQualifiedDividends),
    preferentialIncome: roundCents(
      partition.preferentialLongTermGains.plus(partition.preferentialQualifiedDividends)
    )
  };
}
