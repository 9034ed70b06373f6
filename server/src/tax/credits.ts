/**
 * Child Tax Credit
 *
 * Credit = children x per-child amount, reduced by a fixed amount for each
 * increment (or fraction of one) of AGI over the filing-status threshold.
 * The nonrefundable part is capped at the liability; what remains, up to the
 * per-child refundable cap, is refundable.
 */

import type { FilingStatus } from '../../../shared/types/index.js';
import { Decimal, min, nonNegative, roundCents } from '../utils/decimal.js';
import { ratesFor, type RateTable } from './rateTable.js';
import type { CreditsResult } from './types.js';

export interface CreditInput {
  readonly qualifyingChildren: number;
  readonly agi: Decimal;
  readonly filingStatus: FilingStatus;
  readonly liabilityBeforeCredits: Decimal;
}

/**
 * Credit after the AGI phase-out, before any liability cap
 */
export function childTaxCredit(
  qualifyingChildren: number,
  agi: Decimal,
  filingStatus: FilingStatus,
  table: RateTable
): Decimal {
  const ctc = table.childTaxCredit;
  const full = ctc.amountPerChild.times(qualifyingChildren);

  const excess = nonNegative(agi.minus(ratesFor(table, filingStatus).childTaxCreditPhaseOutThreshold));
  const increments = excess.dividedBy(ctc.phaseOutIncrement).ceil();
  const reduction = increments.times(ctc.phaseOutReduction);

  return nonNegative(full.minus(reduction));
}

export function applyCredits(input: CreditInput, table: RateTable): CreditsResult {
  const liability = nonNegative(input.liabilityBeforeCredits);
  const credit = childTaxCredit(input.qualifyingChildren, input.agi, input.filingStatus, table);

  const nonrefundableApplied = min(credit, liability);
  const refundableCap = table.childTaxCredit.refundablePerChild.times(input.qualifyingChildren);
  const refundableApplied = min(credit.minus(nonrefundableApplied), refundableCap);

  return {
    childTaxCredit: roundCents(credit),
    nonrefundableApplied: roundCents(nonrefundableApplied),
    refundableApplied: roundCents(refundableApplied),
    totalCreditsApplied: roundCents(nonrefundableApplied.plus(refundableApplied)),
    taxAfterCredits: roundCents(liability.minus(nonrefundableApplied))
  };
}
