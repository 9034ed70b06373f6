import { describe, it, expect } from '@jest/globals';
import { calculateTaxReturn } from '../orchestrator';
import { buildReturn, table2024 } from './helpers';

describe('Summary Composer', () => {
  it('should combine income tax and FICA for a single $50,000 earner', () => {
    const { summary } = calculateTaxReturn(buildReturn({
      filingStatus: 'SINGLE',
      w2s: [{
        wages: 50000,
        federalWithholding: 5000,
        socialSecurityTaxWithheld: 3100,
        medicareTaxWithheld: 725
      }]
    }), table2024);

    expect(summary.taxableIncome.toFixed(2)).toBe('35400.00');
    expect(summary.totalIncomeTaxBeforeCredits.toFixed(2)).toBe('4016.00');
    expect(summary.totalFica.toFixed(2)).toBe('3825.00');
    // $4,016 + $3,825
    expect(summary.totalTax.toFixed(2)).toBe('7841.00');
    expect(summary.effectiveRate.toString()).toBe('0.15682');
    expect(summary.marginalRate.toString()).toBe('0.12');
    // Boxes 2, 4 and 6 all count as payments
    expect(summary.totalWithholding.toFixed(2)).toBe('8825.00');
    expect(summary.totalPayments.toFixed(2)).toBe('8825.00');
    expect(summary.refundOrOwed.toFixed(2)).toBe('984.00');
  });

  it('should add the refundable credit to the refund', () => {
    const { summary, credits } = calculateTaxReturn(buildReturn({
      filingStatus: 'HEAD_OF_HOUSEHOLD',
      w2s: [{ wages: 25000, federalWithholding: 500 }],
      qualifyingChildren: 2
    }), table2024);

    // Taxable $3,100 -> $310 of tax, fully offset
    expect(credits.nonrefundableApplied.toFixed(2)).toBe('310.00');
    // min($3,690, 2 x $1,700)
    expect(credits.refundableApplied.toFixed(2)).toBe('3400.00');
    expect(summary.incomeTaxAfterCredits.isZero()).toBe(true);
    expect(summary.totalTax.toFixed(2)).toBe('1912.50');
    expect(summary.refundableCredits.toFixed(2)).toBe('3400.00');
    // $500 + $3,400 - $1,912.50
    expect(summary.refundOrOwed.toFixed(2)).toBe('1987.50');
    expect(summary.effectiveRate.toString()).toBe('0.0765');
    expect(summary.marginalRate.toString()).toBe('0.1');
  });

  it('should report a balance due as a negative amount', () => {
    const { summary } = calculateTaxReturn(buildReturn({
      filingStatus: 'MARRIED_FILING_JOINTLY',
      w2s: [{ wages: 80000, federalWithholding: 4000 }],
      qualifyingChildren: 2
    }), table2024);

    // Income tax $5,632 - $4,000 CTC + FICA $6,120
    expect(summary.totalTax.toFixed(2)).toBe('7752.00');
    expect(summary.refundOrOwed.toFixed(2)).toBe('-3752.00');
  });

  it('should use a zero effective rate without income', () => {
    const { summary } = calculateTaxReturn(buildReturn({
      filingStatus: 'SINGLE',
      estimatedPayments: 100
    }), table2024);

    expect(summary.totalIncome.isZero()).toBe(true);
    expect(summary.effectiveRate.isZero()).toBe(true);
    expect(summary.totalTax.isZero()).toBe(true);
    expect(summary.estimatedPayments.toFixed(2)).toBe('100.00');
    expect(summary.refundOrOwed.toFixed(2)).toBe('100.00');
  });

  it('should report a rate above 1 when a capital loss offsets nearly all wages', () => {
    const { summary } = calculateTaxReturn(buildReturn({
      filingStatus: 'SINGLE',
      w2s: [{ wages: 3100 }],
      form1099B: [{ shortTermGains: -3000 }]
    }), table2024);

    // FICA on $3,100 of wages: $192.20 + $44.95
    expect(summary.totalIncome.toFixed(2)).toBe('100.00');
    expect(summary.incomeTaxAfterCredits.isZero()).toBe(true);
    expect(summary.totalTax.toFixed(2)).toBe('237.15');
    expect(summary.effectiveRate.toString()).toBe('2.3715');
  });
});
