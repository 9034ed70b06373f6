/**
 * Deduction Selector Tests
 *
 * 2024 standard deductions: $14,600 single / MFS, $29,200 joint / QSS,
 * $21,900 head of household. Add-on per over-65 / blind flag: $1,950
 * (single, HOH) or $1,550 (married, QSS).
 */

import { describe, it, expect } from '@jest/globals';
import type { TaxReturnJson } from '../../../../shared/types';
import { calculateAgi } from '../agi';
import { calculateStandardDeduction, selectDeduction, totalItemized } from '../deductions';
import { calculateFica } from '../fica';
import { aggregateIncome } from '../income';
import { buildReturn, table2024 } from './helpers';

function deductionsFor(json: TaxReturnJson) {
  const input = buildReturn(json);
  const income = aggregateIncome(input);
  const fica = calculateFica(income, input.filingStatus, table2024);
  const agi = calculateAgi(income, fica, input.aboveLineDeductions);
  return selectDeduction(input, income, agi, table2024);
}

describe('Deduction Selector', () => {
  describe('calculateStandardDeduction()', () => {
    it('should return the base amount without flags', () => {
      const result = calculateStandardDeduction('SINGLE', false, false, table2024);

      expect(result.baseAmount.toString()).toBe('14600');
      expect(result.additionalAmount.isZero()).toBe(true);
      expect(result.totalDeduction.toString()).toBe('14600');
    });

    it('should add one amount per flag', () => {
      const result = calculateStandardDeduction('SINGLE', true, true, table2024);

      expect(result.additionalAmount.toString()).toBe('3900');
      expect(result.totalDeduction.toString()).toBe('18500');
    });

    it('should use the married add-on amount', () => {
      expect(calculateStandardDeduction('MARRIED_FILING_JOINTLY', true, false, table2024)
        .totalDeduction.toString()).toBe('30750');
      expect(calculateStandardDeduction('QUALIFYING_SURVIVING_SPOUSE', false, true, table2024)
        .totalDeduction.toString()).toBe('30750');
    });

    it('should use head of household amounts', () => {
      expect(calculateStandardDeduction('HEAD_OF_HOUSEHOLD', false, true, table2024)
        .totalDeduction.toString()).toBe('23850');
    });
  });

  describe('totalItemized()', () => {
    it('should be zero without an itemized breakdown', () => {
      expect(totalItemized(null).isZero()).toBe(true);
    });
  });

  describe('selectDeduction()', () => {
    it('should take the standard deduction by default', () => {
      const result = deductionsFor({ filingStatus: 'SINGLE', w2s: [{ wages: 50000 }] });

      expect(result.method).toBe('STANDARD');
      expect(result.deductionAmount.toString()).toBe('14600');
      expect(result.itemizedTotal.isZero()).toBe(true);
      expect(result.taxableIncome.toFixed(2)).toBe('35400.00');
      expect(result.ordinaryTaxableIncome.toFixed(2)).toBe('35400.00');
      expect(result.preferentialIncome.isZero()).toBe(true);
    });

    it('should itemize when itemized deductions are larger', () => {
      const result = deductionsFor({
        filingStatus: 'SINGLE',
        w2s: [{ wages: 100000 }],
        itemizedDeductions: { stateAndLocalTaxes: 10000, mortgageInterest: 8000 }
      });

      expect(result.method).toBe('ITEMIZED');
      expect(result.itemizedTotal.toFixed(2)).toBe('18000.00');
      expect(result.taxableIncome.toFixed(2)).toBe('82000.00');
    });

    it('should sum all six categories without floors or caps', () => {
      const result = deductionsFor({
        filingStatus: 'SINGLE',
        w2s: [{ wages: 100000 }],
        itemizedDeductions: {
          medical: 1000,
          stateAndLocalTaxes: 15000,
          mortgageInterest: 2000,
          charitable: '500.25',
          casualty: 100,
          other: 50
        }
      });

      expect(result.itemizedTotal.toFixed(2)).toBe('18650.25');
      expect(result.method).toBe('ITEMIZED');
    });

    it('should prefer the standard deduction on a tie', () => {
      const result = deductionsFor({
        filingStatus: 'SINGLE',
        w2s: [{ wages: 50000 }],
        itemizedDeductions: { mortgageInterest: 14600 }
      });

      expect(result.method).toBe('STANDARD');
    });

    it('should honor forceStandardDeduction', () => {
      const result = deductionsFor({
        filingStatus: 'SINGLE',
        w2s: [{ wages: 100000 }],
        itemizedDeductions: { mortgageInterest: 20000 },
        forceStandardDeduction: true
      });

      expect(result.method).toBe('STANDARD');
      expect(result.itemizedTotal.toFixed(2)).toBe('20000.00');
      expect(result.deductionAmount.toString()).toBe('14600');
    });

    it('should floor taxable income at zero', () => {
      const result = deductionsFor({ filingStatus: 'SINGLE', w2s: [{ wages: 10000 }] });

      expect(result.taxableIncome.isZero()).toBe(true);
      expect(result.ordinaryTaxableIncome.isZero()).toBe(true);
    });
  });

  describe('taxable income partition', () => {
    it('should split out long-term gain and qualified dividends', () => {
      const result = deductionsFor({
        filingStatus: 'SINGLE',
        w2s: [{ wages: 60000 }],
        form1099Div: [{ ordinaryDividends: 2000, qualifiedDividends: 1500 }],
        form1099B: [{ longTermGains: 5000 }]
      });

      // AGI $67,000 - $14,600
      expect(result.taxableIncome.toFixed(2)).toBe('52400.00');
      expect(result.preferentialLongTermGains.toFixed(2)).toBe('5000.00');
      expect(result.preferentialQualifiedDividends.toFixed(2)).toBe('1500.00');
      expect(result.preferentialIncome.toFixed(2)).toBe('6500.00');
      expect(result.ordinaryTaxableIncome.toFixed(2)).toBe('45900.00');
    });

    it('should trim qualified dividends first when the pool exceeds taxable income', () => {
      const result = deductionsFor({
        filingStatus: 'SINGLE',
        w2s: [{ wages: 12000 }],
        form1099Div: [{ ordinaryDividends: 3000, qualifiedDividends: 3000 }],
        form1099B: [{ longTermGains: 4000 }]
      });

      // Taxable: $19,000 - $14,600 = $4,400
      expect(result.taxableIncome.toFixed(2)).toBe('4400.00');
      expect(result.preferentialLongTermGains.toFixed(2)).toBe('4000.00');
      expect(result.preferentialQualifiedDividends.toFixed(2)).toBe('400.00');
      expect(result.ordinaryTaxableIncome.isZero()).toBe(true);
    });

    it('should trim long-term gain once qualified dividends are gone', () => {
      const result = deductionsFor({
        filingStatus: 'SINGLE',
        w2s: [{ wages: 10000 }],
        form1099Div: [{ ordinaryDividends: 3000, qualifiedDividends: 3000 }],
        form1099B: [{ longTermGains: 8000 }]
      });

      // Taxable: $21,000 - $14,600 = $6,400
      expect(result.preferentialLongTermGains.toFixed(2)).toBe('6400.00');
      expect(result.preferentialQualifiedDividends.isZero()).toBe(true);
      expect(result.ordinaryTaxableIncome.isZero()).toBe(true);
    });

    it('should shrink the preferential gain by a short-term loss', () => {
      const result = deductionsFor({
        filingStatus: 'SINGLE',
        w2s: [{ wages: 60000 }],
        form1099B: [{ shortTermGains: -1000, longTermGains: 5000 }]
      });

      // AGI $64,000; taxable $49,400; net capital gain $4,000
      expect(result.taxableIncome.toFixed(2)).toBe('49400.00');
      expect(result.preferentialLongTermGains.toFixed(2)).toBe('4000.00');
      expect(result.ordinaryTaxableIncome.toFixed(2)).toBe('45400.00');
    });
  });
});
