/**
 * Bracket Tax Tests
 *
 * 2024 ordinary brackets (Rev. Proc. 2023-34).
 */

import { describe, it, expect } from '@jest/globals';
import { AppError } from '../../utils/AppError';
import { decimal } from '../../utils/decimal';
import { bracketTaxUnrounded, calculateBracketTax, marginalRate, rateForNextDollar } from '../bracketTax';
import { ratesFor } from '../rateTable';
import { table2024 } from './helpers';

const singleBrackets = ratesFor(table2024, 'SINGLE').brackets;

describe('Bracket Tax Calculator', () => {
  describe('calculateBracketTax()', () => {
    it('should tax $35,400 single (from $50,000 wages) at $4,016.00', () => {
      const result = calculateBracketTax(35400, 'SINGLE', table2024);

      // 10% of $11,600 = $1,160
      // 12% of ($35,400 - $11,600) = $2,856
      expect(result.totalTax.toFixed(2)).toBe('4016.00');
      expect(result.breakdown).toHaveLength(2);
      expect(result.breakdown[0].taxableInBracket.toString()).toBe('11600');
      expect(result.breakdown[0].taxInBracket.toFixed(2)).toBe('1160.00');
      expect(result.breakdown[1].taxableInBracket.toString()).toBe('23800');
      expect(result.breakdown[1].taxInBracket.toFixed(2)).toBe('2856.00');
      expect(result.marginalRate.toString()).toBe('0.12');
      // 4016 / 35400
      expect(result.effectiveRate.toString()).toBe('0.113446');
    });

    it('should return zero tax and no breakdown for zero income', () => {
      const result = calculateBracketTax(0, 'SINGLE', table2024);

      expect(result.totalTax.isZero()).toBe(true);
      expect(result.breakdown).toHaveLength(0);
      expect(result.effectiveRate.isZero()).toBe(true);
      expect(result.marginalRate.toString()).toBe('0.1');
    });

    it('should use MFJ brackets', () => {
      // $2,320 + 12% of ($80,000 - $23,200)
      const result = calculateBracketTax(80000, 'MARRIED_FILING_JOINTLY', table2024);
      expect(result.totalTax.toFixed(2)).toBe('9136.00');
    });

    it('should reach the unbounded top bracket', () => {
      // $183,647.25 through $609,350, then 37% of $90,650
      const result = calculateBracketTax(700000, 'SINGLE', table2024);

      expect(result.totalTax.toFixed(2)).toBe('217187.75');
      expect(result.breakdown).toHaveLength(7);
      expect(result.breakdown[6].bracketMax).toBeNull();
      expect(result.breakdown[6].taxableInBracket.toString()).toBe('90650');
      expect(result.marginalRate.toString()).toBe('0.37');
    });

    it('should accept numeric strings', () => {
      const result = calculateBracketTax('16550', 'HEAD_OF_HOUSEHOLD', table2024);
      expect(result.totalTax.toFixed(2)).toBe('1655.00');
    });

    it('should reject negative income as an internal error', () => {
      expect(() => calculateBracketTax(-1, 'SINGLE', table2024)).toThrow(AppError);
      try {
        calculateBracketTax(-1, 'SINGLE', table2024);
      } catch (error) {
        expect(error).toBeInstanceOf(AppError);
        if (error instanceof AppError) {
          expect(error.code).toBe('INTERNAL_ERROR');
          expect(error.isOperational).toBe(false);
        }
      }
    });
  });

  describe('bracket boundaries', () => {
    it('should be continuous across the 12% / 22% boundary', () => {
      expect(bracketTaxUnrounded(decimal('47149.99'), singleBrackets).toString()).toBe('5425.9988');
      expect(bracketTaxUnrounded(decimal('47150'), singleBrackets).toString()).toBe('5426');
      expect(bracketTaxUnrounded(decimal('47150.01'), singleBrackets).toString()).toBe('5426.0022');
    });

    it('should be monotonic in income', () => {
      let previous = decimal(0);
      for (let income = 0; income <= 800000; income += 12345) {
        const tax = calculateBracketTax(income, 'SINGLE', table2024).totalTax;
        expect(tax.greaterThanOrEqualTo(previous)).toBe(true);
        previous = tax;
      }
    });
  });

  describe('marginal rate queries', () => {
    it('should assign a boundary amount to the lower tier it completes', () => {
      expect(marginalRate(decimal(47150), 'SINGLE', table2024).toString()).toBe('0.12');
      expect(marginalRate(decimal('47150.01'), 'SINGLE', table2024).toString()).toBe('0.22');
    });

    it('should report the rate on the next dollar from a boundary', () => {
      expect(rateForNextDollar(decimal(47150), 'SINGLE', table2024).toString()).toBe('0.22');
      expect(rateForNextDollar(decimal(0), 'SINGLE', table2024).toString()).toBe('0.1');
      expect(rateForNextDollar(decimal(1000000), 'SINGLE', table2024).toString()).toBe('0.37');
    });
  });
});
