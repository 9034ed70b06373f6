/**
 * Decimal.js Utility Tests
 *
 * Exact construction, cent rounding, and display formatting.
 */

import { describe, it, expect } from '@jest/globals';
import {
  decimal,
  sum,
  sumBy,
  min,
  max,
  nonNegative,
  roundCents,
  roundRate,
  formatCurrency,
  formatPercent
} from '../decimal';

describe('Decimal Utility Functions', () => {
  describe('decimal()', () => {
    it('should create decimal from number', () => {
      expect(decimal(10.5).toString()).toBe('10.5');
    });

    it('should create decimal from string', () => {
      expect(decimal('10.50').toFixed(2)).toBe('10.50');
    });

    it('should keep rates intact instead of rounding to cents', () => {
      expect(decimal('0.0145').toString()).toBe('0.0145');
      expect(decimal('0.9235').toString()).toBe('0.9235');
    });
  });

  describe('sum()', () => {
    it('should add without floating-point error', () => {
      // 0.1 + 0.2 = 0.30000000000000004 with numbers
      expect(sum(0.1, 0.2).toString()).toBe('0.3');
    });

    it('should add 100 pennies to exactly one dollar', () => {
      const pennies = Array.from({ length: 100 }, () => '0.01');
      expect(sum(...pennies).toFixed(2)).toBe('1.00');
    });

    it('should return zero for no values', () => {
      expect(sum().isZero()).toBe(true);
    });
  });

  describe('sumBy()', () => {
    it('should total one field across records', () => {
      const records = [{ wages: decimal('1000.10') }, { wages: decimal('2000.20') }];
      expect(sumBy(records, r => r.wages).toFixed(2)).toBe('3000.30');
    });
  });

  describe('min() / max() / nonNegative()', () => {
    it('should pick the smaller and larger value', () => {
      expect(min(5, '3.5', 10).toString()).toBe('3.5');
      expect(max(5, '3.5', 10).toString()).toBe('10');
    });

    it('should floor negatives at zero', () => {
      expect(nonNegative(-25).isZero()).toBe(true);
      expect(nonNegative(25).toString()).toBe('25');
    });
  });

  describe('roundCents()', () => {
    it('should round half up', () => {
      expect(roundCents('10.555').toFixed(2)).toBe('10.56');
      expect(roundCents('10.554').toFixed(2)).toBe('10.55');
    });

    it('should round negative ties away from zero', () => {
      expect(roundCents('-10.555').toFixed(2)).toBe('-10.56');
    });

    it('should produce the SE tax half exactly', () => {
      // 5,651.82 / 2 = 2,825.91
      expect(roundCents(decimal('5651.82').times('0.5')).toFixed(2)).toBe('2825.91');
    });
  });

  describe('roundRate()', () => {
    it('should round ratios to six places', () => {
      expect(roundRate(decimal(1).dividedBy(3)).toString()).toBe('0.333333');
      expect(roundRate(decimal(2).dividedBy(3)).toString()).toBe('0.666667');
    });
  });

  describe('formatCurrency()', () => {
    it('should group thousands and show cents', () => {
      expect(formatCurrency(1234.5)).toBe('$1,234.50');
      expect(formatCurrency('1234567.891')).toBe('$1,234,567.89');
    });

    it('should prefix negatives with a minus sign', () => {
      expect(formatCurrency(-1234.56)).toBe('-$1,234.56');
    });

    it('should normalize negative zero', () => {
      expect(formatCurrency('-0.001')).toBe('$0.00');
      expect(formatCurrency(0)).toBe('$0.00');
    });

    it('should not group amounts under one thousand', () => {
      expect(formatCurrency(999.99)).toBe('$999.99');
    });
  });

  describe('formatPercent()', () => {
    it('should format a rate as a percentage', () => {
      expect(formatPercent('0.22')).toBe('22.00%');
      expect(formatPercent('0.123456', 1)).toBe('12.3%');
      expect(formatPercent('0.37', 0)).toBe('37%');
    });
  });
});
