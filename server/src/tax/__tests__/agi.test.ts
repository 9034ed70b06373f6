import { describe, it, expect } from '@jest/globals';
import type { TaxReturnJson } from '../../../../shared/types';
import { calculateAgi } from '../agi';
import { calculateFica } from '../fica';
import { aggregateIncome } from '../income';
import { buildReturn, table2024 } from './helpers';

function agiFor(json: TaxReturnJson) {
  const input = buildReturn(json);
  const income = aggregateIncome(input);
  const fica = calculateFica(income, input.filingStatus, table2024);
  return calculateAgi(income, fica, input.aboveLineDeductions);
}

describe('AGI Calculator', () => {
  it('should equal gross income without adjustments', () => {
    const agi = agiFor({ filingStatus: 'SINGLE', w2s: [{ wages: 50000 }] });

    expect(agi.totalGrossIncome.toFixed(2)).toBe('50000.00');
    expect(agi.totalAboveLineDeductions.isZero()).toBe(true);
    expect(agi.agi.toFixed(2)).toBe('50000.00');
  });

  it('should subtract half of SE tax with the other above-the-line deductions', () => {
    const agi = agiFor({
      filingStatus: 'SINGLE',
      form1099Nec: [{ compensation: 40000 }],
      hsaDeduction: 1000,
      studentLoanInterest: 2500
    });

    // $1,000 + $2,500 + $2,825.91
    expect(agi.totalAboveLineDeductions.toFixed(2)).toBe('6325.91');
    expect(agi.agi.toFixed(2)).toBe('33674.09');
  });

  it('should sum every adjustment category', () => {
    const agi = agiFor({
      filingStatus: 'MARRIED_FILING_JOINTLY',
      w2s: [{ wages: 120000 }],
      hsaDeduction: 3000,
      studentLoanInterest: 2500,
      educatorExpenses: 300,
      iraDeduction: 7000,
      selfEmployedHealthInsurance: 0
    });

    expect(agi.totalAboveLineDeductions.toFixed(2)).toBe('12800.00');
    expect(agi.agi.toFixed(2)).toBe('107200.00');
  });

  it('should not floor AGI at zero', () => {
    const agi = agiFor({ filingStatus: 'SINGLE', w2s: [{ wages: 1000 }], iraDeduction: 5000 });

    expect(agi.agi.toFixed(2)).toBe('-4000.00');
  });
});
