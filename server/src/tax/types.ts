/**
 * Engine types: the validated return and the result of every pipeline stage.
 * All amounts are Decimal; every field is readonly.
 */

import type { DeductionMethod, FilingStatus } from '../../../shared/types/index.js';
import type { Decimal } from '../utils/decimal.js';

export type { DeductionMethod, FilingStatus };

// ── Input ──────────────────────────────────────────────────────

export interface W2 {
  readonly wages: Decimal;                     // Box 1
  readonly federalWithholding: Decimal;        // Box 2
  readonly socialSecurityWages: Decimal;       // Box 3
  readonly socialSecurityTaxWithheld: Decimal; // Box 4
  readonly medicareWages: Decimal;             // Box 5
  readonly medicareTaxWithheld: Decimal;       // Box 6
}

export interface Form1099Nec {
  readonly compensation: Decimal;
}

export interface Form1099Int {
  readonly interest: Decimal;
}

export interface Form1099Div {
  readonly ordinaryDividends: Decimal;
  readonly qualifiedDividends: Decimal;
}

// Gains may be negative (losses)
export interface Form1099B {
  readonly shortTermGains: Decimal;
  readonly longTermGains: Decimal;
}

export interface ItemizedDeductions {
  readonly medical: Decimal;
  readonly stateAndLocalTaxes: Decimal;
  readonly mortgageInterest: Decimal;
  readonly charitable: Decimal;
  readonly casualty: Decimal;
  readonly other: Decimal;
}

export interface AboveLineDeductions {
  readonly hsaDeduction: Decimal;
  readonly studentLoanInterest: Decimal;
  readonly educatorExpenses: Decimal;
  readonly iraDeduction: Decimal;
  readonly selfEmployedHealthInsurance: Decimal;
}

export interface TaxReturnInput {
  readonly filingStatus: FilingStatus;
  readonly isOver65: boolean;
  readonly isBlind: boolean;
  readonly w2s: readonly W2[];
  readonly form1099Nec: readonly Form1099Nec[];
  readonly form1099Int: readonly Form1099Int[];
  readonly form1099Div: readonly Form1099Div[];
  readonly form1099B: readonly Form1099B[];
  readonly itemizedDeductions: ItemizedDeductions | null; // null = standard deduction path
  readonly forceStandardDeduction: boolean;
  readonly aboveLineDeductions: AboveLineDeductions;
  readonly qualifyingChildren: number;
  readonly estimatedPayments: Decimal;
}

// ── Stage results ──────────────────────────────────────────────

export interface IncomeResult {
  readonly wages: Decimal;
  readonly socialSecurityWages: Decimal;
  readonly medicareWages: Decimal;
  readonly selfEmploymentIncome: Decimal;
  readonly interestIncome: Decimal;
  readonly ordinaryDividends: Decimal;
  readonly qualifiedDividends: Decimal;
  readonly shortTermGains: Decimal;
  readonly longTermGains: Decimal;
  readonly totalGrossIncome: Decimal;
  // Not floored; a net loss makes this smaller or negative
  readonly netInvestmentIncome: Decimal;
}

export interface FicaResult {
  readonly socialSecurityTax: Decimal;
  readonly medicareTax: Decimal;
  readonly additionalMedicareTax: Decimal;
  readonly selfEmploymentTaxableBase: Decimal;
  readonly selfEmploymentSocialSecurityTax: Decimal;
  readonly selfEmploymentMedicareTax: Decimal;
  readonly selfEmploymentTax: Decimal;
  readonly selfEmploymentTaxDeduction: Decimal;
  readonly totalFica: Decimal;
}

export interface AgiResult {
  readonly totalGrossIncome: Decimal;
  readonly totalAboveLineDeductions: Decimal;
  readonly agi: Decimal;
}

export interface StandardDeductionResult {
  readonly baseAmount: Decimal;
  readonly additionalAmount: Decimal;
  readonly totalDeduction: Decimal;
}

export interface DeductionResult {
  readonly standardDeductionAmount: Decimal;
  readonly itemizedTotal: Decimal;
  readonly method: DeductionMethod;
  readonly deductionAmount: Decimal;
  readonly taxableIncome: Decimal;
  readonly ordinaryTaxableIncome: Decimal;
  readonly preferentialLongTermGains: Decimal;
  readonly preferentialQualifiedDividends: Decimal;
  readonly preferentialIncome: Decimal;
}

export interface BracketDetail {
  readonly rate: Decimal;
  readonly bracketMin: Decimal;
  readonly bracketMax: Decimal | null;
  readonly taxableInBracket: Decimal;
  readonly taxInBracket: Decimal; // rounded for display only
}

export interface RateTranche {
  readonly rate: Decimal;
  readonly min: Decimal;
  readonly max: Decimal | null;
}

export interface TrancheDetail extends RateTranche {
  readonly amount: Decimal;
  readonly tax: Decimal; // rounded for display only
}

export interface TaxComputationResult {
  readonly ordinaryTax: Decimal;
  readonly qualifiedDividendTax: Decimal;
  readonly capitalGainsTax: Decimal;
  readonly niit: Decimal;
  readonly totalIncomeTax: Decimal;
  readonly ordinaryBreakdown: readonly BracketDetail[];
  readonly preferentialTranches: readonly TrancheDetail[];
}

export interface CreditsResult {
  readonly childTaxCredit: Decimal;
  readonly nonrefundableApplied: Decimal;
  readonly refundableApplied: Decimal;
  readonly totalCreditsApplied: Decimal;
  readonly taxAfterCredits: Decimal;
}

export interface TaxSummary {
  readonly filingStatus: FilingStatus;
  readonly totalIncome: Decimal;
  readonly agi: Decimal;
  readonly deductionAmount: Decimal;
  readonly taxableIncome: Decimal;
  readonly totalIncomeTaxBeforeCredits: Decimal;
  readonly totalCredits: Decimal;
  readonly incomeTaxAfterCredits: Decimal;
  readonly totalFica: Decimal;
  readonly totalTax: Decimal;
  readonly effectiveRate: Decimal;
  readonly marginalRate: Decimal;
  readonly totalWithholding: Decimal;
  readonly estimatedPayments: Decimal;
  readonly totalPayments: Decimal;
  readonly refundableCredits: Decimal;
  // Positive = refund, negative = amount owed
  readonly refundOrOwed: Decimal;
}

export interface FullTaxCalculationResult {
  readonly taxYear: number;
  readonly income: IncomeResult;
  readonly fica: FicaResult;
  readonly agi: AgiResult;
  readonly deductions: DeductionResult;
  readonly taxComputation: TaxComputationResult;
  readonly credits: CreditsResult;
  readonly summary: TaxSummary;
}
