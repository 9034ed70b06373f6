// Shared types between the engine and its callers

export const FILING_STATUSES = [
  'SINGLE',
  'MARRIED_FILING_JOINTLY',
  'MARRIED_FILING_SEPARATELY',
  'HEAD_OF_HOUSEHOLD',
  'QUALIFYING_SURVIVING_SPOUSE'
] as const;

export type FilingStatus = typeof FILING_STATUSES[number];

export type DeductionMethod = 'STANDARD' | 'ITEMIZED';

// Amounts on the wire: JSON numbers or numeric strings ("1234.56")
export type AmountInput = number | string;

export interface W2Json {
  wages: AmountInput;
  federalWithholding?: AmountInput;
  socialSecurityWages?: AmountInput;
  medicareWages?: AmountInput;
  socialSecurityTaxWithheld?: AmountInput;
  medicareTaxWithheld?: AmountInput;
}

export interface Form1099NecJson {
  compensation: AmountInput;
}

export interface Form1099IntJson {
  interest: AmountInput;
}

export interface Form1099DivJson {
  ordinaryDividends: AmountInput;
  qualifiedDividends?: AmountInput;
}

export interface Form1099BJson {
  shortTermGains?: AmountInput;
  longTermGains?: AmountInput;
}

export interface ItemizedDeductionsJson {
  medical?: AmountInput;
  stateAndLocalTaxes?: AmountInput;
  mortgageInterest?: AmountInput;
  charitable?: AmountInput;
  casualty?: AmountInput;
  other?: AmountInput;
}

/**
 * A tax return as submitted by a caller, before validation
 */
export interface TaxReturnJson {
  filingStatus: FilingStatus;
  isOver65?: boolean;
  isBlind?: boolean;
  w2s?: W2Json[];
  form1099Nec?: Form1099NecJson[];
  form1099Int?: Form1099IntJson[];
  form1099Div?: Form1099DivJson[];
  form1099B?: Form1099BJson[];
  itemizedDeductions?: ItemizedDeductionsJson | null;
  forceStandardDeduction?: boolean;
  hsaDeduction?: AmountInput;
  studentLoanInterest?: AmountInput;
  educatorExpenses?: AmountInput;
  iraDeduction?: AmountInput;
  selfEmployedHealthInsurance?: AmountInput;
  qualifyingChildren?: number;
  estimatedPayments?: AmountInput;
}

/**
 * One row of calculation history, amounts as decimal strings
 */
export interface StoredCalculationSummary {
  id: number;
  createdAt: string;
  filingStatus: FilingStatus;
  totalIncome: string;
  agi: string;
  taxableIncome: string;
  federalTax: string;
  totalCredits: string;
  totalTax: string;
  effectiveRate: string;
  marginalRate: string;
  refundOrOwed: string;
}
