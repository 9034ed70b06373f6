/**
 * Input Boundary
 *
 * Turns untyped return JSON into a TaxReturnInput, or throws the domain error
 * describing what is wrong with it. Amounts may be JSON numbers or numeric
 * strings; every amount becomes an exact Decimal.
 *
 * Error kinds, in order of precedence:
 * - InvalidFilingStatusError: filing status outside the recognized set
 * - IncompleteInputError: required field missing, or wrong structure
 * - ValidationError: amount format or sign, qualified > ordinary dividends,
 *   qualifying-child count
 *
 * Messages name the record and its 1-based position: "W-2 #2: wages must be non-negative".
 */

import { z } from 'zod';
import { FILING_STATUSES } from '../../../shared/types/index.js';
import {
  IncompleteInputError,
  InvalidFilingStatusError,
  UnsupportedScenarioError,
  ValidationError,
  type InputIssue
} from '../utils/AppError.js';
import { Decimal, ZERO, decimal, formatCurrency } from '../utils/decimal.js';
import { calculateAgi } from './agi.js';
import { calculateFica } from './fica.js';
import { aggregateIncome, netCapitalLoss } from './income.js';
import { ratesFor, type RateTable } from './rateTable.js';
import type { FilingStatus, TaxReturnInput } from './types.js';

type IssueKind = 'incomplete' | 'invalid';

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

function parseAmount(value: unknown): Decimal | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? decimal(value) : null;
  }
  if (typeof value === 'string' && AMOUNT_PATTERN.test(value.trim())) {
    return decimal(value.trim());
  }
  return null;
}

function report(ctx: z.RefinementCtx, kind: IssueKind, message: string): never {
  ctx.addIssue({ code: z.ZodIssueCode.custom, message, params: { kind } });
  return z.NEVER;
}

function checkAmount(value: unknown, signed: boolean, ctx: z.RefinementCtx): Decimal {
  const parsed = parseAmount(value);
  if (parsed === null) {
    return report(ctx, 'invalid', 'must be a numeric amount');
  }
  if (parsed.decimalPlaces() > 2) {
    return report(ctx, 'invalid', 'must have at most two decimal places');
  }
  // -0 and "-0.00" are zero
  if (parsed.isZero()) {
    return ZERO;
  }
  if (!signed && parsed.isNegative()) {
    return report(ctx, 'invalid', 'must be non-negative');
  }
  return parsed;
}

interface AmountOptions {
  required?: boolean;
  signed?: boolean; // capital gains may be losses
}

/**
 * Monetary field. Optional amounts default to zero.
 */
function amount({ required = false, signed = false }: AmountOptions = {}) {
  return z.unknown().transform((value, ctx): Decimal => {
    if (value === undefined || value === null) {
      return required ? report(ctx, 'incomplete', 'is required') : ZERO;
    }
    return checkAmount(value, signed, ctx);
  });
}

/**
 * Amount that falls back to another field when absent (W-2 Boxes 3 and 5)
 */
function optionalAmount() {
  return z.unknown().transform((value, ctx): Decimal | null =>
    value === undefined || value === null ? null : checkAmount(value, false, ctx)
  );
}

const childCount = z.unknown().transform((value, ctx): number => {
  if (value === undefined || value === null) return 0;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    return report(ctx, 'invalid', 'must be a whole number');
  }
  if (value < 0) {
    return report(ctx, 'invalid', 'must be non-negative');
  }
  return value;
});

const w2Schema = z
  .object({
    wages: amount({ required: true }),
    federalWithholding: amount(),
    socialSecurityWages: optionalAmount(),
    medicareWages: optionalAmount(),
    socialSecurityTaxWithheld: amount(),
    medicareTaxWithheld: amount()
  })
  .transform(w2 => ({
    ...w2,
    socialSecurityWages: w2.socialSecurityWages ?? w2.wages,
    medicareWages: w2.medicareWages ?? w2.wages
  }));

const form1099DivSchema = z
  .object({
    ordinaryDividends: amount({ required: true }),
    qualifiedDividends: amount()
  })
  .superRefine((div, ctx) => {
    // Fields that failed their own checks are not compared
    if (!Decimal.isDecimal(div.ordinaryDividends) || !Decimal.isDecimal(div.qualifiedDividends)) return;
    if (div.qualifiedDividends.greaterThan(div.ordinaryDividends)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['qualifiedDividends'],
        message: 'must not exceed ordinaryDividends',
        params: { kind: 'invalid' }
      });
    }
  });

const itemizedSchema = z.object({
  medical: amount(),
  stateAndLocalTaxes: amount(),
  mortgageInterest: amount(),
  charitable: amount(),
  casualty: amount(),
  other: amount()
});

const records = <T extends z.ZodTypeAny>(schema: T) => z.array(schema).default([]);

export const taxReturnSchema = z.object({
  filingStatus: z.enum(FILING_STATUSES),
  isOver65: z.boolean().default(false),
  isBlind: z.boolean().default(false),
  w2s: records(w2Schema),
  form1099Nec: records(z.object({ compensation: amount({ required: true }) })),
  form1099Int: records(z.object({ interest: amount({ required: true }) })),
  form1099Div: records(form1099DivSchema),
  form1099B: records(z.object({
    shortTermGains: amount({ signed: true }),
    longTermGains: amount({ signed: true })
  })),
  itemizedDeductions: itemizedSchema.nullable().default(null),
  forceStandardDeduction: z.boolean().default(false),
  hsaDeduction: amount(),
  studentLoanInterest: amount(),
  educatorExpenses: amount(),
  iraDeduction: amount(),
  selfEmployedHealthInsurance: amount(),
  qualifyingChildren: childCount,
  estimatedPayments: amount()
});

export const estimateRequestSchema = z.object({
  grossIncome: amount({ required: true }),
  filingStatus: z.enum(FILING_STATUSES)
});

export interface EstimateRequest {
  readonly grossIncome: Decimal;
  readonly filingStatus: FilingStatus;
}

// ── Issue translation ──────────────────────────────────────────

const RECORD_LABELS: Record<string, string> = {
  w2s: 'W-2',
  form1099Nec: '1099-NEC',
  form1099Int: '1099-INT',
  form1099Div: '1099-DIV',
  form1099B: '1099-B',
  itemizedDeductions: 'Itemized deductions'
};

function issueText(issue: z.ZodIssue): string {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      if (issue.received === 'undefined') return 'is required';
      return issue.path[0] === 'filingStatus'
        ? `must be one of ${FILING_STATUSES.join(', ')}`
        : `must be ${issue.expected}`;
    case z.ZodIssueCode.invalid_enum_value:
      return `must be one of ${issue.options.join(', ')}`;
    default:
      return issue.message;
  }
}

function describeIssue(issue: z.ZodIssue): InputIssue {
  const [head, index, ...rest] = issue.path;
  const text = issueText(issue);
  const label = typeof head === 'string' ? RECORD_LABELS[head] : undefined;

  if (label && typeof index === 'number') {
    const field = rest.join('.');
    return { field: issue.path.join('.'), message: `${label} #${index + 1}: ${field} ${text}` };
  }
  if (label === RECORD_LABELS.itemizedDeductions && index !== undefined) {
    return { field: issue.path.join('.'), message: `${label}: ${[index, ...rest].join('.')} ${text}` };
  }

  const field = issue.path.length > 0 ? issue.path.join('.') : 'Tax return';
  return { field, message: `${field} ${text}` };
}

function classify(issue: z.ZodIssue): 'filingStatus' | IssueKind {
  const missing = issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined';

  if (issue.path[0] === 'filingStatus' && !missing) {
    return 'filingStatus';
  }
  if (issue.code === z.ZodIssueCode.custom) {
    return issue.params?.kind === 'incomplete' ? 'incomplete' : 'invalid';
  }
  if (issue.code === z.ZodIssueCode.invalid_type || issue.code === z.ZodIssueCode.invalid_union) {
    return 'incomplete';
  }
  return 'invalid';
}

/**
 * Raise the highest-precedence domain error for a failed parse
 */
function throwInputError(error: z.ZodError): never {
  const grouped: Record<'filingStatus' | IssueKind, InputIssue[]> = {
    filingStatus: [],
    incomplete: [],
    invalid: []
  };
  for (const issue of error.issues) {
    grouped[classify(issue)].push(describeIssue(issue));
  }

  if (grouped.filingStatus.length > 0) {
    throw new InvalidFilingStatusError(grouped.filingStatus[0].message, grouped.filingStatus);
  }
  if (grouped.incomplete.length > 0) {
    throw new IncompleteInputError(grouped.incomplete[0].message, grouped.incomplete);
  }
  throw new ValidationError(grouped.invalid[0].message, grouped.invalid);
}

export function parseTaxReturn(raw: unknown): TaxReturnInput {
  const parsed = taxReturnSchema.safeParse(raw);
  if (!parsed.success) {
    throwInputError(parsed.error);
  }

  const data = parsed.data;
  return {
    filingStatus: data.filingStatus,
    isOver65: data.isOver65,
    isBlind: data.isBlind,
    w2s: data.w2s,
    form1099Nec: data.form1099Nec,
    form1099Int: data.form1099Int,
    form1099Div: data.form1099Div,
    form1099B: data.form1099B,
    itemizedDeductions: data.itemizedDeductions,
    forceStandardDeduction: data.forceStandardDeduction,
    aboveLineDeductions: {
      hsaDeduction: data.hsaDeduction,
      studentLoanInterest: data.studentLoanInterest,
      educatorExpenses: data.educatorExpenses,
      iraDeduction: data.iraDeduction,
      selfEmployedHealthInsurance: data.selfEmployedHealthInsurance
    },
    qualifyingChildren: data.qualifyingChildren,
    estimatedPayments: data.estimatedPayments
  };
}

export function parseEstimateRequest(raw: unknown): EstimateRequest {
  const parsed = estimateRequestSchema.safeParse(raw);
  if (!parsed.success) {
    throwInputError(parsed.error);
  }
  return parsed.data;
}

/**
 * Reject returns the pipeline does not model:
 * - a net capital loss above the annual deduction limit (carryover is not tracked)
 * - a negative AGI
 */
export function assertSupportedScenario(input: TaxReturnInput, table: RateTable): void {
  const income = aggregateIncome(input);

  const loss = netCapitalLoss(income);
  const limit = ratesFor(table, input.filingStatus).capitalLossLimit;
  if (loss.greaterThan(limit)) {
    throw new UnsupportedScenarioError(
      `Net capital loss of ${formatCurrency(loss)} exceeds the ${formatCurrency(limit)} annual limit; loss carryover is not modeled`,
      { netCapitalLoss: loss.toFixed(2), limit: limit.toFixed(2) }
    );
  }

  const fica = calculateFica(income, input.filingStatus, table);
  const agi = calculateAgi(income, fica, input.aboveLineDeductions);
  if (agi.agi.isNegative()) {
    throw UnsupportedScenarioError.negativeAgi(agi.agi.toFixed(2));
  }
}
