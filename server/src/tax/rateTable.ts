/**
 * Federal Rate Table Loader
 *
 * Loads one tax year's brackets, deductions and thresholds from JSON
 * configuration so a new year is a new file, not a code change.
 *
 * Configuration files are located in:
 * - src/tax/config/federal-{year}.json (or RATE_TABLE_DIR)
 *
 * The loaded table is validated, converted to Decimal and frozen. Every
 * pipeline stage receives it as an argument; nothing reads it from module scope.
 */

import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import NodeCache from 'node-cache';
import { z } from 'zod';
import type { FilingStatus } from '../../../shared/types/index.js';
import { config } from '../config.js';
import { logger } from '../services/logger.js';
import { AppError, UnsupportedScenarioError } from '../utils/AppError.js';
import { Decimal, decimal } from '../utils/decimal.js';

export interface TaxBracket {
  readonly min: Decimal;
  readonly max: Decimal | null; // null = top bracket, unbounded
  readonly rate: Decimal;
}

export interface CapitalGainsBreakpoints {
  readonly zeroRateMax: Decimal;    // B0: 0% / 15% boundary
  readonly fifteenRateMax: Decimal; // B1: 15% / 20% boundary
}

export interface FilingStatusRates {
  readonly brackets: readonly TaxBracket[];
  readonly standardDeduction: Decimal;
  readonly additionalStandardDeduction: Decimal; // per over-65 / blind flag
  readonly capitalGainsBreakpoints: CapitalGainsBreakpoints;
  readonly niitThreshold: Decimal;
  readonly additionalMedicareThreshold: Decimal;
  readonly childTaxCreditPhaseOutThreshold: Decimal;
  readonly capitalLossLimit: Decimal;
}

export interface FicaRates {
  readonly socialSecurityRate: Decimal;
  readonly socialSecurityWageBase: Decimal;
  readonly medicareRate: Decimal;
  readonly additionalMedicareRate: Decimal;
  readonly selfEmploymentTaxableFraction: Decimal;
  readonly selfEmploymentSocialSecurityRate: Decimal;
  readonly selfEmploymentMedicareRate: Decimal;
  readonly selfEmploymentDeductibleFraction: Decimal;
}

export interface ChildTaxCreditRates {
  readonly amountPerChild: Decimal;
  readonly refundablePerChild: Decimal;
  readonly phaseOutReduction: Decimal; // per increment (or fraction) over threshold
  readonly phaseOutIncrement: Decimal;
}

export interface RateTable {
  readonly year: number;
  readonly effectiveDate: string;
  readonly source: string;
  readonly filingStatuses: Readonly<Record<FilingStatus, FilingStatusRates>>;
  readonly capitalGainsRates: {
    readonly zero: Decimal;
    readonly fifteen: Decimal;
    readonly twenty: Decimal;
  };
  readonly fica: FicaRates;
  readonly niitRate: Decimal;
  readonly childTaxCredit: ChildTaxCreditRates;
}

// ── Schema ─────────────────────────────────────────────────────

const amount = z.number().finite().nonnegative();
const rate = z.number().min(0).max(1);

const bracketSchema = z.object({
  min: amount,
  max: amount.nullable(),
  rate
});

type BracketJson = z.infer<typeof bracketSchema>;

/**
 * Brackets must start at 0, be contiguous, and end with one unbounded tier
 */
function checkBrackets(brackets: BracketJson[], ctx: z.RefinementCtx): void {
  brackets.forEach((bracket, index) => {
    const isLast = index === brackets.length - 1;

    if (index === 0 && bracket.min !== 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'min'], message: 'first bracket must start at 0' });
    }
    if (isLast && bracket.max !== null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'max'], message: 'top bracket must be unbounded (null)' });
    }
    if (!isLast) {
      if (bracket.max === null || bracket.max <= bracket.min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'max'], message: 'bracket max must exceed min' });
      } else if (brackets[index + 1].min !== bracket.max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index + 1, 'min'], message: 'brackets must be contiguous' });
      }
      if (brackets[index + 1].rate < bracket.rate) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index + 1, 'rate'], message: 'bracket rates must not decrease' });
      }
    }
  });
}

const filingStatusSchema = z.object({
  brackets: z.array(bracketSchema).min(1).superRefine(checkBrackets),
  standardDeduction: amount,
  additionalStandardDeduction: amount,
  capitalGainsBreakpoints: z
    .object({ zeroRateMax: amount, fifteenRateMax: amount })
    .refine(b => b.zeroRateMax < b.fifteenRateMax, 'zeroRateMax must be below fifteenRateMax'),
  niitThreshold: amount,
  additionalMedicareThreshold: amount,
  childTaxCreditPhaseOutThreshold: amount,
  capitalLossLimit: amount
});

type FilingStatusJson = z.infer<typeof filingStatusSchema>;

export const rateTableSchema = z.object({
  year: z.number().int().min(2000).max(2100),
  effectiveDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  source: z.string().default(''),
  filingStatuses: z.object({
    SINGLE: filingStatusSchema,
    MARRIED_FILING_JOINTLY: filingStatusSchema,
    MARRIED_FILING_SEPARATELY: filingStatusSchema,
    HEAD_OF_HOUSEHOLD: filingStatusSchema,
    QUALIFYING_SURVIVING_SPOUSE: filingStatusSchema
  }),
  capitalGainsRates: z.object({ zero: rate, fifteen: rate, twenty: rate }),
  fica: z.object({
    socialSecurityRate: rate,
    socialSecurityWageBase: amount,
    medicareRate: rate,
    additionalMedicareRate: rate,
    selfEmploymentTaxableFraction: rate,
    selfEmploymentSocialSecurityRate: rate,
    selfEmploymentMedicareRate: rate,
    selfEmploymentDeductibleFraction: rate
  }),
  niitRate: rate,
  childTaxCredit: z.object({
    amountPerChild: amount,
    refundablePerChild: amount,
    phaseOutReduction: amount,
    phaseOutIncrement: amount.positive()
  })
});

// ── Conversion ─────────────────────────────────────────────────

function toStatusRates(json: FilingStatusJson): FilingStatusRates {
  return {
    brackets: json.brackets.map(b => ({
      min: decimal(b.min),
      max: b.max === null ? null : decimal(b.max),
      rate: decimal(b.rate)
    })),
    standardDeduction: decimal(json.standardDeduction),
    additionalStandardDeduction: decimal(json.additionalStandardDeduction),
    capitalGainsBreakpoints: {
      zeroRateMax: decimal(json.capitalGainsBreakpoints.zeroRateMax),
      fifteenRateMax: decimal(json.capitalGainsBreakpoints.fifteenRateMax)
    },
    niitThreshold: decimal(json.niitThreshold),
    additionalMedicareThreshold: decimal(json.additionalMedicareThreshold),
    childTaxCreditPhaseOutThreshold: decimal(json.childTaxCreditPhaseOutThreshold),
    capitalLossLimit: decimal(json.capitalLossLimit)
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Decimal.isDecimal(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate raw configuration and build a frozen RateTable
 */
export function parseRateTable(raw: unknown): RateTable {
  const parsed = rateTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message
    }));
    throw new AppError('Invalid federal rate table configuration', 'RATE_TABLE_INVALID', false, issues);
  }

  const json = parsed.data;
  const fica = json.fica;

  return deepFreeze<RateTable>({
    year: json.year,
    effectiveDate: json.effectiveDate,
    source: json.source,
    filingStatuses: {
      SINGLE: toStatusRates(json.filingStatuses.SINGLE),
      MARRIED_FILING_JOINTLY: toStatusRates(json.filingStatuses.MARRIED_FILING_JOINTLY),
      MARRIED_FILING_SEPARATELY: toStatusRates(json.filingStatuses.MARRIED_FILING_SEPARATELY),
      HEAD_OF_HOUSEHOLD: toStatusRates(json.filingStatuses.HEAD_OF_HOUSEHOLD),
      QUALIFYING_SURVIVING_SPOUSE: toStatusRates(json.filingStatuses.QUALIFYING_SURVIVING_SPOUSE)
    },
    capitalGainsRates: {
      zero: decimal(json.capitalGainsRates.zero),
      fifteen: decimal(json.capitalGainsRates.fifteen),
      twenty: decimal(json.capitalGainsRates.twenty)
    },
    fica: {
      socialSecurityRate: decimal(fica.socialSecurityRate),
      socialSecurityWageBase: decimal(fica.socialSecurityWageBase),
      medicareRate: decimal(fica.medicareRate),
      additionalMedicareRate: decimal(fica.additionalMedicareRate),
      selfEmploymentTaxableFraction: decimal(fica.selfEmploymentTaxableFraction),
      selfEmploymentSocialSecurityRate: decimal(fica.selfEmploymentSocialSecurityRate),
      selfEmploymentMedicareRate: decimal(fica.selfEmploymentMedicareRate),
      selfEmploymentDeductibleFraction: decimal(fica.selfEmploymentDeductibleFraction)
    },
    niitRate: decimal(json.niitRate),
    childTaxCredit: {
      amountPerChild: decimal(json.childTaxCredit.amountPerChild),
      refundablePerChild: decimal(json.childTaxCredit.refundablePerChild),
      phaseOutReduction: decimal(json.childTaxCredit.phaseOutReduction),
      phaseOutIncrement: decimal(json.childTaxCredit.phaseOutIncrement)
    }
  });
}

// ── Loading ────────────────────────────────────────────────────

// Tables never change once loaded
const rateTableCache = new NodeCache({
  stdTTL: 0,
  useClones: false
});

function resolveConfigDir(configDir?: string): string {
  return configDir ?? config.rateTableDir ?? join(__dirname, 'config');
}

/**
 * Load the federal rate table for a specific year.
 * There is no fallback to another year: a missing file is an unsupported scenario.
 */
export function loadRateTable(year: number, configDir?: string): RateTable {
  const dir = resolveConfigDir(configDir);
  const cacheKey = `${dir}:${year}`;

  const cached = rateTableCache.get<RateTable>(cacheKey);
  if (cached) {
    return cached;
  }

  const configPath = join(dir, `federal-${year}.json`);
  if (!existsSync(configPath)) {
    throw UnsupportedScenarioError.unknownTaxYear(year, getAvailableTaxYears(dir));
  }

  const raw: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
  const table = parseRateTable(raw);

  if (table.year !== year) {
    throw new AppError(
      `Rate table ${configPath} declares year ${table.year}, expected ${year}`,
      'RATE_TABLE_INVALID',
      false
    );
  }

  rateTableCache.set(cacheKey, table);
  logger.debug(`Loaded federal rate table for ${year}`, { configPath });
  return table;
}

/**
 * Get all tax years with a rate table, newest first
 */
export function getAvailableTaxYears(configDir?: string): number[] {
  const dir = resolveConfigDir(configDir);
  if (!existsSync(dir)) {
    return [];
  }

  const years: number[] = [];
  for (const file of readdirSync(dir)) {
    const match = file.match(/^federal-(\d{4})\.json$/);
    if (match) {
      years.push(parseInt(match[1], 10));
    }
  }

  return years.sort((a, b) => b - a);
}

/**
 * Clear loaded tables (tests and hot-reload)
 */
export function clearRateTableCache(): void {
  rateTableCache.flushAll();
}

export function ratesFor(table: RateTable, filingStatus: FilingStatus): FilingStatusRates {
  return table.filingStatuses[filingStatus];
}

// ── Reference data ─────────────────────────────────────────────

export interface FilingStatusReference {
  readonly brackets: readonly TaxBracket[];
  readonly standardDeduction: Decimal;
  readonly additionalStandardDeduction: Decimal;
  readonly capitalGainsBreakpoints: CapitalGainsBreakpoints;
}

export interface ReferenceData {
  readonly year: number;
  readonly effectiveDate: string;
  readonly filingStatuses: Readonly<Record<FilingStatus, FilingStatusReference>>;
}

function referenceFor(rates: FilingStatusRates): FilingStatusReference {
  return {
    brackets: rates.brackets,
    standardDeduction: rates.standardDeduction,
    additionalStandardDeduction: rates.additionalStandardDeduction,
    capitalGainsBreakpoints: rates.capitalGainsBreakpoints
  };
}

/**
 * Read-only view of the brackets and deductions of a year, independent of any return
 */
export function getReferenceData(table: RateTable): ReferenceData {
  const statuses = table.filingStatuses;
  return deepFreeze<ReferenceData>({
    year: table.year,
    effectiveDate: table.effectiveDate,
    filingStatuses: {
      SINGLE: referenceFor(statuses.SINGLE),
      MARRIED_FILING_JOINTLY: referenceFor(statuses.MARRIED_FILING_JOINTLY),
      MARRIED_FILING_SEPARATELY: referenceFor(statuses.MARRIED_FILING_SEPARATELY),
      HEAD_OF_HOUSEHOLD: referenceFor(statuses.HEAD_OF_HOUSEHOLD),
      QUALIFYING_SURVIVING_SPOUSE: referenceFor(statuses.QUALIFYING_SURVIVING_SPOUSE)
    }
  });
}
