/**
 * Calculation History Store
 *
 * Keeps completed calculations keyed by an auto-incrementing id and a creation
 * timestamp. The calculation service hands every successful result here; a
 * store that fails never changes the result the caller receives.
 */

import type { StoredCalculationSummary } from '../../../shared/types/index.js';
import type { FullTaxCalculationResult, TaxReturnInput } from '../tax/types.js';

export interface StoredCalculation {
  readonly id: number;
  readonly createdAt: string; // ISO 8601
  readonly input: TaxReturnInput;
  readonly result: FullTaxCalculationResult;
}

export interface ListOptions {
  limit?: number;
  offset?: number;
}

export interface CalculationStore {
  save(input: TaxReturnInput, result: FullTaxCalculationResult): Promise<number>;
  /** Summary rows, newest first */
  list(options?: ListOptions): Promise<StoredCalculationSummary[]>;
  get(id: number): Promise<StoredCalculation | null>;
  /** True when a calculation was actually removed */
  delete(id: number): Promise<boolean>;
}

export function toSummaryRow(record: StoredCalculation): StoredCalculationSummary {
  const { summary } = record.result;
  return {
    id: record.id,
    createdAt: record.createdAt,
    filingStatus: summary.filingStatus,
    totalIncome: summary.totalIncome.toFixed(2),
    agi: summary.agi.toFixed(2),
    taxableIncome: summary.taxableIncome.toFixed(2),
    federalTax: summary.totalIncomeTaxBeforeCredits.toFixed(2),
    totalCredits: summary.totalCredits.toFixed(2),
    totalTax: summary.totalTax.toFixed(2),
    effectiveRate: summary.effectiveRate.toFixed(6),
    marginalRate: summary.marginalRate.toFixed(2),
    refundOrOwed: summary.refundOrOwed.toFixed(2)
  };
}

interface InMemoryStoreOptions {
  now?: () => Date;
}

/**
 * Process-local store. Results are immutable, so records hold them by reference.
 */
export class InMemoryCalculationStore implements CalculationStore {
  private readonly records = new Map<number, StoredCalculation>();
  private nextId = 1;
  private readonly now: () => Date;

  constructor(options: InMemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async save(input: TaxReturnInput, result: FullTaxCalculationResult): Promise<number> {
    const id = this.nextId++;
    this.records.set(id, {
      id,
      createdAt: this.now().toISOString(),
      input,
      result
    });
    return id;
  }

  async list(options: ListOptions = {}): Promise<StoredCalculationSummary[]> {
    // Negative values would count from the tail
    const offset = Math.max(0, options.offset ?? 0);
    const newestFirst = [...this.records.values()].sort((a, b) => b.id - a.id);
    const page = options.limit === undefined
      ? newestFirst.slice(offset)
      : newestFirst.slice(offset, offset + Math.max(0, options.limit));
    return page.map(toSummaryRow);
  }

  async get(id: number): Promise<StoredCalculation | null> {
    return this.records.get(id) ?? null;
  }

  async delete(id: number): Promise<boolean> {
    return this.records.delete(id);
  }

  get size(): number {
    return this.records.size;
  }
}
