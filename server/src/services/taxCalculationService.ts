/**
 * Tax Calculation Service
 *
 * Boundary around the pure pipeline:
 * validate -> reject unsupported scenarios -> calculate -> store (best effort).
 *
 * Input errors surface as the domain errors from tax/validation.ts before any
 * stage runs. A store failure is logged and returned as a warning; the
 * calculation itself is still returned.
 */

import type { StoredCalculationSummary } from '../../../shared/types/index.js';
import { config } from '../config.js';
import { estimateTax, type TaxEstimate } from '../tax/estimate.js';
import { calculateTaxReturn } from '../tax/orchestrator.js';
import { getReferenceData, loadRateTable, type RateTable, type ReferenceData } from '../tax/rateTable.js';
import type { FullTaxCalculationResult } from '../tax/types.js';
import { assertSupportedScenario, parseEstimateRequest, parseTaxReturn } from '../tax/validation.js';
import { AppError } from '../utils/AppError.js';
import type { CalculationStore, ListOptions, StoredCalculation } from './calculationStore.js';
import { logger, type LogSink } from './logger.js';

export interface CalculationOutcome {
  readonly result: FullTaxCalculationResult;
  readonly calculationId: number | null; // null when nothing was stored
  readonly warnings: readonly string[];
}

export interface TaxCalculationServiceOptions {
  store?: CalculationStore | null;
  log?: LogSink;
}

export class TaxCalculationService {
  private readonly store: CalculationStore | null;
  private readonly log: LogSink;

  constructor(
    private readonly table: RateTable,
    options: TaxCalculationServiceOptions = {}
  ) {
    this.store = options.store ?? null;
    this.log = options.log ?? logger.child({ taxYear: table.year });
  }

  /**
   * Service bound to the rate table of one year (TAX_YEAR by default)
   */
  static forYear(year: number = config.taxYear, options: TaxCalculationServiceOptions = {}): TaxCalculationService {
    return new TaxCalculationService(loadRateTable(year), options);
  }

  get taxYear(): number {
    return this.table.year;
  }

  async calculate(raw: unknown): Promise<CalculationOutcome> {
    const input = parseTaxReturn(raw);
    assertSupportedScenario(input, this.table);

    this.log.debug('Calculating federal return', {
      taxYear: this.table.year,
      filingStatus: input.filingStatus
    });

    const result = calculateTaxReturn(input, this.table);

    this.log.info('Federal return calculated', {
      taxYear: result.taxYear,
      filingStatus: input.filingStatus,
      totalTax: result.summary.totalTax,
      refundOrOwed: result.summary.refundOrOwed
    });

    const warnings: string[] = [];
    let calculationId: number | null = null;

    if (this.store) {
      try {
        calculationId = await this.store.save(input, result);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.log.warn('Failed to store calculation', error);
        warnings.push(`Calculation was not saved to history: ${reason}`);
      }
    }

    return { result, calculationId, warnings };
  }

  /**
   * Standard deduction and bracket tax from gross income and filing status
   */
  estimate(raw: unknown): TaxEstimate {
    const request = parseEstimateRequest(raw);
    return estimateTax(request.grossIncome, request.filingStatus, this.table);
  }

  referenceData(): ReferenceData {
    return getReferenceData(this.table);
  }

  // ── History ──────────────────────────────────────────────────

  private requireStore(): CalculationStore {
    if (!this.store) {
      throw new AppError('Calculation history is not configured', 'STORE_UNAVAILABLE');
    }
    return this.store;
  }

  async listCalculations(options?: ListOptions): Promise<StoredCalculationSummary[]> {
    return this.requireStore().list(options);
  }

  async getCalculation(id: number): Promise<StoredCalculation> {
    const record = await this.requireStore().get(id);
    if (!record) {
      throw new AppError(`Calculation ${id} not found`, 'NOT_FOUND');
    }
    return record;
  }

  async deleteCalculation(id: number): Promise<void> {
    const deleted = await this.requireStore().delete(id);
    if (!deleted) {
      throw new AppError(`Calculation ${id} not found`, 'NOT_FOUND');
    }
    this.log.info(`Deleted calculation ${id}`);
  }
}
