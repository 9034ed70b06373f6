// Public surface of the federal tax engine

export { calculateTaxReturn } from './tax/orchestrator.js';
export { estimateTax, type TaxEstimate } from './tax/estimate.js';
export {
  loadRateTable,
  parseRateTable,
  getAvailableTaxYears,
  getReferenceData,
  clearRateTableCache,
  type RateTable,
  type ReferenceData
} from './tax/rateTable.js';
export { calculateBracketTax, marginalRate, rateForNextDollar, type BracketTaxResult } from './tax/bracketTax.js';
export { calculateStandardDeduction } from './tax/deductions.js';
export { parseTaxReturn, parseEstimateRequest, assertSupportedScenario } from './tax/validation.js';
export type * from './tax/types.js';

export {
  TaxCalculationService,
  type CalculationOutcome,
  type TaxCalculationServiceOptions
} from './services/taxCalculationService.js';
export {
  InMemoryCalculationStore,
  type CalculationStore,
  type StoredCalculation,
  type ListOptions
} from './services/calculationStore.js';
export { logger, Logger, ContextLogger, type LogSink, type LogLevel } from './services/logger.js';

export {
  AppError,
  InvalidFilingStatusError,
  IncompleteInputError,
  ValidationError,
  UnsupportedScenarioError
} from './utils/AppError.js';
export { formatCurrency, formatPercent } from './utils/decimal.js';
export { FILING_STATUSES } from '../../shared/types/index.js';
export type { TaxReturnJson, StoredCalculationSummary } from '../../shared/types/index.js';
