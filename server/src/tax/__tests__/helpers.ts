import type { TaxReturnJson } from '../../../../shared/types';
import { loadRateTable } from '../rateTable';
import type { TaxReturnInput } from '../types';
import { parseTaxReturn } from '../validation';

export const table2024 = loadRateTable(2024);

/**
 * Build a validated return from its JSON form
 */
export function buildReturn(json: TaxReturnJson): TaxReturnInput {
  return parseTaxReturn(json);
}
