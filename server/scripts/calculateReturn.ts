/**
 * Calculate a federal return from a JSON file
 * Run with: npx tsx server/scripts/calculateReturn.ts <return.json> [--out result.json] [--year 2024]
 */

import { readFileSync, writeFileSync } from 'fs';
import { config } from '../src/config.js';
import { TaxCalculationService } from '../src/services/taxCalculationService.js';
import type { TaxSummary } from '../src/tax/types.js';
import { AppError } from '../src/utils/AppError.js';
import { formatCurrency, formatPercent } from '../src/utils/decimal.js';

interface CliArgs {
  inputPath: string;
  outputPath?: string;
  year: number;
}

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let outputPath: string | undefined;
  let year = config.taxYear;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--out') {
      outputPath = argv[++i];
    } else if (arg === '--year') {
      year = parseInt(argv[++i] ?? '', 10);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 1 || Number.isNaN(year)) {
    throw new AppError(
      'Usage: calculateReturn <return.json> [--out result.json] [--year 2024]',
      'USAGE'
    );
  }

  return { inputPath: positional[0], outputPath, year };
}

function printSummary(summary: TaxSummary, taxYear: number): void {
  const rows: Array<[string, string]> = [
    ['Filing status', summary.filingStatus],
    ['Total income', formatCurrency(summary.totalIncome)],
    ['AGI', formatCurrency(summary.agi)],
    ['Deduction', formatCurrency(summary.deductionAmount)],
    ['Taxable income', formatCurrency(summary.taxableIncome)],
    ['Income tax before credits', formatCurrency(summary.totalIncomeTaxBeforeCredits)],
    ['Credits', formatCurrency(summary.totalCredits)],
    ['FICA / SE tax', formatCurrency(summary.totalFica)],
    ['Total tax', formatCurrency(summary.totalTax)],
    ['Effective rate', formatPercent(summary.effectiveRate)],
    ['Marginal rate', formatPercent(summary.marginalRate, 0)],
    ['Payments', formatCurrency(summary.totalPayments)]
  ];

  const refund = summary.refundOrOwed;
  rows.push(refund.isNegative()
    ? ['Amount owed', formatCurrency(refund.negated())]
    : ['Refund', formatCurrency(refund)]);

  const width = Math.max(...rows.map(([label]) => label.length));
  console.log(`\nFederal return, tax year ${taxYear}`);
  for (const [label, value] of rows) {
    console.log(`  ${label.padEnd(width)}  ${value}`);
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const raw: unknown = JSON.parse(readFileSync(args.inputPath, 'utf-8'));

  const service = TaxCalculationService.forYear(args.year);
  const { result } = await service.calculate(raw);

  printSummary(result.summary, result.taxYear);

  if (args.outputPath) {
    // Decimals serialize as strings
    writeFileSync(args.outputPath, `${JSON.stringify(result, null, 2)}\n`);
    console.log(`\nFull result written to ${args.outputPath}`);
  }
}

main().catch((error: unknown) => {
  if (error instanceof AppError) {
    console.error(`${error.name}: ${error.message}`);
    if (error.details !== undefined) {
      console.error(JSON.stringify(error.details, null, 2));
    }
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
