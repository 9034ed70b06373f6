import dotenv from 'dotenv';
import { z } from 'zod';
import { AppError } from './utils/AppError.js';

// Load environment variables
dotenv.config();

const envSchema = z.object({
  TAX_YEAR: z.coerce.number().int().min(2000).max(2100).default(2024),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  RATE_TABLE_DIR: z.string().trim().min(1).optional()
});

export interface AppConfig {
  taxYear: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  // Directory holding federal-{year}.json; defaults to src/tax/config
  rateTableDir?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message
    }));
    const problems = issues.map(issue => `${issue.field}: ${issue.message}`).join('; ');
    throw new AppError(`Invalid environment configuration: ${problems}`, 'CONFIG_INVALID', false, issues);
  }

  return {
    taxYear: parsed.data.TAX_YEAR,
    logLevel: parsed.data.LOG_LEVEL,
    rateTableDir: parsed.data.RATE_TABLE_DIR
  };
}

export const config = loadConfig();
