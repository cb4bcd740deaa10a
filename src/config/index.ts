/**
 * Runtime configuration
 *
 * Values come from environment variables (optionally from a `.env` file
 * loaded with dotenv) and are validated with zod. CLI flags override them.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { PricingConfig } from '../types';

export const DEFAULT_API_URL = 'https://www.deribit.com/api/v2/public';

/**
 * Thrown when environment values fail validation
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// Unset and blank variables both fall back to the default
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z.object({
  DERIBIT_API_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_API_URL)),
  DERIBIT_CURRENCY: z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^[A-Za-z]{2,10}$/, 'expected a currency code such as BTC')
      .transform((value) => value.toUpperCase())
      .default('BTC')
  ),
  RISK_FREE_RATE: z.preprocess(blankToUndefined, z.coerce.number().min(-1).max(1).default(0.05)),
  DAYS_PER_YEAR: z.preprocess(blankToUndefined, z.coerce.number().positive().default(365.25)),
  REQUEST_DELAY_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(100)),
  MAX_RETRIES: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(10).default(3)),
  OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().default('.')),
});

export interface AppConfig {
  apiUrl: string;
  currency: string;
  pricing: PricingConfig;
  requestDelayMs: number;
  maxRetries: number;
  outputDir: string;
}

/**
 * Validate an environment map into an {@link AppConfig}.
 *
 * @param env - Variables to read (default: `process.env`)
 * @throws {ConfigError} Listing every invalid variable
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = result.data;
  return {
    apiUrl: values.DERIBIT_API_URL,
    currency: values.DERIBIT_CURRENCY,
    pricing: {
      riskFreeRate: values.RISK_FREE_RATE,
      daysPerYear: values.DAYS_PER_YEAR,
    },
    requestDelayMs: values.REQUEST_DELAY_MS,
    maxRetries: values.MAX_RETRIES,
    outputDir: values.OUTPUT_DIR,
  };
}

/**
 * Load `.env` (if present) into `process.env`, then validate it.
 */
export function loadConfig(envPath?: string): AppConfig {
  loadDotenv({ path: envPath });
  return parseConfig(process.env);
}
