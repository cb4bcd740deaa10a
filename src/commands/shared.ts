import { join } from 'path';
import chalk from 'chalk';
import { AppConfig, loadConfig } from '../config';
import { DeribitClient } from '../client/DeribitClient';
import { GreeksEngine } from '../greeks';
import { CollectionResult } from '../market/types';
import { writeCsv } from '../export/csv';
import { Logger, logger } from '../utils/logger';
import { parseUtcTimestamp } from '../utils/time';

/**
 * Options every command accepts
 */
export interface CommandOptions {
  currency?: string;
  /** Output directory (default: OUTPUT_DIR, else the working directory) */
  out?: string;
  /** Valuation instant, YYYY-MM-DD or YYYY-MM-DD HH:MM[:SS] UTC */
  asOf?: string;
  verbose?: boolean;
}

/**
 * Bad command-line input; reported without a stack trace
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CommandContext {
  config: AppConfig;
  currency: string;
  outputDir: string;
  asOf: number | undefined;
  client: DeribitClient;
  engine: GreeksEngine;
  log: Logger;
}

export function createContext(options: CommandOptions): CommandContext {
  logger.setVerbose(options.verbose ?? false);

  const config = loadConfig();
  const currency = (options.currency ?? config.currency).toUpperCase();
  if (!/^[A-Z]{2,10}$/.test(currency)) {
    throw new UsageError(`Invalid currency "${options.currency}"`);
  }

  let asOf: number | undefined;
  if (options.asOf !== undefined) {
    const parsed = parseUtcTimestamp(options.asOf);
    if (parsed === null) {
      throw new UsageError(`Invalid --as-of "${options.asOf}", expected YYYY-MM-DD or YYYY-MM-DD HH:MM`);
    }
    asOf = parsed;
  }

  return {
    config,
    currency,
    outputDir: options.out ?? config.outputDir,
    asOf,
    client: new DeribitClient({
      baseUrl: config.apiUrl,
      maxRetries: config.maxRetries,
      logger: logger.child('Deribit'),
    }),
    engine: new GreeksEngine({ pricing: config.pricing }),
    log: logger,
  };
}

/**
 * Writes the rows, prints a short preview and what was left out
 */
export function report<
  Row extends { [K in Column]: string | number | null },
  Column extends string,
  Preview extends Column,
>(
  context: CommandContext,
  fileName: string,
  result: CollectionResult<Row>,
  columns: ReadonlyArray<Column>,
  previewColumns: ReadonlyArray<Preview>
): string {
  const { log } = context;

  if (result.skipped.length > 0) {
    log.warn(`Skipped ${result.skipped.length} malformed instrument name(s)`);
    for (const { instrumentName, reason } of result.skipped) {
      log.debug(`${instrumentName}: ${reason}`);
    }
  }
  if (result.failed.length > 0) {
    log.warn(`No market data for ${result.failed.length} instrument(s)`);
  }

  if (result.rows.length === 0) {
    log.warn('Nothing to write');
    return '';
  }

  const path = join(context.outputDir, fileName);
  writeCsv(path, result.rows, columns);
  log.success(`Wrote ${result.rows.length} rows to ${path}`);

  log.header('Preview');
  console.log(chalk.bold(previewColumns.join('  ')));
  for (const row of result.rows.slice(0, 10)) {
    console.log(previewColumns.map((column) => formatPreviewCell(row[column])).join('  '));
  }

  return path;
}

function formatPreviewCell(value: string | number | null): string {
  if (value === null || (typeof value === 'number' && Number.isNaN(value))) return chalk.gray('-');
  return String(value);
}
