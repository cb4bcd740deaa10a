import { DeribitClient, DeribitApiError } from '../client/DeribitClient';
import { GreeksEngine, SkippedInstrument } from '../greeks';
import { quotedOptionAdapter } from '../adapters';
import { MalformedIdentifierError, parseInstrumentName } from '../utils/instrument';
import { Logger, logger as rootLogger } from '../utils/logger';
import { sleep } from '../utils/time';
import { InstrumentIdentifier } from '../types';
import { CollectionResult, QuotedOptionRow } from './types';

export interface QuotedGreeksOptions {
  currency: string;
  /** Only the first `limit` active instruments */
  limit?: number;
  /** Valuation instant; each ticker's own timestamp when omitted */
  asOf?: number;
  /** Pause between ticker requests in ms (default: 100) */
  delayMs?: number;
  logger?: Logger;
}

/**
 * Prices every active option of a currency from its quoted mark IV.
 *
 * One ticker request per instrument. A failed request drops that instrument
 * into `failed`; a name that does not parse lands in `skipped`.
 */
export async function collectQuotedGreeks(
  client: DeribitClient,
  engine: GreeksEngine,
  options: QuotedGreeksOptions
): Promise<CollectionResult<QuotedOptionRow>> {
  const log = options.logger ?? rootLogger;
  const delayMs = options.delayMs ?? 100;

  const spot = await client.getIndexPrice(options.currency);
  log.info(`${options.currency} index price: $${spot.toLocaleString('en-US')}`);

  const instruments = (await client.getInstruments(options.currency)).filter((i) => i.is_active);
  const selected = options.limit !== undefined ? instruments.slice(0, options.limit) : instruments;
  log.info(`Fetching tickers for ${selected.length} of ${instruments.length} active options`);

  const rows: QuotedOptionRow[] = [];
  const skipped: SkippedInstrument[] = [];
  const failed: string[] = [];

  for (let index = 0; index < selected.length; index++) {
    const name = selected[index].instrument_name;

    let identifier: InstrumentIdentifier;
    try {
      identifier = parseInstrumentName(name);
    } catch (error) {
      if (error instanceof MalformedIdentifierError) {
        skipped.push({ instrumentName: name, reason: error.reason });
        continue;
      }
      throw error;
    }

    try {
      const ticker = await client.getTicker(name);
      const asOf = options.asOf ?? ticker.timestamp;
      const calculation = engine.fromQuotedVolatility(identifier, spot, ticker.mark_iv ?? NaN, asOf);
      rows.push(quotedOptionAdapter(ticker, calculation, spot));
    } catch (error) {
      if (!(error instanceof DeribitApiError)) throw error;
      log.warn(`Skipping ${name}: ${error.message}`);
      failed.push(name);
    }

    if ((index + 1) % 25 === 0) {
      log.debug(`Processed ${index + 1}/${selected.length}`);
    }
    if (delayMs > 0 && index < selected.length - 1) {
      await sleep(delayMs);
    }
  }

  return { rows, spot, skipped, failed };
}
