import { z } from 'zod';
import { DEFAULT_API_URL } from '../config';
import { Logger, logger as rootLogger } from '../utils/logger';
import { parseUtcTimestamp, sleep } from '../utils/time';
import { MILLISECONDS_PER_DAY } from '../types';
import {
  rpcEnvelopeSchema,
  instrumentSchema,
  tickerSchema,
  indexPriceSchema,
  settlementsPageSchema,
  tradesPageSchema,
  orderBookSchema,
  chartDataSchema,
  DeribitInstrument,
  DeribitTicker,
  DeribitSettlementsPage,
  DeribitTrade,
  DeribitOrderBook,
  DeribitChartData,
} from './types';

/**
 * Minimal fetch signature the client needs; the global `fetch` satisfies it
 */
export type FetchLike = (url: string) => Promise<Response>;

type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Configuration for {@link DeribitClient}
 */
export interface DeribitClientOptions {
  /** Public API base URL (default: https://www.deribit.com/api/v2/public) */
  baseUrl?: string;
  /** HTTP implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Attempts per request, including the first (default: 3) */
  maxRetries?: number;
  /** Base backoff delay in ms, doubled per attempt (default: 500) */
  baseRetryDelay?: number;
  /** Logger for retry warnings and debug output */
  logger?: Logger;
}

/**
 * Failure of a public API call after retries, or a response that does not
 * match the expected shape
 */
export class DeribitApiError extends Error {
  readonly method: string;
  /** HTTP status, when the server answered */
  readonly status?: number;
  /** JSON-RPC error code, when the server returned one */
  readonly code?: number;

  constructor(method: string, message: string, details: { status?: number; code?: number } = {}) {
    super(`${method}: ${message}`);
    this.name = 'DeribitApiError';
    this.method = method;
    this.status = details.status;
    this.code = details.code;
  }
}

/**
 * Client for the exchange's public REST API (no authentication).
 *
 * @remarks
 * Every endpoint is a GET returning a JSON-RPC envelope; results are
 * validated against zod schemas before they reach the caller. Network
 * errors, HTTP 429 and 5xx responses are retried with exponential backoff.
 *
 * @example
 * ```typescript
 * const client = new DeribitClient();
 * const spot = await client.getIndexPrice('BTC');
 * const names = await client.getInstruments('BTC');
 * ```
 */
export class DeribitClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly maxRetries: number;
  private readonly baseRetryDelay: number;
  private readonly logger: Logger;

  constructor(options: DeribitClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((url: string) => fetch(url));
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.baseRetryDelay = options.baseRetryDelay ?? 500;
    this.logger = options.logger ?? rootLogger.child('Deribit');
  }

  // ==================== Public API ====================

  /**
   * Option instruments for a currency
   *
   * @param currency - e.g. 'BTC'
   * @param expired - List expired instead of live instruments (default: false)
   */
  async getInstruments(currency: string, expired: boolean = false): Promise<DeribitInstrument[]> {
    return this.request(
      'get_instruments',
      { currency: currency.toUpperCase(), kind: 'option', expired },
      z.array(instrumentSchema)
    );
  }

  /**
   * Current ticker for one instrument, including mark IV
   */
  async getTicker(instrumentName: string): Promise<DeribitTicker> {
    return this.request('ticker', { instrument_name: instrumentName }, tickerSchema);
  }

  /**
   * Current index price, e.g. btc_usd for 'BTC'
   */
  async getIndexPrice(currency: string): Promise<number> {
    const result = await this.request(
      'get_index_price',
      { index_name: `${currency.toLowerCase()}_usd` },
      indexPriceSchema
    );
    return result.index_price;
  }

  /**
   * Settlement events searching backwards from `searchStartTimestamp`
   */
  async getLastSettlementsByCurrency(
    currency: string,
    searchStartTimestamp: number,
    count: number = 20
  ): Promise<DeribitSettlementsPage> {
    return this.request(
      'get_last_settlements_by_currency',
      {
        currency: currency.toUpperCase(),
        type: 'settlement',
        count,
        search_start_timestamp: searchStartTimestamp,
      },
      settlementsPageSchema
    );
  }

  /**
   * Option trades across every instrument of a currency in a time window
   */
  async getLastTradesByCurrency(
    currency: string,
    startTimestamp: number,
    endTimestamp: number,
    count: number = 100
  ): Promise<DeribitTrade[]> {
    const page = await this.request(
      'get_last_trades_by_currency_and_time',
      {
        currency: currency.toUpperCase(),
        kind: 'option',
        start_timestamp: startTimestamp,
        end_timestamp: endTimestamp,
        count,
        include_old: true,
      },
      tradesPageSchema
    );
    return page.trades;
  }

  /**
   * Trades of one instrument in a time window
   */
  async getLastTradesByInstrument(
    instrumentName: string,
    startTimestamp: number,
    endTimestamp: number,
    count: number = 100
  ): Promise<DeribitTrade[]> {
    const page = await this.request(
      'get_last_trades_by_instrument_and_time',
      {
        instrument_name: instrumentName,
        start_timestamp: startTimestamp,
        end_timestamp: endTimestamp,
        count,
        include_old: true,
      },
      tradesPageSchema
    );
    return page.trades;
  }

  async getOrderBook(instrumentName: string, depth: number = 1): Promise<DeribitOrderBook> {
    return this.request('get_order_book', { instrument_name: instrumentName, depth }, orderBookSchema);
  }

  /**
   * Hourly OHLCV candles for the UTC day starting at `date` (YYYY-MM-DD).
   *
   * @returns Candles, or null when the exchange has no data for that day
   */
  async getHistoricalPrices(instrumentName: string, date: string): Promise<DeribitChartData | null> {
    const start = parseUtcTimestamp(date);
    if (start === null) {
      throw new DeribitApiError('get_tradingview_chart_data', `invalid date "${date}"`);
    }

    const chart = await this.request(
      'get_tradingview_chart_data',
      {
        instrument_name: instrumentName,
        start_timestamp: start,
        end_timestamp: start + MILLISECONDS_PER_DAY,
        resolution: '60',
      },
      chartDataSchema
    );

    return chart.status === 'ok' && chart.close.length > 0 ? chart : null;
  }

  /**
   * Approximates a past index price from the settlement nearest to `timestamp`.
   *
   * @returns The index price of a settlement within one hour, or null
   */
  async getHistoricalIndexPrice(currency: string, timestamp: number): Promise<number | null> {
    const page = await this.getLastSettlementsByCurrency(currency, timestamp, 10);

    for (const settlement of page.settlements) {
      if (Math.abs(settlement.timestamp - timestamp) < 60 * 60 * 1000 && settlement.index_price != null) {
        return settlement.index_price;
      }
    }

    return null;
  }

  // ==================== Transport ====================

  /**
   * GET a public method, retrying transient failures, and validate its result
   */
  private async request<T extends z.ZodTypeAny>(
    method: string,
    params: QueryParams,
    schema: T
  ): Promise<z.infer<T>> {
    const url = this.buildUrl(method, params);
    let lastError: DeribitApiError | null = null;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = this.baseRetryDelay * Math.pow(2, attempt - 1);
        this.logger.warn(`${method} failed (${lastError?.message}), retry ${attempt}/${this.maxRetries - 1} in ${delay}ms`);
        await sleep(delay);
      }

      let response: Response;
      try {
        this.logger.debug(`GET ${url}`);
        response = await this.fetchImpl(url);
      } catch (error) {
        lastError = new DeribitApiError(method, error instanceof Error ? error.message : String(error));
        continue;
      }

      if (response.status === 429 || response.status >= 500) {
        lastError = new DeribitApiError(method, `HTTP ${response.status}`, { status: response.status });
        continue;
      }

      const body = await readJson(response);
      const envelope = rpcEnvelopeSchema.safeParse(body);

      if (!envelope.success) {
        throw new DeribitApiError(method, `unexpected response (HTTP ${response.status})`, {
          status: response.status,
        });
      }

      if (envelope.data.error) {
        throw new DeribitApiError(method, envelope.data.error.message, {
          status: response.status,
          code: envelope.data.error.code,
        });
      }

      if (!response.ok) {
        throw new DeribitApiError(method, `HTTP ${response.status}`, { status: response.status });
      }

      const result = schema.safeParse(envelope.data.result);
      if (!result.success) {
        const issue = result.error.issues[0];
        throw new DeribitApiError(
          method,
          `invalid result at "${issue.path.join('.')}": ${issue.message}`,
          { status: response.status }
        );
      }

      return result.data;
    }

    throw lastError ?? new DeribitApiError(method, 'request failed');
  }

  private buildUrl(method: string, params: QueryParams): string {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        search.set(key, String(value));
      }
    }
    return `${this.baseUrl}/${method}?${search.toString()}`;
  }
}

/**
 * @internal
 */
async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    return null;
  }
}
