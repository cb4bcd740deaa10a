/**
 * deribit-greeks
 *
 * Black-Scholes Greeks for inverse crypto options: instrument name parsing,
 * pricing, implied volatility recovery and a public API client.
 */

// Core types
export * from './types';

// Pricing and Greeks
export {
  blackScholes,
  calculateGreeks,
  calculateModelVega,
  getMillisecondsToExpiration,
  getTimeToExpirationInYears,
} from './blackscholes';

// Implied volatility
export { solveImpliedVolatility, DEFAULT_SOLVER_OPTIONS } from './iv';
export type { SolverOptions } from './iv';

// Greeks engine
export { GreeksEngine } from './greeks';
export type { GreeksRequest, GreeksBatchResult, GreeksEngineOptions, SkippedInstrument } from './greeks';

// Instrument names
export {
  parseInstrumentName,
  buildInstrumentName,
  isInstrumentName,
  MalformedIdentifierError,
} from './utils/instrument';

// Statistical utilities
export { cumulativeNormalDistribution, normalPDF } from './utils/statistics';

// Exchange client
export { DeribitClient, DeribitApiError } from './client/DeribitClient';
export type { DeribitClientOptions, FetchLike } from './client/DeribitClient';
export type {
  DeribitInstrument,
  DeribitTicker,
  DeribitSettlement,
  DeribitTrade,
  DeribitOrderBook,
  DeribitChartData,
} from './client/types';

// Market data collection and rows
export * from './market';
export { quotedOptionAdapter, tradeReconstructionAdapter, settlementAdapter, roundGreeks } from './adapters';
export type { TradeAggregate } from './adapters';

// CSV export
export { toCsv, writeCsv, QUOTED_COLUMNS, TRADE_COLUMNS, SETTLEMENT_COLUMNS } from './export/csv';

// Configuration and logging
export { loadConfig, parseConfig, ConfigError, DEFAULT_API_URL } from './config';
export type { AppConfig } from './config';
export { Logger, logger } from './utils/logger';
