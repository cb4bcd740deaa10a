import { z } from 'zod';

// Quote fields the exchange omits or nulls when there is no market
const optionalNumber = z.number().nullable().optional();

/**
 * JSON-RPC envelope wrapped around every public endpoint
 */
export const rpcEnvelopeSchema = z.object({
  jsonrpc: z.string().optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
    })
    .optional(),
});

/**
 * Instrument metadata from get_instruments
 */
export const instrumentSchema = z.object({
  instrument_name: z.string(),
  kind: z.string().optional(),
  strike: z.number().optional(),
  expiration_timestamp: z.number(),
  option_type: z.enum(['call', 'put']).optional(),
  base_currency: z.string(),
  quote_currency: z.string().optional(),
  settlement_period: z.string().optional(),
  is_active: z.boolean(),
});
export type DeribitInstrument = z.infer<typeof instrumentSchema>;

/**
 * Ticker snapshot from ticker
 */
export const tickerSchema = z.object({
  instrument_name: z.string(),
  timestamp: z.number(),
  mark_price: z.number(),
  mark_iv: optionalNumber,
  bid_iv: optionalNumber,
  ask_iv: optionalNumber,
  underlying_price: optionalNumber,
  index_price: optionalNumber,
  last_price: optionalNumber,
  best_bid_price: optionalNumber,
  best_ask_price: optionalNumber,
  best_bid_amount: optionalNumber,
  best_ask_amount: optionalNumber,
  open_interest: optionalNumber,
  stats: z
    .object({
      volume: optionalNumber,
      volume_usd: optionalNumber,
      high: optionalNumber,
      low: optionalNumber,
      price_change: optionalNumber,
    })
    .optional(),
});
export type DeribitTicker = z.infer<typeof tickerSchema>;

export const indexPriceSchema = z.object({
  index_price: z.number(),
  estimated_delivery_price: optionalNumber,
});
export type DeribitIndexPrice = z.infer<typeof indexPriceSchema>;

export const settlementSchema = z.object({
  instrument_name: z.string(),
  timestamp: z.number(),
  type: z.string(),
  index_price: optionalNumber,
  mark_price: optionalNumber,
  session_profit_loss: optionalNumber,
  position: optionalNumber,
});
export type DeribitSettlement = z.infer<typeof settlementSchema>;

export const settlementsPageSchema = z.object({
  settlements: z.array(settlementSchema),
  continuation: z.string().nullable().optional(),
});
export type DeribitSettlementsPage = z.infer<typeof settlementsPageSchema>;

export const tradeSchema = z.object({
  trade_id: z.string(),
  instrument_name: z.string(),
  timestamp: z.number(),
  price: z.number(),
  amount: z.number(),
  direction: z.enum(['buy', 'sell']).optional(),
  index_price: optionalNumber,
  mark_price: optionalNumber,
  iv: optionalNumber,
});
export type DeribitTrade = z.infer<typeof tradeSchema>;

export const tradesPageSchema = z.object({
  trades: z.array(tradeSchema),
  has_more: z.boolean().optional(),
});

const priceLevelSchema = z.tuple([z.number(), z.number()]);

export const orderBookSchema = z.object({
  instrument_name: z.string(),
  timestamp: z.number(),
  bids: z.array(priceLevelSchema),
  asks: z.array(priceLevelSchema),
  best_bid_price: optionalNumber,
  best_ask_price: optionalNumber,
  mark_price: optionalNumber,
  mark_iv: optionalNumber,
  underlying_price: optionalNumber,
});
export type DeribitOrderBook = z.infer<typeof orderBookSchema>;

/**
 * OHLCV columns from get_tradingview_chart_data
 */
export const chartDataSchema = z.object({
  status: z.string(),
  ticks: z.array(z.number()),
  open: z.array(z.number()),
  high: z.array(z.number()),
  low: z.array(z.number()),
  close: z.array(z.number()),
  volume: z.array(z.number()),
  cost: z.array(z.number()).optional(),
});
export type DeribitChartData = z.infer<typeof chartDataSchema>;
