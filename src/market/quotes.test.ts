import { collectQuotedGreeks } from './quotes';
import { DeribitClient, FetchLike } from '../client/DeribitClient';
import { GreeksEngine } from '../greeks';
import { roundGreeks } from '../adapters';
import { MILLISECONDS_PER_DAY } from '../types';
import { Logger } from '../utils/logger';

const EXPIRY = Date.UTC(2026, 2, 27, 8);
const AS_OF = EXPIRY - 30 * MILLISECONDS_PER_DAY;
const SPOT = 58000;

function instrument(name: string, isActive: boolean = true) {
  return { instrument_name: name, kind: 'option', expiration_timestamp: EXPIRY, base_currency: 'BTC', is_active: isActive };
}

describe('collectQuotedGreeks', () => {
  const engine = new GreeksEngine();
  let logger: Logger;
  let calls: string[];

  function clientReplaying(bodies: unknown[]): DeribitClient {
    const fetch: FetchLike = async (url) => {
      calls.push(url);
      return new Response(JSON.stringify(bodies.shift()), { status: 200 });
    };
    return new DeribitClient({ baseUrl: 'https://exchange.test', fetch, maxRetries: 1, baseRetryDelay: 0, logger });
  }

  beforeEach(() => {
    calls = [];
    logger = new Logger('test');
    jest.spyOn(logger, 'info').mockImplementation(() => undefined);
    jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
  });

  it('should price active options and account for the rest', async () => {
    const client = clientReplaying([
      { result: { index_price: SPOT } },
      {
        result: [
          instrument('BTC-27MAR26-60000-C'),
          instrument('BTC-27MAR26-55000-P'),
          instrument('BTC-BAD'),
          instrument('BTC-27MAR26-70000-C', false),
        ],
      },
      {
        result: {
          instrument_name: 'BTC-27MAR26-60000-C',
          timestamp: AS_OF,
          mark_price: 0.05,
          mark_iv: 50,
          underlying_price: 58100,
          last_price: null,
          best_bid_price: 0.048,
          best_ask_price: 0.052,
          best_bid_amount: 10,
          best_ask_amount: 12,
          open_interest: 150,
          stats: { volume: 3.5, volume_usd: 9000 },
        },
      },
      { error: { code: 13020, message: 'not_found' } },
    ]);

    const result = await collectQuotedGreeks(client, engine, { currency: 'BTC', delayMs: 0, logger });

    expect(result.spot).toBe(SPOT);
    expect(result.skipped).toEqual([{ instrumentName: 'BTC-BAD', reason: 'expected 4 tokens, got 2' }]);
    expect(result.failed).toEqual(['BTC-27MAR26-55000-P']);
    expect(calls).toHaveLength(4);
    expect(result.rows).toHaveLength(1);

    const expected = roundGreeks(engine.fromQuotedVolatility('BTC-27MAR26-60000-C', SPOT, 50, AS_OF).greeks);
    expect(result.rows[0]).toEqual({
      instrument: 'BTC-27MAR26-60000-C',
      underlying: 'BTC',
      expiry: '2026-03-27',
      strike: 60000,
      type: 'C',
      mark_price: 0.05,
      last_price: null,
      bid: 0.048,
      ask: 0.052,
      bid_size: 10,
      ask_size: 12,
      volume: 3.5,
      volume_usd: 9000,
      open_interest: 150,
      iv: 50,
      spot_price: SPOT,
      underlying_price: 58100,
      ...expected,
    });
  });

  it('should stop after limit instruments and value at asOf', async () => {
    const client = clientReplaying([
      { result: { index_price: SPOT } },
      { result: [instrument('BTC-27MAR26-60000-C'), instrument('BTC-27MAR26-55000-P')] },
      { result: { instrument_name: 'BTC-27MAR26-60000-C', timestamp: AS_OF, mark_price: 0.05 } },
    ]);

    const result = await collectQuotedGreeks(client, engine, {
      currency: 'BTC',
      limit: 1,
      asOf: EXPIRY,
      delayMs: 0,
      logger,
    });

    expect(calls).toHaveLength(3);
    expect(result.rows).toHaveLength(1);
    // Missing mark IV and an expired valuation instant both leave NaN Greeks
    expect(result.rows[0].iv).toBeNull();
    expect(result.rows[0].delta).toBeNaN();
  });
});
