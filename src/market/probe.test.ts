import { probeApi } from './probe';
import { DeribitClient, FetchLike } from '../client/DeribitClient';
import { Logger } from '../utils/logger';

describe('probeApi', () => {
  const asOf = Date.UTC(2026, 2, 20, 12);
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger('test');
    jest.spyOn(logger, 'success').mockImplementation(() => undefined);
    jest.spyOn(logger, 'error').mockImplementation(() => undefined);
  });

  function clientReplaying(bodies: unknown[]): DeribitClient {
    const fetch: FetchLike = async () => new Response(JSON.stringify(bodies.shift()));
    return new DeribitClient({ baseUrl: 'https://exchange.test', fetch, maxRetries: 1, logger });
  }

  it('should report each endpoint', async () => {
    const client = clientReplaying([
      { result: { index_price: 61000 } },
      {
        result: [
          {
            instrument_name: 'BTC-27MAR26-60000-C',
            expiration_timestamp: Date.UTC(2026, 2, 27, 8),
            base_currency: 'BTC',
            is_active: true,
          },
        ],
      },
      { result: { instrument_name: 'BTC-27MAR26-60000-C', timestamp: asOf, mark_price: 0.04, mark_iv: 51 } },
      { error: { code: 10028, message: 'too_many_requests' } },
      { result: { settlements: [] } },
    ]);

    const report = await probeApi(client, 'BTC', asOf, logger);

    expect(report.checks).toEqual([
      { name: 'index price', ok: true, detail: 'BTC = 61000' },
      { name: 'instruments', ok: true, detail: '1 options' },
      { name: 'ticker', ok: true, detail: 'BTC-27MAR26-60000-C mark 0.04, IV 51' },
      {
        name: 'trades',
        ok: false,
        detail: 'get_last_trades_by_currency_and_time: too_many_requests',
      },
      { name: 'settlements', ok: true, detail: '0 recent settlements' },
    ]);
    expect(report.ok).toBe(false);
  });

  it('should skip the ticker check without an active instrument', async () => {
    const client = clientReplaying([
      { result: { index_price: 3000 } },
      { result: [] },
      { result: { trades: [] } },
      { result: { settlements: [] } },
    ]);

    const report = await probeApi(client, 'ETH', asOf, logger);

    expect(report.checks[2]).toEqual({ name: 'ticker', ok: true, detail: 'no active instrument to sample' });
    expect(report.ok).toBe(true);
  });
});
