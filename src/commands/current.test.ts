import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_CURRENT_LIMIT, runCurrent } from './current';
import { UsageError } from './shared';
import { MILLISECONDS_PER_DAY } from '../types';

const EXPIRY = Date.UTC(2026, 2, 27, 8);
const AS_OF = EXPIRY - 30 * MILLISECONDS_PER_DAY;

const NAMES = Array.from({ length: 25 }, (_, i) => `BTC-27MAR26-${50000 + i * 1000}-C`);

function rpc(result: unknown): Response {
  return new Response(JSON.stringify({ jsonrpc: '2.0', result }));
}

function reply(url: string): Response {
  const { pathname, searchParams } = new URL(url);

  if (pathname.endsWith('/get_index_price')) {
    return rpc({ index_price: 58000 });
  }
  if (pathname.endsWith('/get_instruments')) {
    return rpc(
      NAMES.map((name) => ({ instrument_name: name, expiration_timestamp: EXPIRY, base_currency: 'BTC', is_active: true }))
    );
  }
  return rpc({ instrument_name: searchParams.get('instrument_name'), timestamp: AS_OF, mark_price: 0.05, mark_iv: 50 });
}

describe('runCurrent', () => {
  let outDir: string;
  let urls: string[];

  beforeEach(() => {
    outDir = mkdtempSync(join(tmpdir(), 'current-'));
    urls = [];
    process.env.REQUEST_DELAY_MS = '0';
    jest.spyOn(global, 'fetch').mockImplementation(async (input) => {
      const url = String(input);
      urls.push(url);
      return reply(url);
    });
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    delete process.env.REQUEST_DELAY_MS;
    rmSync(outDir, { recursive: true, force: true });
  });

  const tickerRequests = (): string[] => urls.filter((url) => url.includes('/ticker?'));

  it('should price the first 20 active options by default', async () => {
    await runCurrent({ currency: 'BTC', out: outDir });

    expect(DEFAULT_CURRENT_LIMIT).toBe(20);
    expect(tickerRequests()).toHaveLength(20);
    expect(tickerRequests()[19]).toContain(`instrument_name=${NAMES[19]}`);

    const lines = readFileSync(join(outDir, 'options_current.csv'), 'utf8').trim().split('\n');
    expect(lines).toHaveLength(21);
  });

  it('should honour an explicit limit', async () => {
    await runCurrent({ currency: 'BTC', out: outDir, limit: 3 });

    expect(tickerRequests()).toHaveLength(3);
  });

  it('should reject a limit that is not a positive integer before any request', async () => {
    await expect(runCurrent({ currency: 'BTC', out: outDir, limit: 0 })).rejects.toBeInstanceOf(UsageError);
    expect(urls).toEqual([]);
  });
});
