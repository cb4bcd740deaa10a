import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, parseConfig, ConfigError, DEFAULT_API_URL } from '../config';

describe('parseConfig', () => {
  it('should fall back to defaults', () => {
    expect(parseConfig({})).toEqual({
      apiUrl: DEFAULT_API_URL,
      currency: 'BTC',
      pricing: { riskFreeRate: 0.05, daysPerYear: 365.25 },
      requestDelayMs: 100,
      maxRetries: 3,
      outputDir: '.',
    });
  });

  it('should read and coerce environment values', () => {
    const config = parseConfig({
      DERIBIT_API_URL: 'https://test.exchange.invalid/api/v2/public',
      DERIBIT_CURRENCY: 'eth',
      RISK_FREE_RATE: '0.03',
      DAYS_PER_YEAR: '365',
      REQUEST_DELAY_MS: '0',
      MAX_RETRIES: '5',
      OUTPUT_DIR: 'out',
    });

    expect(config).toEqual({
      apiUrl: 'https://test.exchange.invalid/api/v2/public',
      currency: 'ETH',
      pricing: { riskFreeRate: 0.03, daysPerYear: 365 },
      requestDelayMs: 0,
      maxRetries: 5,
      outputDir: 'out',
    });
  });

  it('should treat blank values as unset', () => {
    const config = parseConfig({ RISK_FREE_RATE: '', DERIBIT_CURRENCY: '  ' });

    expect(config.pricing.riskFreeRate).toBe(0.05);
    expect(config.currency).toBe('BTC');
  });

  it('should list every invalid variable', () => {
    let caught: unknown;
    try {
      parseConfig({ RISK_FREE_RATE: 'abc', MAX_RETRIES: '0' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]).toMatch(/^RISK_FREE_RATE: /);
      expect(caught.issues[1]).toMatch(/^MAX_RETRIES: /);
    }
  });

  it('should reject a currency that is not a code', () => {
    expect(() => parseConfig({ DERIBIT_CURRENCY: 'BTC-USD' })).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'config-'));
    jest.spyOn(console, 'log');
    jest.spyOn(console, 'info');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    delete process.env.MAX_RETRIES;
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read a .env file without printing anything', () => {
    const envPath = join(dir, '.env');
    writeFileSync(envPath, 'MAX_RETRIES=5\n', 'utf8');

    expect(loadConfig(envPath).maxRetries).toBe(5);
    expect(console.log).not.toHaveBeenCalled();
    expect(console.info).not.toHaveBeenCalled();
  });
});
