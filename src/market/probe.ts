import { DeribitClient, DeribitApiError } from '../client/DeribitClient';
import { Logger, logger as rootLogger } from '../utils/logger';

export interface ProbeCheck {
  name: string;
  ok: boolean;
  detail: string;
}

export interface ProbeReport {
  checks: ProbeCheck[];
  ok: boolean;
}

/**
 * Calls each public endpoint the commands rely on once and reports what
 * answered. Only API failures are caught; anything else propagates.
 */
export async function probeApi(
  client: DeribitClient,
  currency: string,
  asOf: number = Date.now(),
  logger: Logger = rootLogger
): Promise<ProbeReport> {
  const checks: ProbeCheck[] = [];

  const run = async (name: string, call: () => Promise<string>): Promise<void> => {
    try {
      const detail = await call();
      checks.push({ name, ok: true, detail });
      logger.success(`${name}: ${detail}`);
    } catch (error) {
      if (!(error instanceof DeribitApiError)) throw error;
      checks.push({ name, ok: false, detail: error.message });
      logger.error(`${name}: ${error.message}`);
    }
  };

  let sampleInstrument: string | null = null;

  await run('index price', async () => {
    const price = await client.getIndexPrice(currency);
    return `${currency} = ${price}`;
  });

  await run('instruments', async () => {
    const instruments = await client.getInstruments(currency);
    sampleInstrument = instruments.find((i) => i.is_active)?.instrument_name ?? null;
    return `${instruments.length} options`;
  });

  await run('ticker', async () => {
    if (sampleInstrument === null) return 'no active instrument to sample';
    const ticker = await client.getTicker(sampleInstrument);
    return `${ticker.instrument_name} mark ${ticker.mark_price}, IV ${ticker.mark_iv ?? 'n/a'}`;
  });

  await run('trades', async () => {
    const trades = await client.getLastTradesByCurrency(currency, asOf - 60 * 60 * 1000, asOf, 10);
    return `${trades.length} trades in the last hour`;
  });

  await run('settlements', async () => {
    const page = await client.getLastSettlementsByCurrency(currency, asOf, 5);
    return `${page.settlements.length} recent settlements`;
  });

  return { checks, ok: checks.every((check) => check.ok) };
}
