import {
  GreeksCalculation,
  InstrumentIdentifier,
  PricingConfig,
  UndefinedReason,
  DEFAULT_PRICING_CONFIG,
} from '../types';
import { calculateGreeks, createUndefinedGreeks, getTimeToExpirationInYears } from '../blackscholes';
import { solveImpliedVolatility, SolverOptions } from '../iv';
import { MalformedIdentifierError, parseInstrumentName } from '../utils/instrument';

/**
 * Market data for one calculation in a batch
 */
export type GreeksRequest =
  | {
      instrumentName: string;
      spot: number;
      /** Quoted implied volatility as a percentage (e.g., 65.5) */
      ivPercent: number;
      asOf: number;
    }
  | {
      instrumentName: string;
      spot: number;
      /** Observed option price in the spot currency */
      price: number;
      asOf: number;
    };

/**
 * An instrument left out of a batch because its name did not parse
 */
export interface SkippedInstrument {
  instrumentName: string;
  reason: string;
}

export interface GreeksBatchResult {
  calculations: GreeksCalculation[];
  skipped: SkippedInstrument[];
}

export interface GreeksEngineOptions {
  /** Model parameters (default: 5% risk-free rate, 365.25 day year) */
  pricing?: Partial<PricingConfig>;
  /** Implied volatility solver tuning */
  solver?: SolverOptions;
}

/**
 * Computes Delta, Gamma, Vega and Theta for exchange options, either from a
 * quoted implied volatility or from an observed price via an implied
 * volatility search.
 *
 * @remarks
 * The engine holds only its immutable configuration; every call is a pure
 * function of its arguments and the explicit `asOf` instant, so a single
 * engine can serve any number of instruments.
 *
 * Degenerate inputs (expired instrument, non-positive volatility, an
 * unresolvable price) end in `status: 'undefined'` with NaN Greeks. A raw
 * name that does not parse throws {@link MalformedIdentifierError}; the
 * batch API skips and records those instead.
 *
 * @example
 * ```typescript
 * const engine = new GreeksEngine({ pricing: { riskFreeRate: 0.04 } });
 * const result = engine.fromQuotedVolatility('BTC-27MAR26-80000-C', 62000, 58.2, Date.now());
 * if (result.status === 'complete') {
 *   console.log(result.greeks.delta);
 * }
 * ```
 */
export class GreeksEngine {
  readonly pricing: Readonly<PricingConfig>;
  readonly solver: Readonly<SolverOptions>;

  constructor(options: GreeksEngineOptions = {}) {
    this.pricing = { ...DEFAULT_PRICING_CONFIG, ...options.pricing };
    this.solver = { ...options.solver };
  }

  /**
   * Greeks from a quoted implied volatility (percentage, as the exchange quotes it).
   *
   * @throws {MalformedIdentifierError} If `instrument` is a name that does not parse
   */
  fromQuotedVolatility(
    instrument: string | InstrumentIdentifier,
    spot: number,
    ivPercent: number,
    asOf: number
  ): GreeksCalculation {
    const identifier = resolveInstrument(instrument);
    const timeToExpiry = this.timeToExpiry(identifier, asOf);

    if (!(timeToExpiry > 0)) {
      return undefinedCalculation(identifier, timeToExpiry, 'expired');
    }

    const volatility = ivPercent / 100;
    if (!(volatility > 0) || !Number.isFinite(volatility)) {
      return undefinedCalculation(identifier, timeToExpiry, 'invalid-volatility');
    }
    if (!(spot > 0) || !Number.isFinite(spot)) {
      return undefinedCalculation(identifier, timeToExpiry, 'invalid-input');
    }

    return this.complete(identifier, spot, timeToExpiry, volatility);
  }

  /**
   * Greeks from an observed option price in the spot currency, after
   * recovering its implied volatility.
   *
   * @throws {MalformedIdentifierError} If `instrument` is a name that does not parse
   */
  fromObservedPrice(
    instrument: string | InstrumentIdentifier,
    spot: number,
    price: number,
    asOf: number
  ): GreeksCalculation {
    const identifier = resolveInstrument(instrument);
    const timeToExpiry = this.timeToExpiry(identifier, asOf);

    if (!(timeToExpiry > 0)) {
      return undefinedCalculation(identifier, timeToExpiry, 'expired');
    }

    const solved = solveImpliedVolatility(
      {
        price,
        spot,
        strike: identifier.strike,
        timeToExpiry,
        optionType: identifier.optionType,
      },
      this.pricing,
      this.solver
    );

    if (!solved.resolved) {
      return undefinedCalculation(identifier, timeToExpiry, solved.reason);
    }

    return this.complete(identifier, spot, timeToExpiry, solved.volatility);
  }

  /**
   * Same as {@link fromObservedPrice} for a price quoted in units of the
   * underlying (inverse options), converted with `price * spot`.
   */
  fromCoinPrice(
    instrument: string | InstrumentIdentifier,
    spot: number,
    coinPrice: number,
    asOf: number
  ): GreeksCalculation {
    return this.fromObservedPrice(instrument, spot, coinPrice * spot, asOf);
  }

  /**
   * Runs many calculations. Names that do not parse are skipped and
   * reported in `skipped`; the batch never aborts on one record.
   */
  calculateBatch(requests: GreeksRequest[]): GreeksBatchResult {
    const calculations: GreeksCalculation[] = [];
    const skipped: SkippedInstrument[] = [];

    for (const request of requests) {
      let identifier: InstrumentIdentifier;
      try {
        identifier = parseInstrumentName(request.instrumentName);
      } catch (error) {
        if (error instanceof MalformedIdentifierError) {
          skipped.push({ instrumentName: request.instrumentName, reason: error.reason });
          continue;
        }
        throw error;
      }

      calculations.push(
        'ivPercent' in request
          ? this.fromQuotedVolatility(identifier, request.spot, request.ivPercent, request.asOf)
          : this.fromObservedPrice(identifier, request.spot, request.price, request.asOf)
      );
    }

    return { calculations, skipped };
  }

  /**
   * Time to expiry in years under this engine's day count
   */
  timeToExpiry(identifier: InstrumentIdentifier, asOf: number): number {
    return getTimeToExpirationInYears(identifier.expirationTimestamp, asOf, this.pricing.daysPerYear);
  }

  private complete(
    identifier: InstrumentIdentifier,
    spot: number,
    timeToExpiry: number,
    volatility: number
  ): GreeksCalculation {
    const greeks = calculateGreeks(
      {
        spot,
        strike: identifier.strike,
        timeToExpiry,
        volatility,
        optionType: identifier.optionType,
      },
      this.pricing
    );

    return { status: 'complete', instrument: identifier, timeToExpiry, volatility, greeks };
  }
}

/**
 * @internal
 */
function resolveInstrument(instrument: string | InstrumentIdentifier): InstrumentIdentifier {
  return typeof instrument === 'string' ? parseInstrumentName(instrument) : instrument;
}

/**
 * @internal
 */
function undefinedCalculation(
  instrument: InstrumentIdentifier,
  timeToExpiry: number,
  reason: UndefinedReason
): GreeksCalculation {
  return {
    status: 'undefined',
    instrument,
    timeToExpiry,
    reason,
    volatility: NaN,
    greeks: createUndefinedGreeks(),
  };
}
