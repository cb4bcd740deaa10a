/**
 * Core types for option Greeks and implied volatility
 */

/**
 * Option type (call or put)
 */
export type OptionType = 'call' | 'put';

/**
 * Structured fields of an exchange option name such as `BTC-6FEB26-60000-C`
 */
export interface InstrumentIdentifier {
  /** Underlying currency or index (e.g., 'BTC', 'XRP_USDC') */
  readonly underlying: string;
  /** Settlement instant (08:00 UTC on the expiry date) */
  readonly expiration: Date;
  /** Settlement instant in milliseconds */
  readonly expirationTimestamp: number;
  /** Strike price */
  readonly strike: number;
  /** Option type */
  readonly optionType: OptionType;
}

/**
 * Model parameters that stay fixed across calculations
 */
export interface PricingConfig {
  /** Risk-free interest rate (annualized, as decimal, continuously compounded) */
  riskFreeRate: number;
  /** Day-count used for time-to-expiry and per-day theta */
  daysPerYear: number;
}

/**
 * Parameters for Black-Scholes calculation
 */
export interface BlackScholesParams {
  /** Current price of the underlying asset */
  spot: number;
  /** Strike price of the option */
  strike: number;
  /** Time to expiration in years */
  timeToExpiry: number;
  /** Implied volatility (annualized, as decimal e.g., 0.65 for 65%) */
  volatility: number;
  /** Option type */
  optionType: OptionType;
}

/**
 * First-order option Greeks. Any field is NaN when the inputs are degenerate.
 */
export interface GreeksResult {
  /** Delta: Rate of change of option price with respect to underlying price */
  delta: number;
  /** Gamma: Rate of change of delta with respect to underlying price */
  gamma: number;
  /** Vega: Rate of change of option price with respect to volatility (per 1% change) */
  vega: number;
  /** Theta: Rate of change of option price with respect to time (per day) */
  theta: number;
}

/**
 * Observed price to invert into an implied volatility
 */
export interface ImpliedVolatilityQuery {
  /** Observed option price, in the same currency as spot */
  price: number;
  spot: number;
  strike: number;
  /** Time to expiration in years */
  timeToExpiry: number;
  optionType: OptionType;
}

/**
 * Why an implied volatility could not be resolved
 */
export type UnresolvedReason =
  | 'expired'
  | 'invalid-price'
  | 'invalid-input'
  | 'below-intrinsic'
  | 'above-upper-bound'
  | 'outside-search-range'
  | 'insensitive-price'
  | 'no-convergence';

/**
 * Outcome of an implied volatility search
 */
export type ImpliedVolatilityResult =
  | {
      resolved: true;
      /** Implied volatility as decimal */
      volatility: number;
      /** Total model evaluations spent */
      iterations: number;
      /** Which stage of the solver produced the root */
      method: 'newton' | 'bisection';
    }
  | {
      resolved: false;
      reason: UnresolvedReason;
    };

/**
 * Why a Greeks calculation produced undefined (NaN) values
 */
export type UndefinedReason = UnresolvedReason | 'invalid-volatility';

/**
 * Terminal state of one Greeks calculation
 */
export type GreeksCalculation =
  | {
      status: 'complete';
      instrument: InstrumentIdentifier;
      timeToExpiry: number;
      /** Volatility fed into the model (decimal) */
      volatility: number;
      greeks: GreeksResult;
    }
  | {
      status: 'undefined';
      instrument: InstrumentIdentifier;
      timeToExpiry: number;
      reason: UndefinedReason;
      /** NaN */
      volatility: number;
      /** Every field NaN */
      greeks: GreeksResult;
    };

/**
 * Constants
 */
export const MILLISECONDS_PER_DAY = 86400000;
export const DAYS_PER_YEAR = 365.25;
export const SETTLEMENT_HOUR_UTC = 8;

export const DEFAULT_PRICING_CONFIG: Readonly<PricingConfig> = {
  riskFreeRate: 0.05,
  daysPerYear: DAYS_PER_YEAR,
};
