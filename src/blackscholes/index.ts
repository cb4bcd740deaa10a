import {
  BlackScholesParams,
  GreeksResult,
  PricingConfig,
  DEFAULT_PRICING_CONFIG,
  MILLISECONDS_PER_DAY,
} from '../types';
import { cumulativeNormalDistribution, normalPDF } from '../utils/statistics';

/**
 * Calculate option price using Black-Scholes model
 *
 * At or past expiry the price is the intrinsic value; with zero volatility
 * it is the discounted forward intrinsic value.
 *
 * @param params - Black-Scholes parameters
 * @param config - Risk-free rate and day count
 * @returns Option price, NaN for non-positive spot or strike
 *
 * @example
 * ```typescript
 * const price = blackScholes({
 *   spot: 60000,
 *   strike: 65000,
 *   timeToExpiry: 0.25,
 *   volatility: 0.55,
 *   optionType: 'call'
 * });
 * ```
 */
export function blackScholes(
  params: BlackScholesParams,
  config: PricingConfig = DEFAULT_PRICING_CONFIG
): number {
  const { spot: S, strike: K, timeToExpiry: t, volatility: vol, optionType } = params;
  const r = config.riskFreeRate;

  if (!(S > 0) || !(K > 0)) {
    return NaN;
  }

  if (t <= 0) {
    return optionType === 'call' ? Math.max(0, S - K) : Math.max(0, K - S);
  }

  const ert = Math.exp(-r * t);

  if (!(vol > 0)) {
    return optionType === 'call' ? Math.max(0, S - K * ert) : Math.max(0, K * ert - S);
  }

  const { d1, d2 } = computeD1D2(S, K, r, t, vol);

  if (optionType === 'call') {
    return S * cumulativeNormalDistribution(d1) - K * ert * cumulativeNormalDistribution(d2);
  }
  return K * ert * cumulativeNormalDistribution(-d2) - S * cumulativeNormalDistribution(-d1);
}

/**
 * Calculate Delta, Gamma, Vega and Theta using the Black-Scholes model
 * (no dividend yield, continuous compounding).
 *
 * Vega is per 1 volatility point and theta is per day (`config.daysPerYear`).
 * Expired instruments, non-positive volatility and non-positive prices
 * yield NaN for every Greek instead of throwing.
 *
 * @param params - Black-Scholes parameters
 * @param config - Risk-free rate and day count
 *
 * @example
 * ```typescript
 * const greeks = calculateGreeks({
 *   spot: 60000,
 *   strike: 60000,
 *   timeToExpiry: 30 / 365.25,
 *   volatility: 0.5,
 *   optionType: 'put'
 * });
 * ```
 */
export function calculateGreeks(
  params: BlackScholesParams,
  config: PricingConfig = DEFAULT_PRICING_CONFIG
): GreeksResult {
  const { spot: S, strike: K, timeToExpiry: t, volatility: vol, optionType } = params;
  const r = config.riskFreeRate;

  if (isDegenerate(params)) {
    return createUndefinedGreeks();
  }

  const sqrtT = Math.sqrt(t);
  const { d1, d2 } = computeD1D2(S, K, r, t, vol);
  const nd1 = normalPDF(d1);
  const ert = Math.exp(-r * t);

  // Same for calls and puts
  const gamma = nd1 / (S * vol * sqrtT);
  const vega = S * sqrtT * nd1;
  const decay = -(S * vol * nd1) / (2 * sqrtT);

  let delta: number;
  let theta: number;

  if (optionType === 'call') {
    delta = cumulativeNormalDistribution(d1);
    theta = decay - r * K * ert * cumulativeNormalDistribution(d2);
  } else {
    delta = -cumulativeNormalDistribution(-d1);
    theta = decay + r * K * ert * cumulativeNormalDistribution(-d2);
  }

  return {
    delta,
    gamma,
    vega: vega * 0.01, // Per 1% change in volatility
    theta: theta / config.daysPerYear, // Per day
  };
}

/**
 * Raw model vega (per unit of volatility, not per 1%).
 * Zero for degenerate inputs, which stops a Newton step.
 */
export function calculateModelVega(
  params: BlackScholesParams,
  config: PricingConfig = DEFAULT_PRICING_CONFIG
): number {
  if (isDegenerate(params)) {
    return 0;
  }

  const { spot: S, strike: K, timeToExpiry: t, volatility: vol } = params;
  const { d1 } = computeD1D2(S, K, config.riskFreeRate, t, vol);
  return S * Math.sqrt(t) * normalPDF(d1);
}

/**
 * Get milliseconds until expiration
 *
 * @param expirationTimestamp - Expiration timestamp in milliseconds
 * @param asOf - Reference instant in milliseconds (default: now)
 * @returns Milliseconds until expiration, negative once expired
 */
export function getMillisecondsToExpiration(expirationTimestamp: number, asOf: number = Date.now()): number {
  return expirationTimestamp - asOf;
}

/**
 * Get time to expiration in years
 *
 * @param expirationTimestamp - Expiration timestamp in milliseconds
 * @param asOf - Reference instant in milliseconds (default: now)
 * @param daysPerYear - Day count (default: 365.25)
 * @returns Time to expiration in years, exactly 0 at the settlement instant
 */
export function getTimeToExpirationInYears(
  expirationTimestamp: number,
  asOf: number = Date.now(),
  daysPerYear: number = DEFAULT_PRICING_CONFIG.daysPerYear
): number {
  const milliseconds = getMillisecondsToExpiration(expirationTimestamp, asOf);
  return milliseconds / (daysPerYear * MILLISECONDS_PER_DAY);
}

/**
 * @internal
 */
function computeD1D2(S: number, K: number, r: number, t: number, vol: number): { d1: number; d2: number } {
  const sqrtT = Math.sqrt(t);
  const d1 = (Math.log(S / K) + (r + (vol * vol) / 2) * t) / (vol * sqrtT);
  return { d1, d2: d1 - vol * sqrtT };
}

/**
 * Negated comparisons also catch NaN inputs
 * @internal
 */
function isDegenerate({ spot, strike, timeToExpiry, volatility }: BlackScholesParams): boolean {
  return (
    !(timeToExpiry > 0) ||
    !(volatility > 0) ||
    !Number.isFinite(volatility) ||
    !Number.isFinite(timeToExpiry) ||
    !(spot > 0) ||
    !(strike > 0)
  );
}

/**
 * Greeks for a degenerate calculation: every field NaN
 */
export function createUndefinedGreeks(): GreeksResult {
  return {
    delta: NaN,
    gamma: NaN,
    vega: NaN,
    theta: NaN,
  };
}
